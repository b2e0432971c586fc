/**
 * Plex Media Catalog
 *
 * Builds the MediaCatalog the display loop polls.
 */

import type { DisplayConfig } from '../../config/displayConfig';
import { PlexCatalog } from './adapter';

export { PlexCatalog };

export function createPlexCatalog(config: DisplayConfig): PlexCatalog {
    return new PlexCatalog({
        url: config.serverUrl,
        token: config.authToken,
        timeoutMs: config.requestTimeoutMs,
    });
}
