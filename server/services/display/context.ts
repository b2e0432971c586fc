/**
 * Application Context
 *
 * Everything the display loop needs, built once at startup and passed
 * explicitly. Tests build their own with stub collaborators.
 */

import type { DisplayConfig } from '../../config/displayConfig';
import { createPlexCatalog } from '../../integrations/plex';
import type { MediaCatalog } from '../../integrations/types';
import { CanvasBackend } from './canvasBackend';
import { RenderBackendError } from './errors';
import { NoopForegroundHint, type ForegroundHint } from './foregroundHint';
import { ImageFetcher } from './imageFetcher';
import { Renderer } from './renderer';

export interface AppContext {
    config: DisplayConfig;
    catalog: MediaCatalog;
    images: Pick<ImageFetcher, 'fetch'>;
    renderer: Renderer;
    foregroundHint: ForegroundHint;
    clock: () => Date;
}

/**
 * Wire the production collaborators.
 * @throws RenderBackendError when the drawing surface cannot be created
 */
export function createAppContext(config: DisplayConfig): AppContext {
    const catalog = createPlexCatalog(config);

    const images = new ImageFetcher({
        headers: catalog.imageHeaders(),
        timeoutMs: config.requestTimeoutMs,
        cacheSeconds: config.imageCacheSeconds,
    });

    let backend: CanvasBackend;
    try {
        backend = new CanvasBackend({
            width: config.screenWidth,
            height: config.screenHeight,
            outputPath: config.outputPath,
            fontFamily: config.fontFamily,
            fontPath: config.fontPath,
        });
    } catch (error) {
        throw new RenderBackendError('init', error);
    }

    return {
        config,
        catalog,
        images,
        renderer: new Renderer(backend, config.timeFormat),
        foregroundHint: new NoopForegroundHint(),
        clock: () => new Date(),
    };
}
