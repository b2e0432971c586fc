import { BaseAdapter } from '../BaseAdapter';
import { MediaCatalog, LibraryItem, PlaybackItem, ShowMetadata } from '../types';
import { MetadataResolutionError } from '../../services/display/errors';
import { Result, ok, err } from '../../utils/result';
import logger from '../../utils/logger';
import {
    parseLibraryItem,
    parseSections,
    parseSession,
    parseShow,
    readMetadataList,
    readTotalSize,
} from './parser';

// ============================================================================
// PLEX CATALOG
// ============================================================================

export class PlexCatalog extends BaseAdapter implements MediaCatalog {
    readonly serverName = 'Plex';

    getAuthHeaders(): Record<string, string> {
        return {
            'X-Plex-Token': this.connection.token,
            'Accept': 'application/json',
        };
    }

    imageHeaders(): Record<string, string> {
        return { 'X-Plex-Token': this.connection.token };
    }

    async currentlyPlaying(): Promise<PlaybackItem[]> {
        const response = await this.get('/status/sessions');
        return readMetadataList(response.data).map(parseSession);
    }

    async recentlyAdded(limit: number): Promise<LibraryItem[]> {
        const response = await this.get('/library/recentlyAdded', {
            params: {
                'X-Plex-Container-Start': 0,
                'X-Plex-Container-Size': limit,
            },
        });

        // Size the window before filtering, unsupported kinds shrink the cycle
        return readMetadataList(response.data)
            .slice(0, limit)
            .map(parseLibraryItem)
            .filter((item): item is LibraryItem => item !== null);
    }

    async resolveShow(showId: string): Promise<Result<ShowMetadata, MetadataResolutionError>> {
        try {
            const showResponse = await this.get(`/library/metadata/${encodeURIComponent(showId)}`);
            const [show] = readMetadataList(showResponse.data);
            if (!show) {
                return err(new MetadataResolutionError(showId, new Error('Show not found')));
            }

            const childrenResponse = await this.get(`/library/metadata/${encodeURIComponent(showId)}/children`);
            const seasons = readMetadataList(childrenResponse.data).filter(child => child.type === 'season');

            const metadata = parseShow(show, seasons);
            logger.verbose(`[Plex] Resolved show: id=${showId}, title="${metadata.title}", seasons=${metadata.seasonCount}, episodes=${metadata.episodeCount}`);
            return ok(metadata);
        } catch (error) {
            return err(new MetadataResolutionError(showId, error));
        }
    }

    async libraryCounts(sectionNames: string[]): Promise<Record<string, number>> {
        const sectionsResponse = await this.get('/library/sections');
        const sections = parseSections(sectionsResponse.data);
        const counts: Record<string, number> = {};

        for (const name of sectionNames) {
            const section = sections.find(s => s.title === name);
            if (!section) {
                logger.warn(`[Plex] Library section not found: name="${name}"`);
                continue;
            }

            // Container size 0 returns only the totals
            const countResponse = await this.get(`/library/sections/${encodeURIComponent(section.key)}/all`, {
                params: {
                    'X-Plex-Container-Start': 0,
                    'X-Plex-Container-Size': 0,
                },
            });
            counts[name] = readTotalSize(countResponse.data);
        }

        return counts;
    }

    transcodeImageUrl(sourceUrl: string, width: number, height: number): string {
        const params = new URLSearchParams({
            url: sourceUrl,
            width: String(width),
            height: String(height),
            minSize: '1',
            upscale: '1',
            'X-Plex-Token': this.connection.token,
        });
        return `${this.getBaseUrl()}/photo/:/transcode?${params.toString()}`;
    }
}
