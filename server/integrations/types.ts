/**
 * Media Catalog - Canonical Types
 *
 * The display loop only talks to a media server through MediaCatalog.
 * PlaybackItem and LibraryItem keep the raw artwork candidates so that the
 * fallback order lives in slide normalization, not in the client.
 *
 * @module server/integrations/types
 */

import type { Result } from '../utils/result';
import type { MetadataResolutionError } from '../services/display/errors';

// ============================================================================
// PLAYBACK
// ============================================================================

export type PlaybackKind = 'movie' | 'episode';

export interface PlaybackItem {
    ratingKey: string;
    kind: PlaybackKind;
    title: string;
    summary?: string;
    /** Show title for episodes */
    grandparentTitle?: string;
    art?: string;
    parentArt?: string;
    grandparentArt?: string;
    thumb?: string;
    grandparentThumb?: string;
    /** Users attached to the session, first one is displayed */
    viewers: string[];
    /** True when a transcode sub-session exists */
    transcoding: boolean;
    positionMs: number;
    durationMs: number;
}

// ============================================================================
// LIBRARY
// ============================================================================

export type LibraryKind = 'movie' | 'show' | 'season';

export interface LibraryItem {
    ratingKey: string;
    /** Owning show for seasons */
    parentRatingKey?: string;
    kind: LibraryKind;
    title: string;
    summary?: string;
    thumb?: string;
    art?: string;
}

export interface ShowMetadata {
    ratingKey: string;
    title: string;
    summary?: string;
    art?: string;
    seasonCount: number;
    episodeCount: number;
}

export type ShowResolver = (showId: string) => Promise<Result<ShowMetadata, MetadataResolutionError>>;

// ============================================================================
// CATALOG
// ============================================================================

export interface MediaCatalog {
    /** Active sessions. @throws on query failure */
    currentlyPlaying(): Promise<PlaybackItem[]>;
    /** Newest library additions, at most `limit`. @throws on query failure */
    recentlyAdded(limit: number): Promise<LibraryItem[]>;
    /** Show record with aggregated season/episode counts. Never throws. */
    resolveShow(showId: string): Promise<Result<ShowMetadata, MetadataResolutionError>>;
    /** Item totals keyed by section title. Unknown sections are absent. @throws on query failure */
    libraryCounts(sectionNames: string[]): Promise<Record<string, number>>;
    /** Absolute URL that returns `sourceUrl` resized to width×height. */
    transcodeImageUrl(sourceUrl: string, width: number, height: number): string;
    /** Headers the image fetcher must send alongside transcode URLs. */
    imageHeaders(): Record<string, string>;
}
