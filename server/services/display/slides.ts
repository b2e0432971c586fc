/**
 * Slide Normalization
 *
 * Turns catalog items into render-ready slides. Artwork fallbacks are
 * literal, ordered lists of extractors: the first non-empty value wins.
 *
 * @module server/services/display/slides
 */

import logger from '../../utils/logger';
import type { LibraryItem, MediaCatalog, PlaybackItem, ShowResolver } from '../../integrations/types';

// ============================================================================
// TYPES
// ============================================================================

export type PlayMode = 'Direct Play' | 'Transcoding';

export interface PlaybackInfo {
    viewer: string;
    mode: PlayMode;
    endsAt: Date;
}

export interface SeasonEpisodeInfo {
    seasons: number;
    episodes: number;
}

interface SlideBase {
    title: string;
    /** Never empty, falls back to a placeholder */
    description: string;
    posterUrl?: string;
    fanartUrl?: string;
}

export interface PlaybackSlide extends SlideBase {
    source: 'playback';
    playbackInfo: PlaybackInfo;
}

export interface LibrarySlide extends SlideBase {
    source: 'library';
    /** Present for shows and seasons, absent for movies */
    seasonEpisodeInfo?: SeasonEpisodeInfo;
}

export type Slide = PlaybackSlide | LibrarySlide;

export interface ScreenSize {
    width: number;
    height: number;
}

// ============================================================================
// CONSTANTS
// ============================================================================

export const UNKNOWN_VIEWER = 'Unknown User';
export const MISSING_DESCRIPTION = 'No description available';
export const UNRESOLVED_SHOW_DESCRIPTION = 'Description not available';

/** Poster target size in px */
export const POSTER_SIZE: ScreenSize = { width: 200, height: 300 };

type Extractor<T> = (item: T) => string | undefined;

export const EPISODE_FANART_CANDIDATES: ReadonlyArray<Extractor<PlaybackItem>> = [
    item => item.grandparentArt,
    item => item.parentArt,
    item => item.art,
];

export const EPISODE_POSTER_CANDIDATES: ReadonlyArray<Extractor<PlaybackItem>> = [
    item => item.grandparentThumb,
    item => item.thumb,
];

export const MOVIE_FANART_CANDIDATES: ReadonlyArray<Extractor<PlaybackItem>> = [
    item => item.art,
    item => item.thumb,
];

export const MOVIE_POSTER_CANDIDATES: ReadonlyArray<Extractor<PlaybackItem>> = [
    item => item.thumb,
];

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Evaluate extractors in order and return the first non-empty value.
 */
export function firstAvailable<T>(item: T, candidates: ReadonlyArray<Extractor<T>>): string | undefined {
    for (const extract of candidates) {
        const value = extract(item);
        if (value) return value;
    }
    return undefined;
}

/**
 * Wall-clock time the playback finishes if it runs uninterrupted.
 */
export function estimateEndTime(item: Pick<PlaybackItem, 'positionMs' | 'durationMs'>, now: Date): Date {
    const remainingMs = Math.max(0, item.durationMs - item.positionMs);
    return new Date(now.getTime() + remainingMs);
}

function descriptionOr(text: string | undefined, fallback: string = MISSING_DESCRIPTION): string {
    return text && text.trim() ? text : fallback;
}

// ============================================================================
// PLAYBACK
// ============================================================================

export function fromPlayback(item: PlaybackItem, now: Date = new Date()): PlaybackSlide {
    const isEpisode = item.kind === 'episode';

    const description = isEpisode && item.grandparentTitle
        ? `${item.grandparentTitle}: ${item.summary ?? ''}`
        : descriptionOr(item.summary);

    return {
        source: 'playback',
        title: item.title,
        description,
        fanartUrl: firstAvailable(item, isEpisode ? EPISODE_FANART_CANDIDATES : MOVIE_FANART_CANDIDATES),
        posterUrl: firstAvailable(item, isEpisode ? EPISODE_POSTER_CANDIDATES : MOVIE_POSTER_CANDIDATES),
        playbackInfo: {
            viewer: item.viewers[0] || UNKNOWN_VIEWER,
            mode: item.transcoding ? 'Transcoding' : 'Direct Play',
            endsAt: estimateEndTime(item, now),
        },
    };
}

// ============================================================================
// LIBRARY
// ============================================================================

/**
 * Shows and seasons take title, description, fanart and counts from the
 * owning show. A failed lookup degrades this slide only.
 */
export async function fromLibrary(item: LibraryItem, resolveShow: ShowResolver): Promise<LibrarySlide> {
    if (item.kind === 'movie') {
        return {
            source: 'library',
            title: item.title,
            description: descriptionOr(item.summary),
            posterUrl: item.thumb,
            fanartUrl: item.art,
        };
    }

    const showId = item.kind === 'show' ? item.ratingKey : item.parentRatingKey;
    const resolved = showId
        ? await resolveShow(showId)
        : null;

    if (resolved?.ok) {
        const show = resolved.value;
        return {
            source: 'library',
            title: show.title,
            description: descriptionOr(show.summary),
            posterUrl: item.thumb,
            fanartUrl: show.art,
            seasonEpisodeInfo: { seasons: show.seasonCount, episodes: show.episodeCount },
        };
    }

    const reason = resolved ? resolved.error.message : 'item has no parent show';
    logger.warn(`[Slides] Show metadata unavailable, using fallback: ratingKey=${item.ratingKey}, error="${reason}"`);

    return {
        source: 'library',
        title: item.title,
        description: UNRESOLVED_SHOW_DESCRIPTION,
        posterUrl: item.thumb,
        fanartUrl: item.art,
        seasonEpisodeInfo: { seasons: 0, episodes: 0 },
    };
}

// ============================================================================
// TRANSCODING
// ============================================================================

/**
 * Swap artwork paths for transcode URLs sized for the screen (fanart) and
 * the poster frame.
 */
export function withTranscodedArt<S extends Slide>(
    slide: S,
    catalog: Pick<MediaCatalog, 'transcodeImageUrl'>,
    screen: ScreenSize
): S {
    return {
        ...slide,
        fanartUrl: slide.fanartUrl
            ? catalog.transcodeImageUrl(slide.fanartUrl, screen.width, screen.height)
            : undefined,
        posterUrl: slide.posterUrl
            ? catalog.transcodeImageUrl(slide.posterUrl, POSTER_SIZE.width, POSTER_SIZE.height)
            : undefined,
    };
}
