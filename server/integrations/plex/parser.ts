/**
 * Plex Response Parser
 *
 * Turns Plex JSON (`MediaContainer.Metadata[]`) into catalog items.
 * Plex omits keys freely and sends numbers as strings on some versions, so
 * every field is read defensively from `unknown`.
 */

import logger from '../../utils/logger';
import { AdapterError } from '../errors';
import type { LibraryItem, LibraryKind, PlaybackItem, ShowMetadata } from '../types';

type PlexRecord = Record<string, unknown>;

// ============================================================================
// PRIMITIVE READERS
// ============================================================================

function isRecord(value: unknown): value is PlexRecord {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Non-empty string field, else undefined. */
export function readString(record: PlexRecord, key: string): string | undefined {
    const value = record[key];
    if (typeof value === 'string' && value.length > 0) return value;
    if (typeof value === 'number') return String(value);
    return undefined;
}

/** Numeric field (number or numeric string), else 0. */
export function readNumber(record: PlexRecord, key: string): number {
    const value = record[key];
    const parsed = typeof value === 'number' ? value : parseInt(String(value), 10);
    return Number.isFinite(parsed) ? parsed : 0;
}

/** Plex returns a single object or an array depending on count. */
function asRecordList(value: unknown): PlexRecord[] {
    if (Array.isArray(value)) return value.filter(isRecord);
    if (isRecord(value)) return [value];
    return [];
}

// ============================================================================
// CONTAINERS
// ============================================================================

function container(data: unknown): PlexRecord {
    if (isRecord(data) && isRecord(data.MediaContainer)) {
        return data.MediaContainer;
    }
    throw new AdapterError('INVALID_RESPONSE', 'Plex response has no MediaContainer');
}

/**
 * Items of a `MediaContainer` response.
 * @throws AdapterError (INVALID_RESPONSE) when the body is not a MediaContainer
 */
export function readMetadataList(data: unknown, field: 'Metadata' | 'Directory' = 'Metadata'): PlexRecord[] {
    return asRecordList(container(data)[field]);
}

/**
 * `totalSize` of a paged response (falls back to `size`).
 * @throws AdapterError (INVALID_RESPONSE) when the body is not a MediaContainer
 */
export function readTotalSize(data: unknown): number {
    const mediaContainer = container(data);
    return mediaContainer.totalSize !== undefined
        ? readNumber(mediaContainer, 'totalSize')
        : readNumber(mediaContainer, 'size');
}

// ============================================================================
// SESSIONS
// ============================================================================

/**
 * Map a `/status/sessions` entry, whatever its player state.
 * Anything that is not an episode is shown the way a movie is.
 */
export function parseSession(raw: PlexRecord): PlaybackItem {
    const durationMs = readNumber(raw, 'duration');
    const positionMs = Math.min(readNumber(raw, 'viewOffset'), durationMs);

    const viewers = asRecordList(raw.User)
        .map(user => readString(user, 'title'))
        .filter((title): title is string => title !== undefined);

    return {
        ratingKey: readString(raw, 'ratingKey') ?? readString(raw, 'sessionKey') ?? '',
        kind: raw.type === 'episode' ? 'episode' : 'movie',
        title: readString(raw, 'title') ?? 'Untitled',
        summary: readString(raw, 'summary'),
        grandparentTitle: readString(raw, 'grandparentTitle'),
        art: readString(raw, 'art'),
        parentArt: readString(raw, 'parentArt'),
        grandparentArt: readString(raw, 'grandparentArt'),
        thumb: readString(raw, 'thumb'),
        grandparentThumb: readString(raw, 'grandparentThumb'),
        viewers,
        transcoding: asRecordList(raw.TranscodeSession).length > 0,
        positionMs,
        durationMs,
    };
}

// ============================================================================
// LIBRARY
// ============================================================================

const LIBRARY_KINDS: readonly LibraryKind[] = ['movie', 'show', 'season'];

function isLibraryKind(value: unknown): value is LibraryKind {
    return LIBRARY_KINDS.some(kind => kind === value);
}

/**
 * Map a `/library/recentlyAdded` entry. Kinds the display does not show
 * (episodes, albums, photos) return null.
 */
export function parseLibraryItem(raw: PlexRecord): LibraryItem | null {
    const kind = raw.type;
    const ratingKey = readString(raw, 'ratingKey');
    if (!isLibraryKind(kind) || !ratingKey) {
        logger.verbose(`[PlexParser] Skipping recently added entry: type=${String(kind)}, ratingKey=${ratingKey ?? 'none'}`);
        return null;
    }

    return {
        ratingKey,
        parentRatingKey: readString(raw, 'parentRatingKey'),
        kind,
        title: readString(raw, 'title') ?? 'Untitled',
        summary: readString(raw, 'summary'),
        thumb: readString(raw, 'thumb'),
        art: readString(raw, 'art'),
    };
}

/**
 * Combine a show record with its season list. Episodes are the sum of each
 * season's `leafCount`.
 */
export function parseShow(raw: PlexRecord, seasons: PlexRecord[]): ShowMetadata {
    return {
        ratingKey: readString(raw, 'ratingKey') ?? '',
        title: readString(raw, 'title') ?? 'Untitled',
        summary: readString(raw, 'summary'),
        art: readString(raw, 'art'),
        seasonCount: seasons.length,
        episodeCount: seasons.reduce((total, season) => total + readNumber(season, 'leafCount'), 0),
    };
}

/** Library sections as `{ key, title }`. */
export function parseSections(data: unknown): Array<{ key: string; title: string }> {
    return readMetadataList(data, 'Directory').flatMap(section => {
        const key = readString(section, 'key');
        const title = readString(section, 'title');
        return key && title ? [{ key, title }] : [];
    });
}
