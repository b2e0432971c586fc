/**
 * Tests for the image fetcher
 *
 * Downloads are mocked; decoding runs through sharp on generated PNGs.
 */

import { describe, it, expect, vi, beforeEach, beforeAll } from 'vitest';
import sharp from 'sharp';

// ============================================================================
// Mocks
// ============================================================================

const mockGet = vi.fn();
vi.mock('axios', async (importOriginal) => {
    const actual = await importOriginal<typeof import('axios')>();
    return {
        ...actual,
        default: {
            ...actual.default,
            get: (...args: unknown[]) => mockGet(...args),
        },
    };
});

vi.mock('../utils/logger', () => ({
    default: {
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
        verbose: vi.fn(),
        debug: vi.fn(),
    },
}));

import { CanceledError } from 'axios';
import logger from '../utils/logger';
import { ImageFetcher, decodeImage, redactUrl } from '../services/display/imageFetcher';

// ============================================================================
// Test Data
// ============================================================================

const ART_URL = 'http://plex.test:32400/photo/:/transcode?url=%2Fart&width=800&height=480&X-Plex-Token=test-token';
const REDACTED_ART_URL = 'http://plex.test:32400/photo/:/transcode?url=%2Fart&width=800&height=480&X-Plex-Token=***';

let redPng: Buffer;

beforeAll(async () => {
    redPng = await sharp({
        create: { width: 2, height: 3, channels: 3, background: { r: 255, g: 0, b: 0 } },
    }).png().toBuffer();
});

function httpError(status: number): Error {
    return Object.assign(new Error(`Request failed with status code ${status}`), {
        isAxiosError: true,
        response: { status },
    });
}

beforeEach(() => {
    vi.clearAllMocks();
});

// ============================================================================
// Tests
// ============================================================================

describe('redactUrl', () => {
    it('hides the token value', () => {
        expect(redactUrl(ART_URL)).toBe(REDACTED_ART_URL);
        expect(redactUrl('http://plex.test/art')).toBe('http://plex.test/art');
    });
});

describe('decodeImage', () => {
    it('decodes to RGBA with an opaque alpha channel', async () => {
        const bitmap = await decodeImage(redPng);

        expect(bitmap.width).toBe(2);
        expect(bitmap.height).toBe(3);
        expect(bitmap.data.length).toBe(2 * 3 * 4);
        expect(Array.from(bitmap.data.slice(0, 4))).toEqual([255, 0, 0, 255]);
    });
});

describe('ImageFetcher', () => {
    it('returns null for a missing URL without a request', async () => {
        const fetcher = new ImageFetcher({ headers: {}, timeoutMs: 1000 });

        expect(await fetcher.fetch(undefined)).toBeNull();
        expect(await fetcher.fetch('')).toBeNull();
        expect(mockGet).not.toHaveBeenCalled();
    });

    it('downloads with headers, timeout and abort signal, then decodes', async () => {
        mockGet.mockResolvedValue({ data: redPng });
        const fetcher = new ImageFetcher({ headers: { 'X-Plex-Token': 'test-token' }, timeoutMs: 4000 });
        const controller = new AbortController();

        const bitmap = await fetcher.fetch(ART_URL, controller.signal);

        expect(bitmap?.width).toBe(2);
        expect(mockGet).toHaveBeenCalledWith(ART_URL, {
            responseType: 'arraybuffer',
            timeout: 4000,
            headers: { 'X-Plex-Token': 'test-token' },
            signal: controller.signal,
        });
    });

    it('returns null without a warning when the download is cancelled', async () => {
        mockGet.mockRejectedValue(new CanceledError());
        const fetcher = new ImageFetcher({ headers: {}, timeoutMs: 1000 });

        expect(await fetcher.fetch(ART_URL, AbortSignal.abort())).toBeNull();
        expect(logger.warn).not.toHaveBeenCalled();
        expect(logger.debug).toHaveBeenCalledWith(`[ImageFetcher] Download cancelled: url=${REDACTED_ART_URL}`);
    });

    it('returns null and logs the status on an HTTP failure', async () => {
        mockGet.mockRejectedValue(httpError(404));
        const fetcher = new ImageFetcher({ headers: {}, timeoutMs: 1000 });

        expect(await fetcher.fetch(ART_URL)).toBeNull();
        expect(logger.warn).toHaveBeenCalledWith(`[ImageFetcher] Image unavailable (HTTP 404): url=${REDACTED_ART_URL}`);
    });

    it('returns null on a network failure', async () => {
        mockGet.mockRejectedValue(new Error('socket hang up'));
        const fetcher = new ImageFetcher({ headers: {}, timeoutMs: 1000 });

        expect(await fetcher.fetch('http://plex.test/art')).toBeNull();
        expect(logger.warn).toHaveBeenCalledWith('[ImageFetcher] Image unavailable (socket hang up): url=http://plex.test/art');
    });

    it('returns null when the body is not an image', async () => {
        mockGet.mockResolvedValue({ data: Buffer.from('<html>not found</html>') });
        const fetcher = new ImageFetcher({ headers: {}, timeoutMs: 1000 });

        expect(await fetcher.fetch('http://plex.test/art')).toBeNull();
        expect(logger.warn).toHaveBeenCalledWith(expect.stringContaining('[ImageFetcher] Image unavailable (decode failed: '));
    });

    it('does not cache by default', async () => {
        mockGet.mockResolvedValue({ data: redPng });
        const fetcher = new ImageFetcher({ headers: {}, timeoutMs: 1000 });

        await fetcher.fetch(ART_URL);
        await fetcher.fetch(ART_URL);

        expect(mockGet).toHaveBeenCalledTimes(2);
        expect(fetcher.cacheSize).toBe(0);
    });

    it('serves decoded images from the cache until they expire', async () => {
        mockGet.mockResolvedValue({ data: redPng });
        let now = 1_000;
        const fetcher = new ImageFetcher({ headers: {}, timeoutMs: 1000, cacheSeconds: 60, now: () => now });

        const first = await fetcher.fetch(ART_URL);
        const second = await fetcher.fetch(ART_URL);
        expect(second).toBe(first);
        expect(mockGet).toHaveBeenCalledTimes(1);
        expect(logger.verbose).toHaveBeenCalledWith(`[ImageFetcher] Cache hit: url=${REDACTED_ART_URL}`);

        now += 60_000;
        await fetcher.fetch(ART_URL);
        expect(mockGet).toHaveBeenCalledTimes(2);
    });

    it('does not cache failures', async () => {
        mockGet.mockRejectedValueOnce(httpError(500)).mockResolvedValueOnce({ data: redPng });
        const fetcher = new ImageFetcher({ headers: {}, timeoutMs: 1000, cacheSeconds: 60 });

        expect(await fetcher.fetch(ART_URL)).toBeNull();
        expect(await fetcher.fetch(ART_URL)).not.toBeNull();
        expect(fetcher.cacheSize).toBe(1);

        fetcher.clearCache();
        expect(fetcher.cacheSize).toBe(0);
    });
});
