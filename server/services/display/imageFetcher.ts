/**
 * Image Fetcher
 *
 * Downloads artwork from the media server and decodes it into an RGBA
 * bitmap with sharp. Every failure (HTTP status, network, decode) returns
 * null so the renderer can fall back to a solid fill.
 *
 * CACHING:
 * With `cacheSeconds > 0`, successful decodes are kept per URL for that long.
 * Failures are never cached.
 */

import axios from 'axios';
import sharp from 'sharp';
import logger from '../../utils/logger';
import { ImageFetchError, extractErrorMessage } from './errors';

// ============================================================================
// TYPES
// ============================================================================

export interface DecodedBitmap {
    width: number;
    height: number;
    /** Row-major RGBA, 4 bytes per pixel */
    data: Uint8ClampedArray;
}

export interface ImageFetcherOptions {
    /** Headers sent with every download (e.g., X-Plex-Token) */
    headers: Record<string, string>;
    timeoutMs: number;
    /** Cache lifetime for decoded images, 0 disables */
    cacheSeconds?: number;
    /** Clock for cache expiry (tests) */
    now?: () => number;
}

interface CacheEntry {
    bitmap: DecodedBitmap;
    expiresAt: number;
}

/** Cached bitmaps kept at most, oldest evicted first */
const MAX_CACHE_ENTRIES = 64;

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Strip credentials from a URL before it reaches a log line.
 */
export function redactUrl(url: string): string {
    return url.replace(/([?&]X-Plex-Token=)[^&]*/gi, '$1***');
}

/**
 * Decode any sharp-supported image into RGBA.
 * @throws when the buffer is not a decodable image
 */
export async function decodeImage(buffer: Buffer): Promise<DecodedBitmap> {
    const { data, info } = await sharp(buffer)
        .ensureAlpha()
        .raw()
        .toBuffer({ resolveWithObject: true });

    return {
        width: info.width,
        height: info.height,
        data: new Uint8ClampedArray(data.buffer, data.byteOffset, data.byteLength),
    };
}

// ============================================================================
// IMAGE FETCHER
// ============================================================================

export class ImageFetcher {
    private readonly cache = new Map<string, CacheEntry>();
    private readonly cacheMs: number;
    private readonly now: () => number;

    constructor(private readonly options: ImageFetcherOptions) {
        this.cacheMs = Math.max(0, options.cacheSeconds ?? 0) * 1000;
        this.now = options.now ?? (() => Date.now());
    }

    /**
     * Fetch and decode an image. Absent URL, HTTP failure and decode
     * failure all resolve to null, and so does a download cancelled
     * through `signal`.
     */
    async fetch(url: string | null | undefined, signal?: AbortSignal): Promise<DecodedBitmap | null> {
        if (!url) return null;

        const cached = this.readCache(url);
        if (cached) {
            logger.verbose(`[ImageFetcher] Cache hit: url=${redactUrl(url)}`);
            return cached;
        }

        let body: Buffer;
        try {
            const response = await axios.get<ArrayBuffer>(url, {
                responseType: 'arraybuffer',
                timeout: this.options.timeoutMs,
                headers: this.options.headers,
                signal,
            });
            body = Buffer.from(response.data);
        } catch (error) {
            if (axios.isCancel(error)) {
                logger.debug(`[ImageFetcher] Download cancelled: url=${redactUrl(url)}`);
                return null;
            }
            const status = axios.isAxiosError(error) ? error.response?.status : undefined;
            const reason = status ? `HTTP ${status}` : extractErrorMessage(error);
            this.report(new ImageFetchError(redactUrl(url), reason, error));
            return null;
        }

        try {
            const bitmap = await decodeImage(body);
            this.writeCache(url, bitmap);
            return bitmap;
        } catch (error) {
            this.report(new ImageFetchError(redactUrl(url), `decode failed: ${extractErrorMessage(error)}`, error));
            return null;
        }
    }

    /** Number of live cache entries. */
    get cacheSize(): number {
        return this.cache.size;
    }

    clearCache(): void {
        this.cache.clear();
    }

    private report(error: ImageFetchError): void {
        logger.warn(`[ImageFetcher] ${error.message}: url=${String(error.context?.url)}`);
    }

    private readCache(url: string): DecodedBitmap | null {
        if (this.cacheMs === 0) return null;

        const entry = this.cache.get(url);
        if (!entry) return null;

        if (entry.expiresAt <= this.now()) {
            this.cache.delete(url);
            return null;
        }
        return entry.bitmap;
    }

    private writeCache(url: string, bitmap: DecodedBitmap): void {
        if (this.cacheMs === 0) return;

        this.cache.delete(url);
        this.cache.set(url, { bitmap, expiresAt: this.now() + this.cacheMs });

        while (this.cache.size > MAX_CACHE_ENTRIES) {
            const oldest = this.cache.keys().next();
            if (oldest.done) break;
            this.cache.delete(oldest.value);
        }
    }
}
