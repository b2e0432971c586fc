/**
 * Display Configuration
 *
 * Loaded once at startup and frozen. Values come from an optional JSON file
 * (CONFIG_FILE, default ./config.json) using the same keys as the
 * environment; environment variables take precedence over the file.
 *
 * Environment variables:
 *   PLEX_URL            - Plex server URL (required)
 *   PLEX_TOKEN          - X-Plex-Token (required)
 *   DISPLAY_TIME        - Seconds each screen stays up (required, > 0)
 *   NUM_RECENT_ITEMS    - Recently added items per cycle (required, integer > 0)
 *   TIME_FORMAT         - strftime format for the idle clock (default: %H:%M)
 *   SCREEN_WIDTH        - Frame width in px (default: 800)
 *   SCREEN_HEIGHT       - Frame height in px (default: 480)
 *   OUTPUT_PATH         - PNG file each frame is written to (default: ./data/frame.png)
 *   FONT_FAMILY         - Font family for all text (default: sans-serif)
 *   FONT_PATH           - Font file registered under FONT_FAMILY (optional)
 *   MOVIE_SECTION       - Library section counted as movies (default: Movies)
 *   SHOW_SECTION        - Library section counted as shows (default: TV Shows)
 *   REQUEST_TIMEOUT_MS  - Timeout for every HTTP call (default: 10000)
 *   IMAGE_CACHE_SECONDS - Decoded image cache lifetime, 0 disables (default: 0)
 *   PREFETCH_NEXT       - Fetch the next slide's art during the dwell (default: false)
 *   LOG_LEVEL           - error | warn | info | verbose | debug (default: info)
 */

import fs from 'fs';
import path from 'path';
import { ConfigError, extractErrorMessage } from '../services/display/errors';
import { isLogLevel, type LogLevel } from '../utils/logger';

// ============================================================================
// TYPES
// ============================================================================

export interface DisplayConfig {
    readonly serverUrl: string;
    readonly authToken: string;
    readonly displaySeconds: number;
    readonly timeFormat: string;
    readonly recentItemCount: number;
    readonly screenWidth: number;
    readonly screenHeight: number;
    readonly outputPath: string;
    readonly fontFamily: string;
    readonly fontPath: string | null;
    readonly movieSection: string;
    readonly showSection: string;
    readonly requestTimeoutMs: number;
    readonly imageCacheSeconds: number;
    readonly prefetchNext: boolean;
    readonly logLevel: LogLevel;
}

/** Flat key-value source, e.g. process.env merged over config.json. */
export type ConfigSource = Record<string, string | undefined>;

// ============================================================================
// DEFAULTS
// ============================================================================

const DEFAULTS = {
    TIME_FORMAT: '%H:%M',
    SCREEN_WIDTH: '800',
    SCREEN_HEIGHT: '480',
    OUTPUT_PATH: './data/frame.png',
    FONT_FAMILY: 'sans-serif',
    MOVIE_SECTION: 'Movies',
    SHOW_SECTION: 'TV Shows',
    REQUEST_TIMEOUT_MS: '10000',
    IMAGE_CACHE_SECONDS: '0',
    PREFETCH_NEXT: 'false',
    LOG_LEVEL: 'info',
} as const;

// ============================================================================
// FILE SOURCE
// ============================================================================

/**
 * Read a flat JSON object from disk. Numbers and booleans are stringified so
 * the file and the environment go through the same parser.
 * A missing file yields an empty source; a malformed one is a ConfigError.
 */
export function readConfigFile(filePath: string): ConfigSource {
    if (!fs.existsSync(filePath)) {
        return {};
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (error) {
        throw new ConfigError([`${filePath} is not valid JSON: ${extractErrorMessage(error)}`]);
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
        throw new ConfigError([`${filePath} must contain a JSON object`]);
    }

    const source: ConfigSource = {};
    for (const [key, value] of Object.entries(parsed)) {
        if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
            source[key] = String(value);
        }
    }
    return source;
}

// ============================================================================
// PARSING
// ============================================================================

function present(value: string | undefined): string | undefined {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
}

/**
 * Validate a flat source into a frozen DisplayConfig.
 * Collects every problem before throwing a single ConfigError.
 */
export function parseDisplayConfig(source: ConfigSource): DisplayConfig {
    const problems: string[] = [];

    const required = (key: string): string => {
        const value = present(source[key]);
        if (value === undefined) {
            problems.push(`${key} is required`);
            return '';
        }
        return value;
    };

    const optional = (key: keyof typeof DEFAULTS): string => present(source[key]) ?? DEFAULTS[key];

    const positiveNumber = (key: string, raw: string, integer: boolean): number => {
        if (raw === '') return 0; // already reported as missing
        const value = Number(raw);
        if (!Number.isFinite(value) || value <= 0 || (integer && !Number.isInteger(value))) {
            problems.push(`${key} must be a positive ${integer ? 'integer' : 'number'} (got "${raw}")`);
            return 0;
        }
        return value;
    };

    const serverUrl = required('PLEX_URL');
    if (serverUrl) {
        try {
            const url = new URL(serverUrl);
            if (url.protocol !== 'http:' && url.protocol !== 'https:') {
                problems.push(`PLEX_URL must use http or https (got "${url.protocol}")`);
            }
        } catch {
            problems.push(`PLEX_URL is not a valid URL (got "${serverUrl}")`);
        }
    }

    const authToken = required('PLEX_TOKEN');
    const displaySeconds = positiveNumber('DISPLAY_TIME', required('DISPLAY_TIME'), false);
    const recentItemCount = positiveNumber('NUM_RECENT_ITEMS', required('NUM_RECENT_ITEMS'), true);
    const screenWidth = positiveNumber('SCREEN_WIDTH', optional('SCREEN_WIDTH'), true);
    const screenHeight = positiveNumber('SCREEN_HEIGHT', optional('SCREEN_HEIGHT'), true);
    const requestTimeoutMs = positiveNumber('REQUEST_TIMEOUT_MS', optional('REQUEST_TIMEOUT_MS'), true);

    const cacheRaw = optional('IMAGE_CACHE_SECONDS');
    const imageCacheSeconds = Number(cacheRaw);
    if (!Number.isFinite(imageCacheSeconds) || imageCacheSeconds < 0) {
        problems.push(`IMAGE_CACHE_SECONDS must be a non-negative number (got "${cacheRaw}")`);
    }

    const prefetchRaw = optional('PREFETCH_NEXT').toLowerCase();
    if (prefetchRaw !== 'true' && prefetchRaw !== 'false') {
        problems.push(`PREFETCH_NEXT must be true or false (got "${prefetchRaw}")`);
    }

    const logLevelRaw = optional('LOG_LEVEL').toLowerCase();
    if (!isLogLevel(logLevelRaw)) {
        problems.push(`LOG_LEVEL must be one of error, warn, info, verbose, debug (got "${logLevelRaw}")`);
    }

    if (problems.length > 0) {
        throw new ConfigError(problems);
    }

    return Object.freeze({
        serverUrl: serverUrl.replace(/\/$/, ''),
        authToken,
        displaySeconds,
        timeFormat: optional('TIME_FORMAT'),
        recentItemCount,
        screenWidth,
        screenHeight,
        outputPath: path.resolve(optional('OUTPUT_PATH')),
        fontFamily: optional('FONT_FAMILY'),
        fontPath: present(source.FONT_PATH) ?? null,
        movieSection: optional('MOVIE_SECTION'),
        showSection: optional('SHOW_SECTION'),
        requestTimeoutMs,
        imageCacheSeconds,
        prefetchNext: prefetchRaw === 'true',
        logLevel: isLogLevel(logLevelRaw) ? logLevelRaw : 'info',
    });
}

/**
 * Load configuration from CONFIG_FILE (or ./config.json) and the environment.
 * @throws ConfigError when required keys are missing or invalid
 */
export function loadDisplayConfig(env: NodeJS.ProcessEnv = process.env): DisplayConfig {
    const filePath = path.resolve(env.CONFIG_FILE || 'config.json');
    const fileSource = readConfigFile(filePath);
    return parseDisplayConfig({ ...fileSource, ...env });
}

/**
 * True when the server is reached over plain HTTP on a non-local host,
 * which sends the token in the clear.
 */
export function isInsecureRemoteUrl(serverUrl: string): boolean {
    try {
        const url = new URL(serverUrl);
        const isLocalhost = ['localhost', '127.0.0.1', '::1', '[::1]'].includes(url.hostname);
        return url.protocol === 'http:' && !isLocalhost;
    } catch {
        return false;
    }
}
