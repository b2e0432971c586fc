/**
 * Display Error Types
 *
 * Every failure the display pipeline knows about is one of these classes.
 * Only ConfigError and RenderBackendError are fatal; the others are caught
 * where they occur and the affected slide or cycle degrades.
 *
 * @module server/services/display/errors
 */

// ============================================================================
// ERROR CODES
// ============================================================================

export type DisplayErrorCode =
    | 'CONFIG_ERROR'              // Missing or invalid configuration (fatal)
    | 'CATALOG_QUERY_FAILED'      // Sessions/recently added/counts query failed
    | 'IMAGE_FETCH_FAILED'        // Download or decode of artwork failed
    | 'METADATA_RESOLUTION_FAILED' // Parent show lookup failed
    | 'RENDER_BACKEND_FAILED';    // Drawing surface unusable (fatal)

// ============================================================================
// ERROR CLASSES
// ============================================================================

export class DisplayError extends Error {
    constructor(
        public readonly code: DisplayErrorCode,
        message: string,
        public readonly context?: Record<string, unknown>,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'DisplayError';
    }

    /** True for errors that must terminate the process. */
    get fatal(): boolean {
        return this.code === 'CONFIG_ERROR' || this.code === 'RENDER_BACKEND_FAILED';
    }
}

export class ConfigError extends DisplayError {
    constructor(public readonly problems: string[]) {
        super('CONFIG_ERROR', `Invalid configuration: ${problems.join('; ')}`, { problems });
        this.name = 'ConfigError';
    }
}

export class CatalogQueryError extends DisplayError {
    constructor(operation: string, cause: unknown) {
        super('CATALOG_QUERY_FAILED', `${operation} failed: ${extractErrorMessage(cause)}`, { operation }, { cause });
        this.name = 'CatalogQueryError';
    }
}

export class ImageFetchError extends DisplayError {
    constructor(url: string, reason: string, cause?: unknown) {
        super('IMAGE_FETCH_FAILED', `Image unavailable (${reason})`, { url }, { cause });
        this.name = 'ImageFetchError';
    }
}

export class MetadataResolutionError extends DisplayError {
    constructor(public readonly itemId: string, cause: unknown) {
        super('METADATA_RESOLUTION_FAILED', `Could not resolve show ${itemId}: ${extractErrorMessage(cause)}`, { itemId }, { cause });
        this.name = 'MetadataResolutionError';
    }
}

export class RenderBackendError extends DisplayError {
    constructor(operation: string, cause: unknown) {
        super('RENDER_BACKEND_FAILED', `Render backend failed during ${operation}: ${extractErrorMessage(cause)}`, { operation }, { cause });
        this.name = 'RenderBackendError';
    }
}

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Extract a human-readable error message from any error type.
 */
export function extractErrorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
