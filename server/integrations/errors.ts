/**
 * Media Server Adapter Errors
 *
 * Every failure coming out of BaseAdapter.request() is classified into one
 * of these codes so callers can log and degrade consistently.
 *
 * @module server/integrations/errors
 */

import axios from 'axios';

// ============================================================================
// ERROR CODES
// ============================================================================

export type AdapterErrorCode =
    | 'CONFIG_INVALID'      // Missing URL or token
    | 'AUTH_FAILED'         // 401/403, token wrong or revoked
    | 'SERVICE_UNREACHABLE' // ECONNREFUSED, ETIMEDOUT, server is down
    | 'SERVICE_ERROR'       // 5xx, server is up but erroring
    | 'REQUEST_ERROR'       // Other HTTP errors (404, 400, etc.)
    | 'INVALID_RESPONSE'    // 2xx with a body we cannot read
    | 'NETWORK_ERROR';      // DNS failure, SSL error, etc.

// ============================================================================
// ADAPTER ERROR CLASS
// ============================================================================

export class AdapterError extends Error {
    public readonly name = 'AdapterError';

    constructor(
        public readonly code: AdapterErrorCode,
        message: string,
        public readonly context?: Record<string, unknown>
    ) {
        super(message);
    }

    /** HTTP status when the server answered, otherwise undefined. */
    get status(): number | undefined {
        const status = this.context?.status;
        return typeof status === 'number' ? status : undefined;
    }
}

// ============================================================================
// ERROR CLASSIFICATION
// ============================================================================

const UNREACHABLE_CODES = new Set(['ECONNREFUSED', 'ETIMEDOUT', 'ECONNABORTED', 'EHOSTUNREACH', 'ECONNRESET']);

/**
 * Classify a raw error (typically from axios) into an AdapterError.
 */
export function classifyError(error: unknown, serverName: string): AdapterError {
    if (error instanceof AdapterError) {
        return error;
    }

    if (axios.isAxiosError(error)) {
        // Server responded
        if (error.response) {
            const status = error.response.status;

            if (status === 401 || status === 403) {
                return new AdapterError('AUTH_FAILED',
                    `Authentication failed for ${serverName} (HTTP ${status})`,
                    { status, serverName }
                );
            }

            if (status >= 500) {
                return new AdapterError('SERVICE_ERROR',
                    `${serverName} returned server error (HTTP ${status})`,
                    { status, serverName }
                );
            }

            return new AdapterError('REQUEST_ERROR',
                `${serverName} request failed (HTTP ${status})`,
                { status, serverName }
            );
        }

        if (error.code && UNREACHABLE_CODES.has(error.code)) {
            return new AdapterError('SERVICE_UNREACHABLE',
                `Cannot reach ${serverName}: ${error.code}`,
                { code: error.code, serverName }
            );
        }
    }

    const message = error instanceof Error ? error.message : String(error);
    return new AdapterError('NETWORK_ERROR',
        `Network error for ${serverName}: ${message || 'Unknown error'}`,
        { serverName }
    );
}
