/**
 * Base Adapter: HTTP client for a media server
 *
 * The Plex catalog extends this class. It provides:
 * - A single request() path with auth headers and a bounded timeout
 * - Config validation before every request
 * - Structured error classification (AdapterError)
 * - Consistent debug/warn logging of every call
 *
 * @module server/integrations/BaseAdapter
 */

import axios, { AxiosRequestConfig, AxiosResponse } from 'axios';
import logger from '../utils/logger';
import { HttpOpts } from './httpTypes';
import { AdapterError, classifyError } from './errors';

// ============================================================================
// TYPES
// ============================================================================

export interface ServerConnection {
    /** Base URL without trailing slash */
    url: string;
    /** Auth token sent with every request */
    token: string;
    /** Default request timeout in milliseconds */
    timeoutMs: number;
}

const DEFAULT_TIMEOUT_MS = 15000;

// ============================================================================
// BASE ADAPTER
// ============================================================================

export abstract class BaseAdapter {
    /** Name used in log lines and error messages (e.g., 'Plex') */
    abstract readonly serverName: string;

    constructor(protected readonly connection: ServerConnection) {}

    /** Return auth headers for requests. Every adapter MUST override this. */
    abstract getAuthHeaders(): Record<string, string>;

    /**
     * Validate that the connection has the fields every request needs.
     * Default: requires url and token.
     */
    validateConfig(): boolean {
        return !!this.connection.url && !!this.connection.token;
    }

    getBaseUrl(): string {
        return this.connection.url.replace(/\/$/, '');
    }

    // ========================================================================
    // CORE HTTP METHODS (throw AdapterError on failure)
    // ========================================================================

    async get<T = unknown>(path: string, opts?: HttpOpts): Promise<AxiosResponse<T>> {
        return this.request<T>('GET', path, opts);
    }

    /**
     * Core HTTP request method. All other methods route through here.
     *
     * @throws AdapterError on any failure
     */
    async request<T = unknown>(method: string, path: string, opts?: HttpOpts): Promise<AxiosResponse<T>> {
        if (!this.validateConfig()) {
            throw new AdapterError('CONFIG_INVALID',
                `Missing required configuration for ${this.serverName}`,
                { serverName: this.serverName }
            );
        }

        const config: AxiosRequestConfig = {
            method,
            url: `${this.getBaseUrl()}${path}`,
            headers: this.getAuthHeaders(),
            params: opts?.params,
            timeout: this.connection.timeoutMs || DEFAULT_TIMEOUT_MS,
        };

        logger.debug(`[Adapter:${this.serverName}] ${method} ${path}`);

        try {
            return await axios.request<T>(config);
        } catch (error) {
            const adapterError = classifyError(error, this.serverName);
            // Timeouts and network blips are transient; auth and server errors need attention
            const logLevel = adapterError.code === 'SERVICE_UNREACHABLE' || adapterError.code === 'NETWORK_ERROR'
                ? 'warn' : 'error';
            logger[logLevel](
                `[Adapter:${this.serverName}] ${adapterError.code}: ${adapterError.message}`,
                { path, status: adapterError.status }
            );
            throw adapterError;
        }
    }
}
