/**
 * Type definitions for the preview server.
 *
 * @packageDocumentation
 */

import type { RequestLogLevel } from '@flashless/types';

/**
 * Options for {@link PreviewServer}.
 *
 * @example
 * ```typescript
 * const options: PreviewServerOptions = {
 *     host: '127.0.0.1',
 *     port: 0,
 *     requestLog: 'all',
 *     liveReloadIntervalMs: 200,
 * };
 * ```
 */
export interface PreviewServerOptions {
    /** Host to bind to. Defaults to `127.0.0.1`. */
    host?: string;

    /** Port to bind to; `0` asks the OS for a free port. Defaults to 8787. */
    port?: number;

    /** Which completed requests to log. Defaults to `errors`. */
    requestLog?: RequestLogLevel;

    /** Serve the reload stream, inject the reload script and watch files. Defaults to `true`. */
    liveReload?: boolean;

    /** Milliseconds between file-system snapshots. Defaults to 1000. */
    liveReloadIntervalMs?: number;

    /** Milliseconds of reload-stream silence before a keepalive comment. Defaults to 15000. */
    keepaliveMs?: number;
}

/**
 * The address a server is bound to. `port` is the real port even when `0`
 * was requested.
 */
export interface ServerAddress {
    host: string;
    port: number;
}
