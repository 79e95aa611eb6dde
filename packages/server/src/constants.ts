/**
 * Preview server defaults.
 */

import type { RequestLogLevel } from '@flashless/types';

/** Reload stream path, joined under the UI base path. */
export const LIVE_RELOAD_ENDPOINT = '/__flashless/reload';

/** Read size used when streaming static files and fixtures. */
export const STREAM_CHUNK_SIZE = 64 * 1024;

export const DEFAULT_HOST = '127.0.0.1';

export const DEFAULT_PORT = 8787;

export const DEFAULT_REQUEST_LOG: RequestLogLevel = 'errors';

export const DEFAULT_LIVE_RELOAD_INTERVAL_MS = 1000;

export const DEFAULT_KEEPALIVE_MS = 15_000;

/** Upper bound on waiting for the watcher or the listener to shut down. */
export const SHUTDOWN_TIMEOUT_MS = 2000;

/** Methods the router dispatches. `HEAD` is answered as `GET` without a body. */
export const DISPATCHED_METHODS: readonly string[] = [
    'GET',
    'HEAD',
    'POST',
    'PUT',
    'DELETE',
    'PATCH',
];
