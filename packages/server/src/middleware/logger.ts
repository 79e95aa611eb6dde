/**
 * Logger middleware for request logging.
 *
 * This module provides Hono middleware that logs completed requests with
 * colorized output showing client, method, path, status code and response
 * time, filtered by a {@link RequestLogLevel}.
 *
 * @packageDocumentation
 */

import type { Context, Next } from 'hono';
import type { HttpBindings } from '@hono/node-server';
import pc from 'picocolors';
import type { RequestLogLevel } from '@flashless/types';

/**
 * Hono environment for apps served through `@hono/node-server`.
 */
export type PreviewEnv = { Bindings: HttpBindings };

/**
 * Configuration options for the logger middleware.
 */
export interface LoggerOptions {
    /** Which requests to log. */
    level: RequestLogLevel;

    /** Output sink. Defaults to `console.log`. */
    write?: (line: string) => void;
}

/**
 * Decides whether a completed request is logged.
 *
 * - `none`: never
 * - `errors`: status >= 400, or when no status is known
 * - `all`: always
 *
 * @param level - Configured log level
 * @param status - Response status, `undefined` when unknown
 *
 * @example
 * ```typescript
 * shouldLogRequest('errors', 200); // false
 * shouldLogRequest('errors', undefined); // true
 * ```
 */
export function shouldLogRequest(
    level: RequestLogLevel,
    status: number | undefined,
): boolean {
    switch (level) {
        case 'none':
            return false;
        case 'errors':
            return status === undefined || status >= 400;
        case 'all':
            return true;
    }
}

type Paint = (text: string) => string;

const METHOD_PAINT: Readonly<Record<string, Paint>> = {
    GET: pc.green,
    POST: pc.yellow,
    PUT: pc.blue,
    DELETE: pc.red,
    PATCH: pc.magenta,
};

/** Indexed by status class; 5xx and above share the last entry. */
const STATUS_CLASS_PAINT: readonly Paint[] = [
    String,
    String,
    pc.green,
    pc.cyan,
    pc.yellow,
    pc.red,
];

/** Elapsed-time colours, first matching upper bound wins. */
const ELAPSED_PAINT: ReadonlyArray<readonly [number, Paint]> = [
    [100, pc.green],
    [500, pc.yellow],
    [Infinity, pc.red],
];

function paintStatus(status: number | undefined): string {
    if (status === undefined) {
        return pc.gray('-');
    }
    const statusClass = Math.min(Math.floor(status / 100), STATUS_CLASS_PAINT.length - 1);
    const paint = STATUS_CLASS_PAINT[statusClass] ?? String;
    return paint(String(status));
}

function paintElapsed(ms: number): string {
    const entry = ELAPSED_PAINT.find(([bound]) => ms < bound);
    const paint = entry ? entry[1] : pc.red;
    return paint(`${ms.toFixed(0)}ms`);
}

/**
 * Formats one request log line.
 *
 * @example
 * ```typescript
 * formatRequestLine('127.0.0.1', 'GET', '/api/health', 200, 3);
 * // '  [flashless] 127.0.0.1 GET /api/health 200 3ms' (colorized)
 * ```
 */
export function formatRequestLine(
    client: string,
    method: string,
    path: string,
    status: number | undefined,
    elapsedMs: number,
): string {
    const paintMethod = METHOD_PAINT[method] ?? pc.gray;
    return `  ${pc.dim('[flashless]')} ${client} ${paintMethod(method)} ${path} ${paintStatus(status)} ${paintElapsed(elapsedMs)}`;
}

/**
 * Creates a Hono middleware that logs requests allowed by the level.
 *
 * The line is written once the handler has produced a response; for
 * streams that is when headers are sent, not when the stream ends.
 *
 * @param options - Logger configuration options
 * @returns A Hono middleware function
 *
 * @example
 * ```typescript
 * const app = new Hono<PreviewEnv>();
 * app.use('*', loggerMiddleware({ level: 'all' }));
 *
 * // Output example:
 * //   [flashless] 127.0.0.1 GET /api/health 200 4ms
 * ```
 */
export function loggerMiddleware(options: LoggerOptions) {
    const write = options.write ?? ((line: string) => console.log(line));

    return async (c: Context<PreviewEnv>, next: Next) => {
        if (options.level === 'none') {
            return next();
        }

        const start = Date.now();
        const method = c.req.method;
        const path = new URL(c.req.url).pathname;

        await next();

        const status = c.finalized ? c.res.status : undefined;
        if (!shouldLogRequest(options.level, status)) {
            return;
        }

        const client = c.env.incoming.socket.remoteAddress ?? '-';
        write(formatRequestLine(client, method, path, status, Date.now() - start));
    };
}
