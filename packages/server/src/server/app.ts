/**
 * Hono app factory - creates the preview application
 */

import { Hono, type Context } from 'hono';
import { streamSSE } from 'hono/streaming';
import pc from 'picocolors';
import type { Manifest, RequestLogLevel } from '@flashless/types';
import { loggerMiddleware, type PreviewEnv } from '../middleware/logger.js';
import type { ReloadState } from '../reload/state.js';
import {
    assetResponse,
    fixtureResponse,
    jsonResponse,
    notFoundResponse,
} from './responses.js';
import type { PreviewRouter } from './router.js';

export interface PreviewAppOptions {
    manifest: Manifest;
    router: PreviewRouter;
    reloadState: ReloadState;
    liveReload: boolean;
    requestLog: RequestLogLevel;
    keepaliveMs: number;
    /** Log sink for the request logger. */
    log?: (line: string) => void;
}

/**
 * Create a Hono app that serves a manifest's UI, fixtures and reload stream
 */
export function createPreviewApp(options: PreviewAppOptions): Hono<PreviewEnv> {
    const { manifest, router, reloadState, liveReload, keepaliveMs } = options;
    const app = new Hono<PreviewEnv>();

    app.use('*', loggerMiddleware({ level: options.requestLog, write: options.log }));

    app.all('*', async (c) => {
        const method = c.req.method;
        const includeBody = method !== 'HEAD';
        const decision = await router.resolve(method, new URL(c.req.url).pathname);

        switch (decision.kind) {
            case 'reload':
                return includeBody
                    ? reloadStream(c, reloadState, keepaliveMs)
                    : new Response(null, { status: 200, headers: SSE_HEADERS });
            case 'fixture':
                return fixtureResponse(decision.mapping, decision.filePath, {
                    includeBody,
                });
            case 'static':
            case 'entry': {
                const response = await assetResponse(decision.filePath, {
                    includeBody,
                    cachePolicy: manifest.ui.cachePolicy,
                    reloadPath: liveReload ? router.reloadPath : undefined,
                });
                return response ?? notFoundResponse(new URL(c.req.url).pathname);
            }
            case 'not-found':
                return notFoundResponse(decision.path);
            case 'unsupported-method':
                return jsonResponse(
                    { error: 'Unsupported method', method: decision.method },
                    501,
                );
        }
    });

    app.notFound((c) => notFoundResponse(new URL(c.req.url).pathname));

    app.onError((err, c) => {
        const path = new URL(c.req.url).pathname;
        console.error(
            pc.red(`  [flashless] ${c.req.method} ${path} failed: ${err.message}`),
        );
        return jsonResponse({ error: 'Internal server error' }, 500);
    });

    return app;
}

const SSE_HEADERS = {
    'Content-Type': 'text/event-stream',
    'Cache-Control': 'no-cache',
    Connection: 'keep-alive',
};

/**
 * Streams reload versions: the current one at once, then each new one.
 * A comment line is sent after `keepaliveMs` without a change. The loop
 * ends when the client disconnects.
 */
function reloadStream(
    c: Context<PreviewEnv>,
    state: ReloadState,
    keepaliveMs: number,
): Response {
    return streamSSE(c, async (stream) => {
        const disconnected = new AbortController();
        stream.onAbort(() => disconnected.abort());

        let version = state.get();
        await stream.writeSSE({ data: String(version) });

        while (!disconnected.signal.aborted && !stream.aborted) {
            const changed = await state.waitForChange(
                version,
                keepaliveMs,
                disconnected.signal,
            );
            if (disconnected.signal.aborted) {
                break;
            }
            if (changed === null) {
                await stream.write(': keepalive\n\n');
                continue;
            }
            version = changed;
            await stream.writeSSE({ data: String(version) });
        }
    });
}
