/**
 * The preview server: a Node HTTP listener running the preview app, plus
 * the file watcher that drives live reload.
 *
 * @packageDocumentation
 */

import { createServer, type Server } from 'http';
import { getRequestListener } from '@hono/node-server';
import {
    FlashlessError,
    FlashlessErrorCode,
    createBindError,
    type Manifest,
} from '@flashless/manifest';
import type { RequestLogLevel } from '@flashless/types';
import {
    DEFAULT_HOST,
    DEFAULT_KEEPALIVE_MS,
    DEFAULT_LIVE_RELOAD_INTERVAL_MS,
    DEFAULT_PORT,
    DEFAULT_REQUEST_LOG,
    SHUTDOWN_TIMEOUT_MS,
} from '../constants.js';
import { ReloadState } from '../reload/state.js';
import { FileChangeWatcher } from '../reload/watcher.js';
import type { PreviewServerOptions, ServerAddress } from '../types.js';
import { createPreviewApp } from './app.js';
import { PreviewRouter } from './router.js';

/**
 * Serves a manifest's UI and mock API over HTTP.
 *
 * Construction prepares the app; {@link listen} binds the socket and
 * {@link start} additionally starts the file watcher. {@link create} does
 * both construction and binding.
 *
 * @example
 * ```typescript
 * const server = await PreviewServer.create(manifest, { port: 0 });
 * await server.start();
 * console.log(`http://${server.address.host}:${server.address.port}/`);
 * await server.serveForever(); // until stop()
 * ```
 */
export class PreviewServer {
    readonly reloadState = new ReloadState();
    readonly router: PreviewRouter;

    private readonly host: string;
    private readonly port: number;
    private readonly requestLog: RequestLogLevel;
    private readonly liveReload: boolean;
    private readonly server: Server;
    private readonly watcher?: FileChangeWatcher;
    private readonly stopped = new AbortController();
    private started = false;

    /**
     * @param manifest - A loaded manifest in `mock` mode
     * @param options - Bind address, logging and live-reload settings
     * @throws \{FlashlessError\} `UNSUPPORTED_MODE` when the manifest's API mode is not `mock`
     */
    constructor(
        readonly manifest: Manifest,
        options: PreviewServerOptions = {},
    ) {
        if (manifest.api.mode !== 'mock') {
            throw new FlashlessError(
                FlashlessErrorCode.UNSUPPORTED_MODE,
                `API mode '${manifest.api.mode}' is not supported by the preview server; use 'mock'.`,
                'api.mode',
            );
        }

        this.host = options.host ?? DEFAULT_HOST;
        this.port = options.port ?? DEFAULT_PORT;
        this.requestLog = options.requestLog ?? DEFAULT_REQUEST_LOG;
        this.liveReload = options.liveReload ?? true;

        this.router = new PreviewRouter(manifest, { liveReload: this.liveReload });
        const app = createPreviewApp({
            manifest,
            router: this.router,
            reloadState: this.reloadState,
            liveReload: this.liveReload,
            requestLog: this.requestLog,
            keepaliveMs: options.keepaliveMs ?? DEFAULT_KEEPALIVE_MS,
        });
        this.server = createServer(getRequestListener(app.fetch));

        if (this.liveReload) {
            this.watcher = new FileChangeWatcher(
                [manifest.ui.assetRoot, manifest.api.fixturesDir],
                this.reloadState,
                {
                    intervalMs:
                        options.liveReloadIntervalMs ?? DEFAULT_LIVE_RELOAD_INTERVAL_MS,
                },
            );
        }
    }

    /**
     * Constructs a server and binds it, so {@link address} is known before
     * {@link start}.
     *
     * @throws \{FlashlessError\} `BIND_FAILED` when the address cannot be bound
     */
    static async create(
        manifest: Manifest,
        options: PreviewServerOptions = {},
    ): Promise<PreviewServer> {
        const server = new PreviewServer(manifest, options);
        await server.listen();
        return server;
    }

    /**
     * The bound address. The port is the OS-assigned one when `0` was requested.
     *
     * @throws \{Error\} When the server is not listening
     */
    get address(): ServerAddress {
        const address = this.server.address();
        if (address === null || typeof address === 'string') {
            throw new Error('Preview server is not listening.');
        }
        return { host: address.address, port: address.port };
    }

    get listening(): boolean {
        return this.server.listening;
    }

    /**
     * Binds the socket. Does nothing when already bound.
     *
     * @throws \{FlashlessError\} `BIND_FAILED` naming the host and port
     */
    async listen(): Promise<ServerAddress> {
        if (!this.server.listening) {
            await new Promise<void>((resolve, reject) => {
                const onError = (error: Error) => {
                    this.server.off('listening', onListening);
                    reject(createBindError(this.host, this.port, error));
                };
                const onListening = () => {
                    this.server.off('error', onError);
                    resolve();
                };
                this.server.once('error', onError);
                this.server.once('listening', onListening);
                this.server.listen(this.port, this.host);
            });
        }
        return this.address;
    }

    /**
     * Binds if needed and starts the file watcher. Calling it again does nothing.
     */
    async start(): Promise<void> {
        if (this.started) {
            return;
        }
        this.started = true;

        await this.listen();
        await this.watcher?.start();
    }

    /**
     * Stops the watcher, then closes the listener.
     *
     * Idle keep-alive connections are closed; open streams are left to end
     * with their clients. Each wait is bounded.
     */
    async stop(): Promise<void> {
        await this.watcher?.stop(SHUTDOWN_TIMEOUT_MS);

        if (this.server.listening) {
            const closed = new Promise<void>((resolve) => {
                this.server.close(() => resolve());
            });
            this.server.closeIdleConnections();

            let timer: NodeJS.Timeout | undefined;
            await Promise.race([
                closed,
                new Promise<void>((resolve) => {
                    timer = setTimeout(resolve, SHUTDOWN_TIMEOUT_MS);
                }),
            ]);
            clearTimeout(timer);
        }

        this.started = false;
        this.stopped.abort();
    }

    /**
     * Resolves once {@link stop} has run. Starts the server first if needed.
     */
    async serveForever(): Promise<void> {
        if (this.stopped.signal.aborted) {
            return;
        }
        await this.start();

        const signal = this.stopped.signal;
        await new Promise<void>((resolve) => {
            if (signal.aborted) {
                resolve();
                return;
            }
            signal.addEventListener('abort', () => resolve(), { once: true });
        });
    }
}
