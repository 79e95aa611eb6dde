/**
 * Polling file watcher.
 *
 * Every interval the watch roots are walked and each regular file's
 * modification time and size recorded. Any difference from the previous
 * snapshot bumps the {@link ReloadState}.
 *
 * @packageDocumentation
 */

import type { BigIntStats, Dirent } from 'fs';
import { readdir, stat } from 'fs/promises';
import { join } from 'path';
import pc from 'picocolors';
import {
    DEFAULT_LIVE_RELOAD_INTERVAL_MS,
    SHUTDOWN_TIMEOUT_MS,
} from '../constants.js';
import type { ReloadState } from './state.js';

/**
 * Path → `"<mtimeNs>:<size>"` for every regular file under the watch roots.
 */
export type FileSnapshot = Map<string, string>;

export interface FileChangeWatcherOptions {
    /** Milliseconds between snapshots. */
    intervalMs?: number;
}

/**
 * Watches directories by snapshot comparison and bumps a reload state on
 * change.
 *
 * @example
 * ```typescript
 * const watcher = new FileChangeWatcher([assetRoot, fixturesDir], state, {
 *     intervalMs: 500,
 * });
 * await watcher.start();
 * // ...
 * await watcher.stop();
 * ```
 */
export class FileChangeWatcher {
    private readonly intervalMs: number;
    private controller?: AbortController;
    private baseline?: Promise<FileSnapshot>;
    private loop?: Promise<void>;

    constructor(
        private readonly roots: readonly string[],
        private readonly state: ReloadState,
        options: FileChangeWatcherOptions = {},
    ) {
        this.intervalMs = options.intervalMs ?? DEFAULT_LIVE_RELOAD_INTERVAL_MS;
    }

    get running(): boolean {
        return this.loop !== undefined;
    }

    /**
     * Takes the baseline snapshot, then keeps watching in the background.
     * Resolves once the baseline is recorded; calling it again while
     * running does nothing.
     */
    async start(): Promise<void> {
        if (this.loop) {
            await this.baseline;
            return;
        }

        const controller = new AbortController();
        this.controller = controller;
        const baseline = snapshotFiles(this.roots);
        this.baseline = baseline;
        this.loop = baseline
            .then((snapshot) => this.watch(snapshot, controller.signal))
            .catch((error: unknown) => {
                const message =
                    error instanceof Error ? error.message : String(error);
                console.error(
                    pc.red(`  [flashless] file watcher stopped: ${message}`),
                );
            });
        await baseline;
    }

    /**
     * Signals the loop to stop and waits for it, at most `timeoutMs`.
     */
    async stop(timeoutMs = SHUTDOWN_TIMEOUT_MS): Promise<void> {
        const loop = this.loop;
        if (!loop) {
            return;
        }

        this.controller?.abort();
        let timer: NodeJS.Timeout | undefined;
        await Promise.race([
            loop,
            new Promise<void>((resolve) => {
                timer = setTimeout(resolve, timeoutMs);
            }),
        ]);
        clearTimeout(timer);

        this.loop = undefined;
        this.baseline = undefined;
        this.controller = undefined;
    }

    private async watch(
        baseline: FileSnapshot,
        signal: AbortSignal,
    ): Promise<void> {
        let snapshot = baseline;

        while (await waitInterval(this.intervalMs, signal)) {
            const next = await snapshotFiles(this.roots);
            if (!snapshotsEqual(snapshot, next)) {
                snapshot = next;
                this.state.bump();
            }
        }
    }
}

/**
 * Records every regular file under `roots`.
 *
 * Roots that do not exist are skipped, as are entries that disappear or
 * become unreadable between listing and stat. Symlinked directories are not
 * followed.
 */
export async function snapshotFiles(
    roots: readonly string[],
): Promise<FileSnapshot> {
    const snapshot: FileSnapshot = new Map();
    for (const root of roots) {
        await walk(root, snapshot);
    }
    return snapshot;
}

export function snapshotsEqual(a: FileSnapshot, b: FileSnapshot): boolean {
    if (a.size !== b.size) {
        return false;
    }
    for (const [path, signature] of a) {
        if (b.get(path) !== signature) {
            return false;
        }
    }
    return true;
}

async function walk(dir: string, snapshot: FileSnapshot): Promise<void> {
    let entries: Dirent[];
    try {
        entries = await readdir(dir, { withFileTypes: true });
    } catch (error) {
        if (isVanishedEntryError(error)) {
            return;
        }
        throw error;
    }

    for (const entry of entries) {
        const entryPath = join(dir, entry.name);
        if (entry.isDirectory()) {
            await walk(entryPath, snapshot);
            continue;
        }

        let stats: BigIntStats;
        try {
            stats = await stat(entryPath, { bigint: true });
        } catch (error) {
            if (isVanishedEntryError(error)) {
                continue;
            }
            throw error;
        }
        if (stats.isFile()) {
            snapshot.set(entryPath, `${stats.mtimeNs}:${stats.size}`);
        }
    }
}

/** Resolves `true` after `ms`, or `false` as soon as `signal` aborts. */
function waitInterval(ms: number, signal: AbortSignal): Promise<boolean> {
    if (signal.aborted) {
        return Promise.resolve(false);
    }

    return new Promise((resolve) => {
        const onAbort = () => {
            clearTimeout(timer);
            resolve(false);
        };
        const timer = setTimeout(() => {
            signal.removeEventListener('abort', onAbort);
            resolve(true);
        }, ms);
        signal.addEventListener('abort', onAbort, { once: true });
    });
}

function isVanishedEntryError(error: unknown): boolean {
    return (
        error instanceof Error &&
        'code' in error &&
        (error.code === 'ENOENT' ||
            error.code === 'ENOTDIR' ||
            error.code === 'EACCES' ||
            error.code === 'EPERM' ||
            error.code === 'ELOOP')
    );
}
