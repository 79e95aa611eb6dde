/**
 * Preview orchestration for the `run` command.
 *
 * @packageDocumentation
 */

import { resolve } from 'path';
import pc from 'picocolors';
import {
    FlashlessError,
    FlashlessErrorCode,
    createStrictValidationError,
    discoverManifest,
    loadManifest,
    validateParity,
    type Manifest,
    type ValidationResult,
} from '@flashless/manifest';
import { PreviewServer } from '@flashless/server';
import { writeReport } from './report.js';
import { PREFIX, formatValidationWarnings, printError } from './messages.js';
import type { PreviewOptions } from './types.js';

/**
 * A bound, not yet started, preview.
 */
export interface PreparedPreview {
    manifest: Manifest;
    validation: ValidationResult;
    server: PreviewServer;
    reportPath: string;
    url: string;
}

const WILDCARD_HOSTS = new Set(['0.0.0.0', '::']);

/**
 * The URL to open for a bound preview. Wildcard hosts print as `127.0.0.1`.
 *
 * @example
 * ```typescript
 * previewUrl('0.0.0.0', 8787, '/ui'); // 'http://127.0.0.1:8787/ui'
 * ```
 */
export function previewUrl(host: string, port: number, basePath: string): string {
    let printable = WILDCARD_HOSTS.has(host) ? '127.0.0.1' : host;
    if (printable.includes(':')) {
        printable = `[${printable}]`;
    }
    const base = basePath.startsWith('/') ? basePath : `/${basePath}`;
    return `http://${printable}:${port}${base}`;
}

/**
 * Loads and validates the manifest, binds the server and writes the report.
 *
 * The server is bound but its watcher is not started; call `serveForever()`
 * or `start()` on it.
 *
 * @throws \{FlashlessError\} `UNSUPPORTED_MODE` for any mode but `mock`,
 * `STRICT_VALIDATION_FAILED` in strict mode, and any loader or bind error
 */
export async function preparePreview(options: PreviewOptions): Promise<PreparedPreview> {
    if (options.mode !== 'mock') {
        throw new FlashlessError(
            FlashlessErrorCode.UNSUPPORTED_MODE,
            "Only '--mode mock' is supported.",
        );
    }

    const projectDir = resolve(options.projectDir);
    const buildDir = resolve(projectDir, options.buildDir);

    const manifestPath = await discoverManifest(projectDir, options.manifest);
    const manifest = await loadManifest(manifestPath, projectDir, {
        fixturesOverride: options.fixtures,
        allowAbsolutePaths: options.allowAbsolutePaths,
    });

    const validation = await validateParity(manifest);
    if (options.strict && validation.hasErrors) {
        throw createStrictValidationError(validation);
    }

    const server = await PreviewServer.create(manifest, {
        host: options.host,
        port: options.port,
        requestLog: options.requestLog,
        liveReload: options.liveReload,
        liveReloadIntervalMs: options.liveReloadInterval,
    });

    const { host, port } = server.address;
    let reportPath: string;
    try {
        reportPath = await writeReport({
            buildDir,
            manifest,
            validation,
            host,
            port,
            mode: options.mode,
        });
    } catch (error) {
        await server.stop();
        throw error;
    }

    return {
        manifest,
        validation,
        server,
        reportPath,
        url: previewUrl(host, port, manifest.ui.basePath),
    };
}

/**
 * Runs a preview until SIGINT, SIGTERM or, when given, `signal` aborts.
 */
export async function runPreview(
    options: PreviewOptions,
    signal?: AbortSignal,
): Promise<void> {
    const { manifest, validation, server, reportPath, url } =
        await preparePreview(options);

    console.log(`${PREFIX} Manifest: ${manifest.sourcePath}`);
    console.log(`${PREFIX} Report:   ${reportPath}`);
    for (const line of formatValidationWarnings(validation)) {
        console.log(pc.yellow(line));
    }
    console.log(`${PREFIX} Preview running at ${pc.cyan(url)}`);
    console.log(pc.gray(`${PREFIX} Press ${pc.bold('Ctrl+C')} to stop.`));

    const detach = () => {
        process.off('SIGINT', shutdown);
        process.off('SIGTERM', shutdown);
        signal?.removeEventListener('abort', shutdown);
    };
    function shutdown() {
        detach();
        console.log(`\n${PREFIX} Stopped.`);
        server.stop().catch((error: unknown) => {
            printError(error instanceof Error ? error.message : String(error));
        });
    }

    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
    signal?.addEventListener('abort', shutdown);
    if (signal?.aborted) {
        shutdown();
    }

    try {
        await server.serveForever();
    } finally {
        detach();
        await server.stop();
    }
}
