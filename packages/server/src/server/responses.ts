/**
 * Response builders for fixtures, static assets and HTML with the reload
 * script.
 *
 * File bodies are streamed from an open handle in fixed-size chunks; only
 * HTML that gets the reload script is read into memory.
 *
 * @packageDocumentation
 */

import { open, readFile, type FileHandle } from 'fs/promises';
import { basename } from 'path';
import type { BigIntStats } from 'fs';
import { getMimeType } from 'hono/utils/mime';
import type { ApiMapping, CachePolicy } from '@flashless/manifest';
import { STREAM_CHUNK_SIZE } from '../constants.js';
import { liveReloadScript } from '../reload/script.js';

const FALLBACK_CONTENT_TYPE = 'application/octet-stream';

/** Statuses whose responses carry no body. */
const NULL_BODY_STATUSES = new Set([204, 205, 304]);

/**
 * Options shared by the file response builders.
 */
export interface FileResponseOptions {
    /** `false` for `HEAD`: headers are computed but no body is read. */
    includeBody: boolean;
}

export interface AssetResponseOptions extends FileResponseOptions {
    cachePolicy: CachePolicy;
    /** Reload stream path; when set, HTML gets the reload script appended. */
    reloadPath?: string;
}

interface OpenedFile {
    handle: FileHandle;
    stats: BigIntStats;
}

/**
 * Guesses a content type from a file name.
 *
 * @example
 * ```typescript
 * guessContentType('/dist/app.js'); // 'text/javascript; charset=utf-8'
 * guessContentType('/dist/blob.bin2'); // 'application/octet-stream'
 * ```
 */
export function guessContentType(filePath: string): string {
    return getMimeType(basename(filePath)) ?? FALLBACK_CONTENT_TYPE;
}

/**
 * Builds a weak ETag from modification time and size.
 */
export function weakEtag(stats: BigIntStats): string {
    return `W/"${stats.mtimeNs.toString(16)}-${stats.size.toString(16)}"`;
}

/**
 * Builds a JSON response with an exact Content-Length.
 */
export function jsonResponse(payload: unknown, status: number): Response {
    const body = new TextEncoder().encode(JSON.stringify(payload));
    return new Response(body, {
        status,
        headers: {
            'Content-Type': 'application/json',
            'Content-Length': String(body.byteLength),
        },
    });
}

export function notFoundResponse(path: string): Response {
    return jsonResponse({ error: 'Not found', path }, 404);
}

/**
 * Serves an API fixture with the mapping's status and headers.
 *
 * Content-Type comes from the mapping when it declares one (any case),
 * otherwise from the fixture's extension. Content-Length is always the
 * fixture's size; a declared one is ignored. Other headers pass through.
 *
 * A fixture missing at serve time answers 500 JSON.
 */
export async function fixtureResponse(
    mapping: ApiMapping,
    filePath: string,
    options: FileResponseOptions,
): Promise<Response> {
    if (mapping.status < 200 || mapping.status > 599) {
        return jsonResponse(
            { error: `Unsupported fixture status: ${mapping.status}` },
            500,
        );
    }

    const file = await openRegularFile(filePath);
    if (file === null) {
        return jsonResponse({ error: `Missing fixture: ${mapping.fixture}` }, 500);
    }

    const headers = new Headers();
    headers.set(
        'Content-Type',
        findHeader(mapping.headers, 'content-type') ?? guessContentType(filePath),
    );

    const hasBody = !NULL_BODY_STATUSES.has(mapping.status);
    if (hasBody) {
        headers.set('Content-Length', String(file.stats.size));
    }
    for (const [name, value] of Object.entries(mapping.headers)) {
        const lower = name.toLowerCase();
        if (lower !== 'content-type' && lower !== 'content-length') {
            headers.set(name, value);
        }
    }

    return new Response(
        await bodyFor(file, options.includeBody && hasBody),
        { status: mapping.status, headers },
    );
}

/**
 * Serves a static asset with cache headers.
 *
 * With a `reloadPath`, HTML is read whole, the reload script appended and
 * Content-Length recomputed; other files stream.
 *
 * @returns The response, or `null` when the file is gone
 */
export async function assetResponse(
    filePath: string,
    options: AssetResponseOptions,
): Promise<Response | null> {
    const contentType = guessContentType(filePath);
    const cacheControl = `public, max-age=${options.cachePolicy.maxAgeSeconds}`;

    if (options.reloadPath !== undefined && contentType.startsWith('text/html')) {
        return htmlWithReloadResponse(filePath, options.reloadPath, cacheControl);
    }

    const file = await openRegularFile(filePath);
    if (file === null) {
        return null;
    }

    const headers = new Headers({
        'Content-Type': contentType,
        'Content-Length': String(file.stats.size),
        'Cache-Control': cacheControl,
    });
    if (options.cachePolicy.etag) {
        headers.set('ETag', weakEtag(file.stats));
    }

    return new Response(await bodyFor(file, options.includeBody), {
        status: 200,
        headers,
    });
}

async function htmlWithReloadResponse(
    filePath: string,
    reloadPath: string,
    cacheControl: string,
): Promise<Response | null> {
    let html: string;
    try {
        html = await readFile(filePath, 'utf-8');
    } catch (error) {
        if (isMissingFileError(error)) {
            return null;
        }
        throw error;
    }

    const body = new TextEncoder().encode(html + liveReloadScript(reloadPath));
    return new Response(body, {
        status: 200,
        headers: {
            'Content-Type': 'text/html; charset=utf-8',
            'Content-Length': String(body.byteLength),
            'Cache-Control': cacheControl,
        },
    });
}

/**
 * Opens a regular file for reading.
 *
 * @returns The handle and its stats, or `null` when the path is missing or not a file
 */
async function openRegularFile(filePath: string): Promise<OpenedFile | null> {
    let handle: FileHandle;
    try {
        handle = await open(filePath, 'r');
    } catch (error) {
        if (isMissingFileError(error)) {
            return null;
        }
        throw error;
    }

    const stats = await handle.stat({ bigint: true });
    if (!stats.isFile()) {
        await handle.close();
        return null;
    }
    return { handle, stats };
}

async function bodyFor(
    file: OpenedFile,
    includeBody: boolean,
): Promise<ReadableStream<Uint8Array> | null> {
    if (!includeBody) {
        await file.handle.close();
        return null;
    }
    return createFileBody(file.handle);
}

/**
 * Streams an open file in {@link STREAM_CHUNK_SIZE} reads and closes it
 * at the end, on error or when the consumer cancels.
 */
function createFileBody(handle: FileHandle): ReadableStream<Uint8Array> {
    return new ReadableStream<Uint8Array>({
        async pull(controller) {
            try {
                const buffer = new Uint8Array(STREAM_CHUNK_SIZE);
                const { bytesRead } = await handle.read(
                    buffer,
                    0,
                    STREAM_CHUNK_SIZE,
                    null,
                );
                if (bytesRead === 0) {
                    controller.close();
                    await handle.close();
                    return;
                }
                controller.enqueue(buffer.subarray(0, bytesRead));
            } catch (error) {
                await handle.close();
                throw error;
            }
        },
        async cancel() {
            await handle.close();
        },
    });
}

function findHeader(
    headers: Readonly<Record<string, string>>,
    lowerName: string,
): string | undefined {
    for (const [name, value] of Object.entries(headers)) {
        if (name.toLowerCase() === lowerName) {
            return value;
        }
    }
    return undefined;
}

function isMissingFileError(error: unknown): boolean {
    return (
        error instanceof Error &&
        'code' in error &&
        (error.code === 'ENOENT' ||
            error.code === 'ENOTDIR' ||
            error.code === 'EISDIR')
    );
}
