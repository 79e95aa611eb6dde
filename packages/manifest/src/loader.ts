/**
 * Manifest loading and validation.
 *
 * Reads a `flashless.manifest.json`, validates every field with a
 * field-qualified error, applies defaults, resolves directories against the
 * project and checks that the asset root exists.
 *
 * @packageDocumentation
 */

import { readFile } from 'fs/promises';
import { isAbsolute, resolve } from 'path';
import type {
    ApiMapping,
    ApiMode,
    ApiSettings,
    CachePolicy,
    Manifest,
    UiSettings,
    ValidationSettings,
} from '@flashless/types';
import {
    ALLOW_ABSOLUTE_PATHS_FLAG,
    DEFAULT_BASE_PATH,
    DEFAULT_CACHE_POLICY,
    DEFAULT_ENTRY_FILE,
    DEFAULT_FIXTURES_DIR,
    DEFAULT_FIXTURE_STATUS,
    DEFAULT_ROUTES,
    DEFAULT_SPA_FALLBACK,
    SUPPORTED_MANIFEST_VERSION,
} from './constants.js';
import { FlashlessError, FlashlessErrorCode, createFieldError } from './errors.js';
import {
    isRawObject,
    readArray,
    readBoolean,
    readHeaders,
    readInteger,
    readObject,
    readString,
    readStringList,
    type RawManifest,
    type RawObject,
} from './fields.js';
import { directoryExists, resolveProjectPath } from './paths.js';
import { normalizeBasePath, normalizeRoute } from './routes.js';

/**
 * Options for {@link loadManifest}.
 */
export interface LoadManifestOptions {
    /**
     * Fixtures directory that replaces the manifest's own `api.fixturesDir`.
     * Resolved against the project directory; not subject to the
     * absolute-path restriction.
     */
    fixturesOverride?: string;

    /**
     * Accept absolute `ui.assetRoot` / `api.fixturesDir` values.
     * @defaultValue false
     */
    allowAbsolutePaths?: boolean;
}

interface ParseContext {
    sourcePath: string;
    projectDir: string;
    allowAbsolutePaths: boolean;
    fixturesOverride?: string;
}

/**
 * Loads and validates a manifest file.
 *
 * @param manifestPath - Path to the manifest JSON file
 * @param projectDir - Directory relative manifest paths are resolved against
 * @param options - Fixtures override and absolute-path policy
 * @returns The validated, immutable manifest
 * @throws \{FlashlessError\} On unreadable files, malformed JSON, any invalid field, or a missing asset root
 *
 * @example
 * ```typescript
 * const manifest = await loadManifest(
 *     './flashless.manifest.json',
 *     process.cwd(),
 * );
 * console.log(manifest.ui.assetRoot);
 * ```
 */
export async function loadManifest(
    manifestPath: string,
    projectDir: string,
    options: LoadManifestOptions = {},
): Promise<Manifest> {
    const sourcePath = resolve(manifestPath);

    let content: string;
    try {
        content = await readFile(sourcePath, 'utf-8');
    } catch (error) {
        throw new FlashlessError(
            FlashlessErrorCode.MANIFEST_NOT_FOUND,
            `Manifest file not found: ${sourcePath}`,
            undefined,
            error instanceof Error ? error : undefined,
        );
    }

    let raw: unknown;
    try {
        raw = JSON.parse(content);
    } catch (error) {
        const detail = error instanceof Error ? error.message : String(error);
        throw new FlashlessError(
            FlashlessErrorCode.INVALID_JSON,
            `Manifest is not valid JSON: ${sourcePath}: ${detail}`,
        );
    }

    const manifest = await parseManifest(raw, {
        sourcePath,
        projectDir: resolve(projectDir),
        allowAbsolutePaths: options.allowAbsolutePaths ?? false,
        fixturesOverride: options.fixturesOverride,
    });
    await validateManifestPaths(manifest);
    return Object.freeze(manifest);
}

/**
 * Checks the paths a server cannot run without.
 *
 * Only the asset root is fatal; fixtures are reported by the parity check.
 *
 * @throws \{FlashlessError\} `ASSET_ROOT_MISSING` when the asset root is not a directory
 */
export async function validateManifestPaths(manifest: Manifest): Promise<void> {
    if (!(await directoryExists(manifest.ui.assetRoot))) {
        throw new FlashlessError(
            FlashlessErrorCode.ASSET_ROOT_MISSING,
            `Asset root does not exist or is not a directory: ${manifest.ui.assetRoot}. ` +
                'Run your frontend build or update ui.assetRoot in the manifest.',
            'ui.assetRoot',
        );
    }
}

// ============================================================================
// SECTION PARSERS
// ============================================================================

async function parseManifest(
    raw: unknown,
    context: ParseContext,
): Promise<Manifest> {
    if (!isRawObject(raw)) {
        throw new FlashlessError(
            FlashlessErrorCode.INVALID_ROOT,
            'Manifest root must be a JSON object.',
        );
    }
    const document: RawManifest = raw;

    if (document.version !== SUPPORTED_MANIFEST_VERSION) {
        throw createFieldError(
            FlashlessErrorCode.INVALID_VERSION,
            'version',
            `must be the string '${SUPPORTED_MANIFEST_VERSION}'.`,
        );
    }

    const uiRaw = readObject(document, 'ui', 'ui', true) ?? {};
    const apiRaw = readObject(document, 'api', 'api', false);
    const validationRaw = readObject(document, 'validation', 'validation', false);

    const ui = await parseUi(uiRaw, context);
    const api = await parseApi(apiRaw, context);
    const validation = parseValidation(validationRaw, ui.entryFile);

    return {
        sourcePath: context.sourcePath,
        version: SUPPORTED_MANIFEST_VERSION,
        ui,
        api,
        validation,
    };
}

async function parseUi(raw: RawObject, context: ParseContext): Promise<UiSettings> {
    const basePath = normalizeBasePath(
        readString(raw.basePath, 'ui.basePath', DEFAULT_BASE_PATH),
    );
    const assetRoot = await resolveManifestDir(
        readString(raw.assetRoot, 'ui.assetRoot'),
        'ui.assetRoot',
        context,
    );
    const entryFile = readString(raw.entryFile, 'ui.entryFile', DEFAULT_ENTRY_FILE);
    const routes =
        raw.routes === undefined
            ? [...DEFAULT_ROUTES]
            : readStringList(raw.routes, 'ui.routes').map(normalizeRoute);
    const spaFallback = readBoolean(
        raw.spaFallback,
        'ui.spaFallback',
        DEFAULT_SPA_FALLBACK,
    );

    return {
        basePath,
        assetRoot,
        entryFile,
        routes: Object.freeze(routes),
        spaFallback,
        cachePolicy: parseCachePolicy(
            readObject(raw, 'cachePolicy', 'ui.cachePolicy', false) ?? {},
        ),
    };
}

function parseCachePolicy(raw: RawObject): CachePolicy {
    return {
        maxAgeSeconds: readInteger(
            raw.maxAgeSeconds,
            'ui.cachePolicy.maxAgeSeconds',
            DEFAULT_CACHE_POLICY.maxAgeSeconds,
            0,
        ),
        etag: readBoolean(raw.etag, 'ui.cachePolicy.etag', DEFAULT_CACHE_POLICY.etag),
        gzip: readBoolean(raw.gzip, 'ui.cachePolicy.gzip', DEFAULT_CACHE_POLICY.gzip),
    };
}

async function parseApi(
    raw: RawObject | undefined,
    context: ParseContext,
): Promise<ApiSettings> {
    let mode: ApiMode = 'mock';
    let mappings: ApiMapping[] = [];
    let fixturesDir: string;

    if (raw) {
        mode = parseMode(readString(raw.mode, 'api.mode', 'mock'));
        fixturesDir = await resolveManifestDir(
            readString(raw.fixturesDir, 'api.fixturesDir', DEFAULT_FIXTURES_DIR),
            'api.fixturesDir',
            context,
        );
        mappings = readArray(raw.map ?? [], 'api.map').map(parseMapping);
    } else {
        fixturesDir = await resolveProjectPath(
            context.projectDir,
            DEFAULT_FIXTURES_DIR,
        );
    }

    if (context.fixturesOverride) {
        fixturesDir = await resolveProjectPath(
            context.projectDir,
            context.fixturesOverride,
        );
    }

    return { mode, fixturesDir, mappings: Object.freeze(mappings) };
}

function parseMode(value: string): ApiMode {
    const mode = value.toLowerCase();
    if (mode === 'mock' || mode === 'proxy') {
        return mode;
    }
    throw createFieldError(
        FlashlessErrorCode.INVALID_VALUE,
        'api.mode',
        "must be either 'mock' or 'proxy'.",
    );
}

function parseMapping(raw: unknown, index: number): ApiMapping {
    const field = `api.map[${index}]`;
    if (!isRawObject(raw)) {
        throw createFieldError(
            FlashlessErrorCode.INVALID_TYPE,
            field,
            'must be an object.',
        );
    }

    return {
        method: readString(raw.method, `${field}.method`).toUpperCase(),
        path: normalizeRoute(readString(raw.path, `${field}.path`)),
        fixture: readString(raw.fixture, `${field}.fixture`),
        status: readInteger(
            raw.status,
            `${field}.status`,
            DEFAULT_FIXTURE_STATUS,
            100,
        ),
        headers: Object.freeze(readHeaders(raw.headers, `${field}.headers`)),
    };
}

function parseValidation(
    raw: RawObject | undefined,
    entryFile: string,
): ValidationSettings {
    if (!raw) {
        return { requiredFiles: [entryFile], disallowExtraRoutes: false };
    }

    return {
        requiredFiles: Object.freeze(
            raw.requiredFiles === undefined
                ? [entryFile]
                : readStringList(raw.requiredFiles, 'validation.requiredFiles'),
        ),
        disallowExtraRoutes: readBoolean(
            raw.disallowExtraRoutes,
            'validation.disallowExtraRoutes',
            false,
        ),
    };
}

/**
 * Resolves a directory named in the manifest, enforcing the absolute-path
 * policy.
 */
async function resolveManifestDir(
    value: string,
    field: string,
    context: ParseContext,
): Promise<string> {
    if (isAbsolute(value) && !context.allowAbsolutePaths) {
        throw new FlashlessError(
            FlashlessErrorCode.ABSOLUTE_PATH_NOT_ALLOWED,
            `Manifest field '${field}' is an absolute path (${value}). ` +
                `Use a path relative to the project directory, or pass ${ALLOW_ABSOLUTE_PATHS_FLAG} to allow it.`,
            field,
        );
    }
    return resolveProjectPath(context.projectDir, value);
}
