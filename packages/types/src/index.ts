/**
 * `@flashless/types` - Shared type definitions for flashless packages.
 *
 * The manifest model produced by `@flashless/manifest`, the parity result it
 * derives, and the error codes every package raises.
 *
 * @packageDocumentation
 */

// ============================================================================
// ERROR CODES
// ============================================================================

/**
 * Error codes for configuration and validation failures.
 *
 * @example
 * ```typescript
 * import { FlashlessErrorCode } from '@flashless/types';
 *
 * if (error.code === FlashlessErrorCode.ABSOLUTE_PATH_NOT_ALLOWED) {
 *     console.log('Re-run with --allow-absolute-paths');
 * }
 * ```
 */
export const FlashlessErrorCode = {
    // Manifest file errors
    MANIFEST_NOT_FOUND: 'MANIFEST_NOT_FOUND',
    INVALID_JSON: 'INVALID_JSON',
    INVALID_ROOT: 'INVALID_ROOT',
    INVALID_VERSION: 'INVALID_VERSION',

    // Field errors
    MISSING_FIELD: 'MISSING_FIELD',
    INVALID_TYPE: 'INVALID_TYPE',
    INVALID_VALUE: 'INVALID_VALUE',
    OUT_OF_RANGE: 'OUT_OF_RANGE',

    // Filesystem errors
    ABSOLUTE_PATH_NOT_ALLOWED: 'ABSOLUTE_PATH_NOT_ALLOWED',
    ASSET_ROOT_MISSING: 'ASSET_ROOT_MISSING',
    PATH_ESCAPE: 'PATH_ESCAPE',
    FILE_EXISTS: 'FILE_EXISTS',

    // Runtime errors
    BIND_FAILED: 'BIND_FAILED',
    UNSUPPORTED_MODE: 'UNSUPPORTED_MODE',
    STRICT_VALIDATION_FAILED: 'STRICT_VALIDATION_FAILED',
} as const;

export type FlashlessErrorCode =
    (typeof FlashlessErrorCode)[keyof typeof FlashlessErrorCode];

// ============================================================================
// MANIFEST MODEL
// ============================================================================

/** API handling mode. Only `mock` is served; `proxy` is parsed and rejected by callers. */
export type ApiMode = 'mock' | 'proxy';

/**
 * Caching headers applied to static assets.
 */
export interface CachePolicy {
    /** Value of `max-age` in the `Cache-Control` header. */
    readonly maxAgeSeconds: number;
    /** Whether to send a weak ETag built from modification time and size. */
    readonly etag: boolean;
    /** Reserved. Parsed and reported but not applied by the server. */
    readonly gzip: boolean;
}

/**
 * Settings for the frontend assets.
 */
export interface UiSettings {
    /** URL prefix the UI is mounted under. Always starts with `/`, no trailing slash unless `/`. */
    readonly basePath: string;
    /** Absolute, symlink-resolved directory holding the built frontend. */
    readonly assetRoot: string;
    /** File served for the root route and for SPA fallback. */
    readonly entryFile: string;
    /** Normalized route patterns, exact (`/settings`) or prefix (`/wifi/*`). */
    readonly routes: readonly string[];
    /** Serve the entry file for routes that match no asset. */
    readonly spaFallback: boolean;
    readonly cachePolicy: CachePolicy;
}

/**
 * One mocked API endpoint.
 */
export interface ApiMapping {
    /** Uppercased HTTP method. */
    readonly method: string;
    /** Normalized request path. Matched exactly, no wildcards. */
    readonly path: string;
    /** File name relative to the fixtures directory. */
    readonly fixture: string;
    /** HTTP status returned with the fixture. */
    readonly status: number;
    /** Extra response headers, names kept as written. */
    readonly headers: Readonly<Record<string, string>>;
}

export interface ApiSettings {
    readonly mode: ApiMode;
    /** Absolute directory fixtures are read from. */
    readonly fixturesDir: string;
    readonly mappings: readonly ApiMapping[];
}

export interface ValidationSettings {
    /** Paths relative to the asset root that must exist. */
    readonly requiredFiles: readonly string[];
    /** When true, only declared routes may fall back to the entry file. */
    readonly disallowExtraRoutes: boolean;
}

/**
 * A loaded, validated manifest. Immutable for the lifetime of a server.
 */
export interface Manifest {
    /** Absolute path of the manifest file this was loaded from. */
    readonly sourcePath: string;
    /** Schema version. Always `'1'`. */
    readonly version: '1';
    readonly ui: UiSettings;
    readonly api: ApiSettings;
    readonly validation: ValidationSettings;
}

// ============================================================================
// PARITY
// ============================================================================

/**
 * Outcome of cross-checking a manifest against the filesystem.
 *
 * Each list is deduplicated and sorted.
 */
export interface ValidationResult {
    readonly missingRequiredFiles: readonly string[];
    readonly missingFixtureFiles: readonly string[];
    readonly unresolvedRoutes: readonly string[];
    /** True when any of the lists is non-empty. */
    readonly hasErrors: boolean;
}

// ============================================================================
// SERVER
// ============================================================================

/**
 * Which completed requests are written to the console.
 *
 * - `none` never logs
 * - `errors` logs status >= 400 and requests whose status is unknown
 * - `all` logs every request
 */
export type RequestLogLevel = 'none' | 'errors' | 'all';

export const REQUEST_LOG_LEVELS: readonly RequestLogLevel[] = [
    'none',
    'errors',
    'all',
];
