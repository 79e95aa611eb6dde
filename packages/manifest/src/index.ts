/**
 * @module @flashless/manifest
 *
 * Loading, validation and parity checking for `flashless.manifest.json`.
 *
 * - {@link loadManifest} parses and validates a manifest into an immutable {@link Manifest}
 * - {@link validateParity} compares its declarations with the files on disk
 * - {@link safeJoin} / {@link resolveWithinRoot} keep request paths inside their root
 *
 * @example
 * ```typescript
 * import { discoverManifest, loadManifest, validateParity } from '@flashless/manifest';
 *
 * const manifestPath = await discoverManifest(projectDir);
 * const manifest = await loadManifest(manifestPath, projectDir);
 * const parity = await validateParity(manifest);
 * ```
 */

export type {
    ApiMapping,
    ApiMode,
    ApiSettings,
    CachePolicy,
    Manifest,
    UiSettings,
    ValidationResult,
    ValidationSettings,
} from '@flashless/types';

export * from './constants.js';
export * from './errors.js';
export { loadManifest, validateManifestPaths } from './loader.js';
export type { LoadManifestOptions } from './loader.js';
export { discoverManifest } from './discovery.js';
export {
    validateParity,
    createValidationResult,
    routeToAssetCandidate,
} from './parity.js';
export {
    normalizeBasePath,
    normalizeRoute,
    routeMatches,
    isWildcardRoute,
    WILDCARD_SUFFIX,
} from './routes.js';
export {
    safeJoin,
    resolveWithinRoot,
    resolveProjectPath,
    isWithinRoot,
    directoryExists,
    fileExists,
    pathExists,
} from './paths.js';
