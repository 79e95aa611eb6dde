/**
 * Parity checks between a manifest and the files on disk.
 *
 * The result is advisory: callers decide whether a non-empty result is
 * fatal (strict mode) or a warning. The server also uses the manifest's
 * routes for fallback decisions, so unresolved routes here predict 404s.
 *
 * @packageDocumentation
 */

import type { Manifest, ValidationResult } from '@flashless/types';
import { pathExists, resolveWithinRoot } from './paths.js';
import { isWildcardRoute } from './routes.js';

/**
 * Cross-checks a manifest against the filesystem.
 *
 * - Every required file must exist under the asset root
 * - Every mapping's fixture must exist under the fixtures directory
 * - Every non-wildcard route must resolve, either to a file named by its
 *   last segment or, with SPA fallback, to an existing entry file
 *
 * @param manifest - A loaded manifest
 * @returns Sorted, deduplicated lists of what is missing
 * @throws \{FlashlessError\} `PATH_ESCAPE` when a declared path leaves its root
 *
 * @example
 * ```typescript
 * const result = await validateParity(manifest);
 * if (result.hasErrors) {
 *     console.warn(result.missingFixtureFiles);
 * }
 * ```
 */
export async function validateParity(
    manifest: Manifest,
): Promise<ValidationResult> {
    const { ui, api, validation } = manifest;

    const missingRequired: string[] = [];
    for (const file of validation.requiredFiles) {
        if (!(await pathExists(await resolveWithinRoot(ui.assetRoot, file)))) {
            missingRequired.push(file);
        }
    }

    const missingFixtures: string[] = [];
    for (const mapping of api.mappings) {
        const fixturePath = await resolveWithinRoot(api.fixturesDir, mapping.fixture);
        if (!(await pathExists(fixturePath))) {
            missingFixtures.push(mapping.fixture);
        }
    }

    const entryExists = await pathExists(
        await resolveWithinRoot(ui.assetRoot, ui.entryFile),
    );

    const unresolvedRoutes: string[] = [];
    for (const route of ui.routes) {
        if (isWildcardRoute(route)) {
            continue;
        }

        const candidate = routeToAssetCandidate(route);
        if (
            candidate !== null &&
            (await pathExists(await resolveWithinRoot(ui.assetRoot, candidate)))
        ) {
            continue;
        }
        if (ui.spaFallback && entryExists) {
            continue;
        }
        unresolvedRoutes.push(route);
    }

    return createValidationResult(
        missingRequired,
        missingFixtures,
        unresolvedRoutes,
    );
}

/**
 * Builds a {@link ValidationResult}, deduplicating and sorting each list.
 */
export function createValidationResult(
    missingRequiredFiles: Iterable<string>,
    missingFixtureFiles: Iterable<string>,
    unresolvedRoutes: Iterable<string>,
): ValidationResult {
    const required = uniqueSorted(missingRequiredFiles);
    const fixtures = uniqueSorted(missingFixtureFiles);
    const routes = uniqueSorted(unresolvedRoutes);

    return Object.freeze({
        missingRequiredFiles: required,
        missingFixtureFiles: fixtures,
        unresolvedRoutes: routes,
        hasErrors: required.length > 0 || fixtures.length > 0 || routes.length > 0,
    });
}

/**
 * Maps a route to the asset it names, when its last segment looks like a
 * file name (`/manifest.json` → `manifest.json`).
 *
 * @returns The relative asset path, or `null` for directory-like routes
 */
export function routeToAssetCandidate(route: string): string | null {
    const value = route.replace(/^\/+/, '');
    if (value === '') {
        return null;
    }

    const lastSegment = value.slice(value.lastIndexOf('/') + 1);
    return lastSegment.includes('.') ? value : null;
}

function uniqueSorted(values: Iterable<string>): readonly string[] {
    return Object.freeze([...new Set(values)].sort());
}
