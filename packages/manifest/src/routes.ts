/**
 * Route normalization and matching.
 *
 * Routes are normalized once while the manifest loads, so matching at
 * request time is plain string comparison.
 *
 * @packageDocumentation
 */

/** Suffix marking a prefix route pattern. */
export const WILDCARD_SUFFIX = '/*';

/**
 * Normalizes a UI base path.
 *
 * - Adds a leading slash if missing
 * - Collapses leading and trailing slashes
 * - Keeps the root path `/` as is
 *
 * @param value - Raw base path from the manifest
 * @returns Normalized base path
 *
 * @example
 * ```typescript
 * normalizeBasePath('ui/'); // '/ui'
 * normalizeBasePath('//ui//'); // '/ui'
 * normalizeBasePath('/'); // '/'
 * ```
 */
export function normalizeBasePath(value: string): string {
    const trimmed = value.trim();
    if (trimmed === '/') {
        return '/';
    }
    return '/' + trimmed.replace(/^\/+/, '').replace(/\/+$/, '');
}

/**
 * Normalizes a route pattern or API path.
 *
 * - Adds a leading slash if missing
 * - Removes a single trailing slash, except for `/` and wildcard patterns
 *
 * @param route - Raw route from the manifest
 * @returns Normalized route
 *
 * @example
 * ```typescript
 * normalizeRoute('settings/'); // '/settings'
 * normalizeRoute('wifi/*'); // '/wifi/*'
 * normalizeRoute('/'); // '/'
 * ```
 */
export function normalizeRoute(route: string): string {
    const trimmed = route.trim();
    if (trimmed === '/') {
        return '/';
    }

    let normalized = '/' + trimmed.replace(/^\/+/, '');
    if (
        normalized !== '/' &&
        normalized.endsWith('/') &&
        !normalized.endsWith(WILDCARD_SUFFIX)
    ) {
        normalized = normalized.slice(0, -1);
    }
    return normalized;
}

/**
 * Checks whether a route pattern is a prefix (wildcard) pattern.
 */
export function isWildcardRoute(pattern: string): boolean {
    return pattern.endsWith(WILDCARD_SUFFIX);
}

/**
 * Checks if a route matches a normalized route pattern.
 *
 * Exact patterns match by string equality. Patterns ending in `/*` match
 * any route that starts with the pattern minus its `*`.
 *
 * @param pattern - Normalized route pattern
 * @param route - Route relative to the UI base path
 * @returns `true` if the route matches
 *
 * @example
 * ```typescript
 * routeMatches('/wifi/*', '/wifi/scan'); // true
 * routeMatches('/wifi/*', '/network/scan'); // false
 * routeMatches('/a', '/a/b'); // false
 * ```
 */
export function routeMatches(pattern: string, route: string): boolean {
    if (pattern === route) {
        return true;
    }
    if (isWildcardRoute(pattern)) {
        return route.startsWith(pattern.slice(0, -1));
    }
    return false;
}
