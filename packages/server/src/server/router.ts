/**
 * Request routing for the preview server.
 *
 * A {@link PreviewRouter} is built once per server from the manifest and
 * holds only read-only lookup structures. {@link PreviewRouter.resolve}
 * applies the dispatch precedence and returns what to serve; building the
 * response is left to the app.
 *
 * @packageDocumentation
 */

import { extname, posix } from 'path';
import {
    FlashlessErrorCode,
    fileExists,
    isFlashlessError,
    resolveWithinRoot,
    routeMatches,
    type ApiMapping,
    type Manifest,
} from '@flashless/manifest';
import { DISPATCHED_METHODS, LIVE_RELOAD_ENDPOINT } from '../constants.js';

/**
 * The outcome of routing one request.
 */
export type RouteDecision =
    | { kind: 'reload' }
    | { kind: 'fixture'; mapping: ApiMapping; filePath: string }
    | { kind: 'static'; filePath: string }
    | { kind: 'entry'; filePath: string }
    | { kind: 'not-found'; path: string }
    | { kind: 'unsupported-method'; method: string };

export interface PreviewRouterOptions {
    /** Whether the reload endpoint is routed. */
    liveReload: boolean;
}

/**
 * Maps requests to fixtures, static files or the SPA entry file.
 *
 * Precedence:
 * 1. `GET <basePath>/__flashless/reload` when live reload is on
 * 2. An exact `(method, path)` API mapping
 * 3. 404 for paths outside the base path
 * 4. An existing file under the asset root (the entry file for `/`,
 *    then the literal path, then the path plus `.html` when it has no extension)
 * 5. The entry file, when the route is declared or SPA fallback is open
 * 6. 404
 *
 * @example
 * ```typescript
 * const router = new PreviewRouter(manifest, { liveReload: true });
 * const decision = await router.resolve('GET', '/settings');
 * if (decision.kind === 'entry') {
 *     // serve decision.filePath
 * }
 * ```
 */
export class PreviewRouter {
    /** The reload stream path, joined under the base path. */
    readonly reloadPath: string;

    private readonly apiMap: ReadonlyMap<string, ApiMapping>;

    constructor(
        private readonly manifest: Manifest,
        private readonly options: PreviewRouterOptions,
    ) {
        this.reloadPath = joinBasePath(manifest.ui.basePath, LIVE_RELOAD_ENDPOINT);
        this.apiMap = new Map(
            manifest.api.mappings.map((mapping) => [
                mappingKey(mapping.method, mapping.path),
                mapping,
            ]),
        );
    }

    /**
     * Routes a request.
     *
     * @param method - HTTP method; `HEAD` routes as `GET`
     * @param rawPath - URL path as received, still percent-encoded
     */
    async resolve(method: string, rawPath: string): Promise<RouteDecision> {
        const upperMethod = method.toUpperCase();
        if (!DISPATCHED_METHODS.includes(upperMethod)) {
            return { kind: 'unsupported-method', method: upperMethod };
        }
        const routeMethod = upperMethod === 'HEAD' ? 'GET' : upperMethod;

        const requestPath = decodeRequestPath(rawPath);
        if (requestPath === null) {
            return { kind: 'not-found', path: rawPath };
        }

        if (
            this.options.liveReload &&
            routeMethod === 'GET' &&
            requestPath === this.reloadPath
        ) {
            return { kind: 'reload' };
        }

        const mapping = this.apiMap.get(mappingKey(routeMethod, requestPath));
        if (mapping) {
            const filePath = await this.resolveInside(
                this.manifest.api.fixturesDir,
                mapping.fixture,
            );
            if (filePath === null) {
                return { kind: 'not-found', path: requestPath };
            }
            return { kind: 'fixture', mapping, filePath };
        }

        const { basePath, routes, spaFallback, assetRoot, entryFile } =
            this.manifest.ui;
        const route = relativeToBase(requestPath, basePath);
        if (route === null) {
            return { kind: 'not-found', path: requestPath };
        }

        const staticFile = await this.resolveStatic(route);
        if (staticFile !== null) {
            return { kind: 'static', filePath: staticFile };
        }

        const declared = routes.some((pattern) => routeMatches(pattern, route));
        if (
            declared ||
            (spaFallback && !this.manifest.validation.disallowExtraRoutes)
        ) {
            const entry = await this.resolveInside(assetRoot, entryFile);
            if (entry !== null && (await fileExists(entry))) {
                return { kind: 'entry', filePath: entry };
            }
        }

        return { kind: 'not-found', path: requestPath };
    }

    private async resolveStatic(route: string): Promise<string | null> {
        const { assetRoot, entryFile } = this.manifest.ui;

        if (route === '' || route === '/') {
            const entry = await this.resolveInside(assetRoot, entryFile);
            return entry !== null && (await fileExists(entry)) ? entry : null;
        }

        const relative = route.replace(/^\/+/, '');
        const literal = await this.resolveRequested(assetRoot, relative);
        if (literal !== null && (await fileExists(literal))) {
            return literal;
        }

        if (extname(relative) === '') {
            const html = await this.resolveRequested(assetRoot, `${relative}.html`);
            if (html !== null && (await fileExists(html))) {
                return html;
            }
        }
        return null;
    }

    /** Joins under `root`, mapping a path escape to `null` (served as 404). */
    private async resolveInside(
        root: string,
        relative: string,
    ): Promise<string | null> {
        try {
            return await resolveWithinRoot(root, relative);
        } catch (error) {
            if (
                isFlashlessError(error) &&
                error.code === FlashlessErrorCode.PATH_ESCAPE
            ) {
                return null;
            }
            throw error;
        }
    }

    /** Joins a request-derived segment under `root`; a segment that fails to resolve is not served. */
    private async resolveRequested(
        root: string,
        relative: string,
    ): Promise<string | null> {
        try {
            return await resolveWithinRoot(root, relative);
        } catch {
            return null;
        }
    }
}

/**
 * Joins a path under a base path.
 *
 * @example
 * ```typescript
 * joinBasePath('/', '/__flashless/reload'); // '/__flashless/reload'
 * joinBasePath('/ui', '/__flashless/reload'); // '/ui/__flashless/reload'
 * ```
 */
export function joinBasePath(basePath: string, path: string): string {
    const base = basePath.replace(/\/+$/, '');
    const route = path.startsWith('/') ? path : `/${path}`;
    return `${base}${route}`;
}

/**
 * Returns the route below `basePath`, or `null` when the path lies outside it.
 */
export function relativeToBase(requestPath: string, basePath: string): string | null {
    if (basePath === '/') {
        return requestPath;
    }
    if (requestPath === basePath) {
        return '/';
    }
    if (!requestPath.startsWith(`${basePath}/`)) {
        return null;
    }
    return '/' + requestPath.slice(basePath.length + 1).replace(/^\/+/, '');
}

/**
 * Percent-decodes and normalizes a request path. Trailing slashes are
 * dropped except on `/`.
 *
 * @returns The normalized path, or `null` when it is not valid percent-encoding
 */
export function decodeRequestPath(rawPath: string): string | null {
    let decoded: string;
    try {
        decoded = decodeURIComponent(rawPath);
    } catch (error) {
        if (error instanceof URIError) {
            return null;
        }
        throw error;
    }

    let normalized = posix.normalize(decoded.startsWith('/') ? decoded : `/${decoded}`);
    if (normalized.length > 1 && normalized.endsWith('/')) {
        normalized = normalized.slice(0, -1);
    }
    return normalized;
}

function mappingKey(method: string, path: string): string {
    return `${method} ${path}`;
}
