/**
 * Core preview server: routing, responses, the Hono app and the listener.
 *
 * @packageDocumentation
 */

export { createPreviewApp, type PreviewAppOptions } from './app.js';
export { PreviewServer } from './preview-server.js';
export {
    PreviewRouter,
    decodeRequestPath,
    joinBasePath,
    relativeToBase,
    type PreviewRouterOptions,
    type RouteDecision,
} from './router.js';
export {
    assetResponse,
    fixtureResponse,
    guessContentType,
    jsonResponse,
    notFoundResponse,
    weakEtag,
    type AssetResponseOptions,
    type FileResponseOptions,
} from './responses.js';
