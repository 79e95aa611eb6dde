/**
 * `@flashless/server` - Preview a firmware web UI locally.
 *
 * Serves the built UI from its asset root, answers manifest-declared API
 * calls from fixture files, and pushes a reload to open pages when watched
 * files change.
 *
 * ## Features
 *
 * - Fixed-precedence routing: reload stream, API fixtures, static files, SPA entry
 * - Streamed file bodies with Content-Length, Cache-Control and weak ETags
 * - Live reload over Server-Sent Events with a polling file watcher
 * - Request logging filtered by level
 *
 * ## Usage
 *
 * ```typescript
 * import { loadManifest } from '@flashless/manifest';
 * import { PreviewServer } from '@flashless/server';
 *
 * const manifest = await loadManifest('./flashless.manifest.json', '.');
 * const server = await PreviewServer.create(manifest, { port: 8787 });
 * await server.serveForever();
 * ```
 *
 * @packageDocumentation
 */

export * from './server/index.js';
export * from './reload/index.js';
export * from './middleware/index.js';
export * from './constants.js';
export type { PreviewServerOptions, ServerAddress } from './types.js';
