/**
 * Manifest defaults and well-known file locations.
 */

import type { CachePolicy } from '@flashless/types';

/** The only supported manifest schema version. */
export const SUPPORTED_MANIFEST_VERSION = '1';

/** File name looked up by manifest discovery. */
export const MANIFEST_FILENAME = 'flashless.manifest.json';

/** Discovery candidates, relative to the project directory, in priority order. */
export const MANIFEST_CANDIDATES: readonly string[] = [
    MANIFEST_FILENAME,
    `web/${MANIFEST_FILENAME}`,
];

export const DEFAULT_BASE_PATH = '/';

export const DEFAULT_ENTRY_FILE = 'index.html';

export const DEFAULT_ROUTES: readonly string[] = ['/'];

export const DEFAULT_SPA_FALLBACK = true;

/** Fixtures directory used when the manifest has no `api` block. */
export const DEFAULT_FIXTURES_DIR = 'ui-fixtures';

export const DEFAULT_FIXTURE_STATUS = 200;

export const DEFAULT_CACHE_POLICY: CachePolicy = {
    maxAgeSeconds: 0,
    etag: true,
    gzip: false,
};

/** Command-line flag that lifts the absolute-path restriction. */
export const ALLOW_ABSOLUTE_PATHS_FLAG = '--allow-absolute-paths';
