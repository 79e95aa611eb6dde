/**
 * Manifest discovery for a project directory.
 */

import { isAbsolute, join, resolve } from 'path';
import { MANIFEST_CANDIDATES, MANIFEST_FILENAME } from './constants.js';
import { FlashlessError, FlashlessErrorCode } from './errors.js';
import { pathExists } from './paths.js';

/**
 * Finds the manifest for a project.
 *
 * An explicit override wins and is returned without checking it exists;
 * {@link loadManifest} reports a missing file. Otherwise the first existing
 * candidate in {@link MANIFEST_CANDIDATES} is returned.
 *
 * @param projectDir - Project directory
 * @param override - Manifest path given by the caller, relative to `projectDir` unless absolute
 * @returns Absolute manifest path
 * @throws \{FlashlessError\} `MANIFEST_NOT_FOUND` when no candidate exists
 *
 * @example
 * ```typescript
 * await discoverManifest('/work/fw'); // '/work/fw/flashless.manifest.json'
 * await discoverManifest('/work/fw', 'ui/preview.json'); // '/work/fw/ui/preview.json'
 * ```
 */
export async function discoverManifest(
    projectDir: string,
    override?: string,
): Promise<string> {
    const root = resolve(projectDir);

    if (override) {
        return isAbsolute(override) ? override : join(root, override);
    }

    for (const candidate of MANIFEST_CANDIDATES) {
        const manifestPath = join(root, candidate);
        if (await pathExists(manifestPath)) {
            return manifestPath;
        }
    }

    throw new FlashlessError(
        FlashlessErrorCode.MANIFEST_NOT_FOUND,
        `Missing flashless manifest. Create one at '${MANIFEST_FILENAME}' or 'web/${MANIFEST_FILENAME}', ` +
            `or run 'flashless init-manifest' to write a template.`,
    );
}
