/**
 * Writes the JSON report describing a preview run.
 */

import { createHash } from 'crypto';
import { createReadStream } from 'fs';
import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import type { ApiMode, Manifest, ValidationResult } from '@flashless/types';
import { stableStringify } from '@flashless/utils';

/** Directory below the build directory that holds flashless output. */
export const REPORT_DIR = 'flashless';

export const REPORT_FILENAME = 'report.json';

export interface WriteReportOptions {
    /** Absolute build directory. */
    buildDir: string;
    manifest: Manifest;
    validation: ValidationResult;
    /** Bound host. */
    host: string;
    /** Bound port. */
    port: number;
    /** Mode the preview was started in. */
    mode: ApiMode;
}

/**
 * Shape of `report.json`. Keys are written sorted at every depth.
 */
export interface PreviewReport {
    manifest: { path: string; sha256: string; version: string };
    server: {
        host: string;
        port: number;
        mode: ApiMode;
        basePath: string;
        assetRoot: string;
    };
    validation: {
        missingRequiredFiles: string[];
        missingFixtures: string[];
        unresolvedRoutes: string[];
        hasErrors: boolean;
    };
    routes: string[];
    api: { mode: ApiMode; fixturesDir: string; mappingCount: number };
}

/**
 * Writes `<buildDir>/flashless/report.json`, creating directories as needed.
 *
 * @returns Path of the written report
 *
 * @example
 * ```typescript
 * const reportPath = await writeReport({
 *     buildDir: '/work/fw/build',
 *     manifest,
 *     validation,
 *     host: '127.0.0.1',
 *     port: 8787,
 *     mode: 'mock',
 * });
 * // '/work/fw/build/flashless/report.json'
 * ```
 */
export async function writeReport(options: WriteReportOptions): Promise<string> {
    const { buildDir, manifest, validation } = options;
    const reportDir = join(buildDir, REPORT_DIR);
    await mkdir(reportDir, { recursive: true });

    const report: PreviewReport = {
        manifest: {
            path: manifest.sourcePath,
            sha256: await sha256File(manifest.sourcePath),
            version: manifest.version,
        },
        server: {
            host: options.host,
            port: options.port,
            mode: options.mode,
            basePath: manifest.ui.basePath,
            assetRoot: manifest.ui.assetRoot,
        },
        validation: {
            missingRequiredFiles: [...validation.missingRequiredFiles],
            missingFixtures: [...validation.missingFixtureFiles],
            unresolvedRoutes: [...validation.unresolvedRoutes],
            hasErrors: validation.hasErrors,
        },
        routes: [...manifest.ui.routes],
        api: {
            mode: manifest.api.mode,
            fixturesDir: manifest.api.fixturesDir,
            mappingCount: manifest.api.mappings.length,
        },
    };

    const reportPath = join(reportDir, REPORT_FILENAME);
    await writeFile(reportPath, stableStringify(report, 2), 'utf-8');
    return reportPath;
}

/**
 * Hex SHA-256 of a file, read as a stream.
 */
export async function sha256File(filePath: string): Promise<string> {
    const hash = createHash('sha256');
    for await (const chunk of createReadStream(filePath)) {
        hash.update(chunk);
    }
    return hash.digest('hex');
}
