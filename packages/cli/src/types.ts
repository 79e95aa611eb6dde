/**
 * Parsed options for the CLI commands.
 */

import type { ApiMode, RequestLogLevel } from '@flashless/types';

/**
 * Options for the `run` command and {@link preparePreview}.
 */
export interface PreviewOptions {
    /** Project directory; manifest paths resolve against it. */
    projectDir: string;
    /** Build directory, relative to the project unless absolute. The report is written below it. */
    buildDir: string;
    /** Explicit manifest path. Discovery is used when omitted. */
    manifest?: string;
    port: number;
    host: string;
    requestLog: RequestLogLevel;
    /** Requested API mode. Only `mock` is served. */
    mode: ApiMode;
    /** Fixtures directory that replaces the manifest's `api.fixturesDir`. */
    fixtures?: string;
    /** Fail when parity validation finds anything. */
    strict: boolean;
    allowAbsolutePaths: boolean;
    liveReload: boolean;
    /** Watcher poll interval in milliseconds. */
    liveReloadInterval: number;
}

/**
 * Options for the `check` command.
 */
export interface CheckOptions {
    projectDir: string;
    manifest?: string;
    fixtures?: string;
    allowAbsolutePaths: boolean;
    strict: boolean;
}

/**
 * Options for the `init-manifest` command.
 */
export interface InitManifestOptions {
    /** Output path, relative to `cwd` unless absolute. */
    output: string;
    /** Overwrite an existing file. */
    force: boolean;
    /** @defaultValue process.cwd() */
    cwd?: string;
}
