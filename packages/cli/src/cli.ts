/**
 * Command line argument parsing and CLI setup for flashless.
 *
 * This module defines the `run`, `init-manifest` and `check` commands with
 * commander.js and hands their parsed, typed options to the supplied
 * handlers. Nothing here touches the filesystem or the network.
 */

import {
    Command,
    InvalidArgumentError,
    type OutputConfiguration,
} from 'commander';
import { DEFAULT_HOST, DEFAULT_PORT } from '@flashless/server';
import {
    REQUEST_LOG_LEVELS,
    type ApiMode,
    type RequestLogLevel,
} from '@flashless/types';
import { VERSION } from '@flashless/utils';
import type { CheckOptions, InitManifestOptions, PreviewOptions } from './types.js';

/**
 * Actions invoked for each command once its options are parsed.
 */
export interface CommandHandlers {
    run(options: PreviewOptions): Promise<void>;
    initManifest(options: InitManifestOptions): Promise<void>;
    check(options: CheckOptions): Promise<void>;
}

/**
 * Raw options for the run command, as commander hands them over.
 */
interface RunCliOptions {
    projectDir: string;
    buildDir: string;
    manifest?: string;
    bindPort: number;
    host: string;
    requestLog: RequestLogLevel;
    mode: ApiMode;
    fixtures?: string;
    strict?: boolean;
    allowAbsolutePaths?: boolean;
    /** Negatable via --no-live-reload. */
    liveReload: boolean;
    liveReloadInterval: number;
}

interface CheckCliOptions {
    projectDir: string;
    manifest?: string;
    fixtures?: string;
    allowAbsolutePaths?: boolean;
    strict?: boolean;
}

interface InitCliOptions {
    output: string;
    force?: boolean;
}

const API_MODES: readonly ApiMode[] = ['mock', 'proxy'];

/**
 * Parses a TCP port. `0` asks the OS for a free one.
 */
export function parsePort(value: string): number {
    const port = Number(value);
    if (!/^\d+$/.test(value) || port > 65535) {
        throw new InvalidArgumentError('Expected a port between 0 and 65535.');
    }
    return port;
}

/**
 * Parses a whole number of milliseconds, at least 1.
 */
export function parseInterval(value: string): number {
    const ms = Number(value);
    if (!/^\d+$/.test(value) || ms < 1) {
        throw new InvalidArgumentError('Expected a positive number of milliseconds.');
    }
    return ms;
}

export function parseRequestLog(value: string): RequestLogLevel {
    const level = REQUEST_LOG_LEVELS.find((candidate) => candidate === value);
    if (!level) {
        throw new InvalidArgumentError(
            `Allowed choices are ${REQUEST_LOG_LEVELS.join(', ')}.`,
        );
    }
    return level;
}

export function parseMode(value: string): ApiMode {
    const mode = API_MODES.find((candidate) => candidate === value.toLowerCase());
    if (!mode) {
        throw new InvalidArgumentError(`Allowed choices are ${API_MODES.join(', ')}.`);
    }
    return mode;
}

/**
 * Builds the flashless command tree.
 *
 * Commander errors (unknown options, bad values, `--help`) are thrown as
 * `CommanderError` rather than exiting the process, so callers decide the
 * exit code.
 *
 * @param handlers - What each command does
 * @param output - Optional commander output configuration, e.g. to silence it in tests
 *
 * @example
 * ```typescript
 * const program = createProgram({ run: runPreview, initManifest, check });
 * await program.parseAsync(process.argv);
 * ```
 */
export function createProgram(
    handlers: CommandHandlers,
    output?: OutputConfiguration,
): Command {
    const program = new Command();

    program
        .name('flashless')
        .description(
            'Preview an embedded web UI locally, with mocked API fixtures and live reload.',
        )
        .version(VERSION)
        .exitOverride();

    if (output) {
        program.configureOutput(output);
    }

    /**
     * Run command - serve the UI and fixtures
     */
    program
        .command('run')
        .description('Run the local preview server')
        .requiredOption('--project-dir <dir>', 'Project directory')
        .option(
            '--build-dir <dir>',
            'Build directory for the report, relative to the project',
            'build',
        )
        .option('--manifest <path>', 'Manifest path (default: discovered)')
        .option('--bind-port <port>', 'Port to listen on', parsePort, DEFAULT_PORT)
        .option('--host <host>', 'Host to bind', DEFAULT_HOST)
        .option(
            '--request-log <level>',
            'Which requests to log (all, errors, none)',
            parseRequestLog,
            'errors',
        )
        .option('--mode <mode>', 'API mode (mock, proxy)', parseMode, 'mock')
        .option('--fixtures <dir>', "Fixtures directory overriding 'api.fixturesDir'")
        .option('--strict', 'Fail when validation finds missing files or routes', false)
        .option(
            '--allow-absolute-paths',
            'Accept absolute asset and fixture paths in the manifest',
            false,
        )
        .option('--no-live-reload', 'Disable live reload')
        .option(
            '--live-reload-interval <ms>',
            'How often to poll for file changes',
            parseInterval,
            1000,
        )
        .action(async (opts: RunCliOptions) => {
            await handlers.run({
                projectDir: opts.projectDir,
                buildDir: opts.buildDir,
                manifest: opts.manifest,
                port: opts.bindPort,
                host: opts.host,
                requestLog: opts.requestLog,
                mode: opts.mode,
                fixtures: opts.fixtures,
                strict: opts.strict || false,
                allowAbsolutePaths: opts.allowAbsolutePaths || false,
                liveReload: opts.liveReload !== false,
                liveReloadInterval: opts.liveReloadInterval,
            });
        });

    /**
     * Init command - write the manifest template
     */
    program
        .command('init-manifest')
        .description('Write a manifest template')
        .option('--output <path>', 'Where to write it', 'flashless.manifest.json')
        .option('--force', 'Overwrite an existing file', false)
        .action(async (opts: InitCliOptions) => {
            await handlers.initManifest({
                output: opts.output,
                force: opts.force || false,
            });
        });

    /**
     * Check command - validate without serving
     */
    program
        .command('check')
        .description('Load and validate the manifest without serving')
        .requiredOption('--project-dir <dir>', 'Project directory')
        .option('--manifest <path>', 'Manifest path (default: discovered)')
        .option('--fixtures <dir>', "Fixtures directory overriding 'api.fixturesDir'")
        .option(
            '--allow-absolute-paths',
            'Accept absolute asset and fixture paths in the manifest',
            false,
        )
        .option('--strict', 'Exit with status 1 when validation finds anything', false)
        .action(async (opts: CheckCliOptions) => {
            await handlers.check({
                projectDir: opts.projectDir,
                manifest: opts.manifest,
                fixtures: opts.fixtures,
                allowAbsolutePaths: opts.allowAbsolutePaths || false,
                strict: opts.strict || false,
            });
        });

    return program;
}
