/**
 * Tests for preview orchestration and the CLI entry point
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { readFile } from 'fs/promises';
import { join } from 'path';
import { FlashlessErrorCode } from '@flashless/manifest';
import type { PreviewServer } from '@flashless/server';
import { main } from '../src/index.js';
import { preparePreview, previewUrl, runPreview } from '../src/preview.js';
import type { PreviewOptions } from '../src/types.js';
import { createTempProject, type TempProject } from '../../../test/helpers/project.js';

const INDEX_HTML = '<html><body>device</body></html>';

function stripAnsi(text: string): string {
    return text.replace(/\x1b\[[0-9;]*m/g, '');
}

describe('previewUrl', () => {
    it('should print wildcard hosts as loopback', () => {
        expect(previewUrl('0.0.0.0', 8787, '/')).toBe('http://127.0.0.1:8787/');
        expect(previewUrl('::', 8787, '/ui')).toBe('http://127.0.0.1:8787/ui');
    });

    it('should keep specific hosts', () => {
        expect(previewUrl('192.168.4.1', 80, '/')).toBe('http://192.168.4.1:80/');
    });

    it('should bracket IPv6 literals', () => {
        expect(previewUrl('::1', 8080, '/')).toBe('http://[::1]:8080/');
    });

    it('should add a leading slash to the base path', () => {
        expect(previewUrl('127.0.0.1', 1, 'ui')).toBe('http://127.0.0.1:1/ui');
    });
});

describe('preview orchestration', () => {
    let project: TempProject;
    let server: PreviewServer | undefined;

    beforeEach(async () => {
        project = await createTempProject();
        await project.write('web/dist/index.html', INDEX_HTML);
        await project.write('ui-fixtures/health.json', '{"ok":true}');
        await project.writeManifest({
            version: '1',
            ui: { assetRoot: 'web/dist', routes: ['/', '/settings'] },
            api: {
                map: [{ method: 'GET', path: '/api/health', fixture: 'health.json' }],
            },
        });
        server = undefined;
    });

    afterEach(async () => {
        vi.restoreAllMocks();
        await server?.stop();
        await project.remove();
    });

    function previewOptions(overrides: Partial<PreviewOptions> = {}): PreviewOptions {
        return {
            projectDir: project.dir,
            buildDir: 'build',
            port: 0,
            host: '127.0.0.1',
            requestLog: 'none',
            mode: 'mock',
            strict: false,
            allowAbsolutePaths: false,
            liveReload: false,
            liveReloadInterval: 1000,
            ...overrides,
        };
    }

    describe('preparePreview', () => {
        it('should bind the server and write the report', async () => {
            const prepared = await preparePreview(previewOptions());
            server = prepared.server;
            const { port } = prepared.server.address;

            expect(prepared.url).toBe(`http://127.0.0.1:${port}/`);
            expect(prepared.reportPath).toBe(join(project.dir, 'build/flashless/report.json'));
            expect(prepared.validation.hasErrors).toBe(false);
            expect(prepared.manifest.sourcePath).toBe(
                join(project.dir, 'flashless.manifest.json'),
            );
            expect(
                JSON.parse(await readFile(prepared.reportPath, 'utf-8')),
            ).toMatchObject({ server: { host: '127.0.0.1', port, mode: 'mock' } });

            const response = await fetch(prepared.url);
            expect(await response.text()).toBe(INDEX_HTML);
        });

        it('should apply the fixtures override', async () => {
            await project.write('mocks/health.json', '{"mocked":true}');
            const prepared = await preparePreview(previewOptions({ fixtures: 'mocks' }));
            server = prepared.server;

            expect(prepared.manifest.api.fixturesDir).toBe(join(project.dir, 'mocks'));
            const response = await fetch(
                `http://127.0.0.1:${prepared.server.address.port}/api/health`,
            );
            expect(await response.json()).toEqual({ mocked: true });
        });

        it('should refuse any mode but mock', async () => {
            await expect(preparePreview(previewOptions({ mode: 'proxy' }))).rejects.toMatchObject({
                code: FlashlessErrorCode.UNSUPPORTED_MODE,
                message: "Only '--mode mock' is supported.",
            });
        });

        it('should fail strict validation with every set listed', async () => {
            await project.writeManifest({
                version: '1',
                ui: { assetRoot: 'web/dist' },
                api: {
                    map: [{ method: 'GET', path: '/api/status', fixture: 'status.json' }],
                },
                validation: { requiredFiles: ['index.html', 'app.js'] },
            });

            await expect(preparePreview(previewOptions({ strict: true }))).rejects.toMatchObject({
                code: FlashlessErrorCode.STRICT_VALIDATION_FAILED,
                message:
                    'Strict validation failed: missingRequiredFiles=["app.js"] ' +
                    'missingFixtures=["status.json"] unresolvedRoutes=[]',
            });
        });

        it('should continue with warnings when not strict', async () => {
            await project.writeManifest({
                version: '1',
                ui: { assetRoot: 'web/dist' },
                validation: { requiredFiles: ['app.js'] },
            });

            const prepared = await preparePreview(previewOptions());
            server = prepared.server;

            expect(prepared.validation.missingRequiredFiles).toEqual(['app.js']);
        });
    });

    describe('runPreview', () => {
        it('should print status lines and stop when aborted', async () => {
            const log = vi.spyOn(console, 'log').mockImplementation(() => {});
            const controller = new AbortController();
            const lines = () => log.mock.calls.map((call) => stripAnsi(String(call[0])));

            const running = runPreview(previewOptions(), controller.signal);
            await vi.waitFor(
                () => expect(lines().some((line) => line.includes('Preview running at'))).toBe(true),
                { timeout: 2000, interval: 20 },
            );

            controller.abort();
            await running;

            const output = lines();
            expect(output[0]).toBe(
                `[flashless] Manifest: ${join(project.dir, 'flashless.manifest.json')}`,
            );
            expect(output[1]).toBe(
                `[flashless] Report:   ${join(project.dir, 'build/flashless/report.json')}`,
            );
            expect(output[2]).toMatch(/^\[flashless\] Preview running at http:\/\/127\.0\.0\.1:\d+\/$/);
            expect(output[3]).toBe('[flashless] Press Ctrl+C to stop.');
            expect(output[4]).toBe('\n[flashless] Stopped.');
        });

        it('should print one warning line per non-empty set', async () => {
            const log = vi.spyOn(console, 'log').mockImplementation(() => {});
            await project.writeManifest({
                version: '1',
                ui: { assetRoot: 'web/dist', routes: ['/logo.png'], spaFallback: false },
                api: {
                    map: [{ method: 'GET', path: '/api/x', fixture: 'x.json' }],
                },
                validation: { requiredFiles: ['app.js'] },
            });
            const controller = new AbortController();
            controller.abort();

            await runPreview(previewOptions(), controller.signal);

            const output = log.mock.calls.map((call) => stripAnsi(String(call[0])));
            expect(output.slice(2, 6)).toEqual([
                '[flashless] Validation warnings detected. Use --strict to fail fast.',
                '[flashless]   missing required files: app.js',
                '[flashless]   missing fixtures: x.json',
                '[flashless]   unresolved routes: /logo.png',
            ]);
        });
    });

    describe('main', () => {
        it('should return 0 for a clean check', async () => {
            const log = vi.spyOn(console, 'log').mockImplementation(() => {});

            await expect(
                main(['node', 'flashless', 'check', '--project-dir', project.dir]),
            ).resolves.toBe(0);
            expect(stripAnsi(String(log.mock.calls[1][0]))).toBe(
                '[flashless] No validation problems found.',
            );
        });

        it('should return 1 for a strict check with problems', async () => {
            vi.spyOn(console, 'log').mockImplementation(() => {});
            await project.writeManifest({
                version: '1',
                ui: { assetRoot: 'web/dist' },
                validation: { requiredFiles: ['missing.js'] },
            });

            await expect(
                main(['node', 'flashless', 'check', '--project-dir', project.dir]),
            ).resolves.toBe(0);
            await expect(
                main(['node', 'flashless', 'check', '--project-dir', project.dir, '--strict']),
            ).resolves.toBe(1);
        });

        it('should return 2 and print flashless errors', async () => {
            const error = vi.spyOn(console, 'error').mockImplementation(() => {});
            const emptyDir = await project.mkdir('empty');

            await expect(
                main(['node', 'flashless', 'check', '--project-dir', emptyDir]),
            ).resolves.toBe(2);
            expect(stripAnsi(String(error.mock.calls[0][0]))).toBe(
                "flashless error: Missing flashless manifest. Create one at 'flashless.manifest.json' " +
                    "or 'web/flashless.manifest.json', or run 'flashless init-manifest' to write a template.",
            );
        });

        it('should write the template once without --force', async () => {
            vi.spyOn(console, 'log').mockImplementation(() => {});
            vi.spyOn(console, 'error').mockImplementation(() => {});
            const output = join(project.dir, 'new.manifest.json');

            await expect(
                main(['node', 'flashless', 'init-manifest', '--output', output]),
            ).resolves.toBe(0);
            await expect(
                main(['node', 'flashless', 'init-manifest', '--output', output]),
            ).resolves.toBe(2);
            await expect(
                main(['node', 'flashless', 'init-manifest', '--output', output, '--force']),
            ).resolves.toBe(0);
        });

        it('should return the commander exit code for usage errors', async () => {
            vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

            await expect(main(['node', 'flashless', 'serve'])).resolves.toBe(1);
        });

        it('should hand run options to the run handler', async () => {
            const run = vi.fn<(options: PreviewOptions) => Promise<void>>().mockResolvedValue(
                undefined,
            );

            await expect(
                main(['node', 'flashless', 'run', '--project-dir', project.dir, '--bind-port', '0'], {
                    run,
                }),
            ).resolves.toBe(0);
            expect(run).toHaveBeenCalledWith(
                expect.objectContaining({ projectDir: project.dir, port: 0 }),
            );
        });
    });
});
