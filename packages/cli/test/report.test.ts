import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createHash } from 'crypto';
import { readFile } from 'fs/promises';
import { join } from 'path';
import { createValidationResult, loadManifest } from '@flashless/manifest';
import { sha256File, writeReport } from '../src/report.js';
import { createTempProject, type TempProject } from '../../../test/helpers/project.js';

describe('writeReport', () => {
    let project: TempProject;

    beforeEach(async () => {
        project = await createTempProject();
        await project.write('web/dist/index.html', '<html></html>');
        await project.mkdir('ui-fixtures');
    });

    afterEach(async () => {
        await project.remove();
    });

    it('should write a sorted report below the build directory', async () => {
        const manifestPath = await project.writeManifest({
            version: '1',
            ui: { assetRoot: 'web/dist', basePath: '/ui', routes: ['/', '/wifi/*'] },
            api: {
                map: [{ method: 'GET', path: '/api/health', fixture: 'health.json' }],
            },
        });
        const manifest = await loadManifest(manifestPath, project.dir);
        const validation = createValidationResult([], ['health.json'], []);

        const reportPath = await writeReport({
            buildDir: join(project.dir, 'build'),
            manifest,
            validation,
            host: '127.0.0.1',
            port: 9000,
            mode: 'mock',
        });

        expect(reportPath).toBe(join(project.dir, 'build/flashless/report.json'));

        const text = await readFile(reportPath, 'utf-8');
        const digest = createHash('sha256')
            .update(await readFile(manifestPath))
            .digest('hex');

        expect(JSON.parse(text)).toEqual({
            api: {
                fixturesDir: join(project.dir, 'ui-fixtures'),
                mappingCount: 1,
                mode: 'mock',
            },
            manifest: { path: manifestPath, sha256: digest, version: '1' },
            routes: ['/', '/wifi/*'],
            server: {
                assetRoot: join(project.dir, 'web/dist'),
                basePath: '/ui',
                host: '127.0.0.1',
                mode: 'mock',
                port: 9000,
            },
            validation: {
                hasErrors: true,
                missingFixtures: ['health.json'],
                missingRequiredFiles: [],
                unresolvedRoutes: [],
            },
        });
        expect(text.startsWith('{\n  "api": {\n    "fixturesDir": ')).toBe(true);
    });

    it('should overwrite an earlier report', async () => {
        const manifest = await loadManifest(
            await project.writeManifest({ version: '1', ui: { assetRoot: 'web/dist' } }),
            project.dir,
        );
        const options = {
            buildDir: join(project.dir, 'build'),
            manifest,
            validation: createValidationResult([], [], []),
            host: '127.0.0.1',
            mode: 'mock' as const,
        };

        await writeReport({ ...options, port: 1 });
        const reportPath = await writeReport({ ...options, port: 2 });

        expect(JSON.parse(await readFile(reportPath, 'utf-8'))).toMatchObject({
            server: { port: 2 },
        });
    });
});

describe('sha256File', () => {
    it('should hash file contents', async () => {
        const project = await createTempProject();
        try {
            const filePath = await project.write('data.bin', 'abc');

            await expect(sha256File(filePath)).resolves.toBe(
                'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad',
            );
        } finally {
            await project.remove();
        }
    });
});
