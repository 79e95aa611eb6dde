/**
 * Tests for the polling file watcher
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { symlink } from 'fs/promises';
import { join } from 'path';
import { ReloadState } from '../src/reload/state.js';
import {
    FileChangeWatcher,
    snapshotFiles,
    snapshotsEqual,
} from '../src/reload/watcher.js';
import { createTempProject, type TempProject } from '../../../test/helpers/project.js';

describe('snapshotFiles', () => {
    let project: TempProject;

    beforeEach(async () => {
        project = await createTempProject();
    });

    afterEach(async () => {
        await project.remove();
    });

    it('should record nested regular files across roots', async () => {
        await project.write('dist/index.html', '<html></html>');
        await project.write('dist/assets/app.js', 'app');
        await project.write('fixtures/health.json', '{}');

        const snapshot = await snapshotFiles([
            join(project.dir, 'dist'),
            join(project.dir, 'fixtures'),
        ]);

        expect([...snapshot.keys()].sort()).toEqual([
            join(project.dir, 'dist/assets/app.js'),
            join(project.dir, 'dist/index.html'),
            join(project.dir, 'fixtures/health.json'),
        ]);
        expect(snapshot.get(join(project.dir, 'dist/assets/app.js'))).toMatch(
            /^\d+:3$/,
        );
    });

    it('should skip entries whose stat fails and keep scanning', async () => {
        await project.write('dist/index.html', '<html></html>');
        await project.write('dist/z.js', 'z');
        await symlink(join(project.dir, 'dist/gone.js'), join(project.dir, 'dist/dangling.js'));
        await symlink(join(project.dir, 'dist/loop.js'), join(project.dir, 'dist/loop.js'));

        const snapshot = await snapshotFiles([join(project.dir, 'dist')]);

        expect([...snapshot.keys()].sort()).toEqual([
            join(project.dir, 'dist/index.html'),
            join(project.dir, 'dist/z.js'),
        ]);
    });

    it('should skip roots that do not exist', async () => {
        await project.write('dist/index.html', '<html></html>');

        const snapshot = await snapshotFiles([
            join(project.dir, 'missing'),
            join(project.dir, 'dist'),
        ]);

        expect(snapshot.size).toBe(1);
    });
});

describe('snapshotsEqual', () => {
    it('should compare every entry', () => {
        const a = new Map([['/a', '1:1']]);

        expect(snapshotsEqual(a, new Map([['/a', '1:1']]))).toBe(true);
        expect(snapshotsEqual(a, new Map([['/a', '1:2']]))).toBe(false);
        expect(snapshotsEqual(a, new Map([['/b', '1:1']]))).toBe(false);
        expect(snapshotsEqual(a, new Map())).toBe(false);
    });
});

describe('FileChangeWatcher', () => {
    let project: TempProject;
    let state: ReloadState;
    let watcher: FileChangeWatcher;

    beforeEach(async () => {
        project = await createTempProject();
        await project.write('dist/index.html', '<html></html>');
        state = new ReloadState();
        watcher = new FileChangeWatcher(
            [join(project.dir, 'dist'), join(project.dir, 'fixtures')],
            state,
            { intervalMs: 20 },
        );
    });

    afterEach(async () => {
        await watcher.stop();
        await project.remove();
    });

    it('should bump when a file is added', async () => {
        await watcher.start();

        await project.write('dist/app.js', 'console.log(1);');

        await vi.waitFor(() => expect(state.get()).toBeGreaterThan(0), {
            timeout: 2000,
            interval: 20,
        });
    });

    it('should bump when a file in a root created later appears', async () => {
        await watcher.start();

        await project.write('fixtures/health.json', '{"ok":true}');

        await vi.waitFor(() => expect(state.get()).toBeGreaterThan(0), {
            timeout: 2000,
            interval: 20,
        });
    });

    it('should not bump while nothing changes', async () => {
        await watcher.start();

        await new Promise((resolve) => setTimeout(resolve, 120));

        expect(state.get()).toBe(0);
    });

    it('should stop promptly and report not running', async () => {
        await watcher.start();
        expect(watcher.running).toBe(true);

        const started = Date.now();
        await watcher.stop();

        expect(watcher.running).toBe(false);
        expect(Date.now() - started).toBeLessThan(1000);
    });

    it('should ignore a second start', async () => {
        await watcher.start();
        await watcher.start();

        await project.write('dist/app.js', 'x');

        await vi.waitFor(() => expect(state.get()).toBeGreaterThan(0), {
            timeout: 2000,
            interval: 20,
        });
    });
});
