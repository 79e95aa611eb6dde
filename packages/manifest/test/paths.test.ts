/**
 * Tests for path containment
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { symlink } from 'fs/promises';
import { join } from 'path';
import {
    FlashlessErrorCode,
    isWithinRoot,
    resolveWithinRoot,
    safeJoin,
} from '../src/index.js';
import { createTempProject, type TempProject } from '../../../test/helpers/project.js';

describe('safeJoin', () => {
    const root = '/srv/dist';

    it('should join a relative path under the root', () => {
        expect(safeJoin(root, 'assets/app.js')).toBe('/srv/dist/assets/app.js');
    });

    it('should strip leading slashes', () => {
        expect(safeJoin(root, '//assets/app.js')).toBe('/srv/dist/assets/app.js');
    });

    it('should collapse dot segments that stay inside', () => {
        expect(safeJoin(root, 'a/./b/../c.css')).toBe('/srv/dist/a/c.css');
    });

    it('should return the root for an empty path', () => {
        expect(safeJoin(root, '')).toBe('/srv/dist');
    });

    it.each(['..', '../secret', 'a/../../secret'])('should reject %s', (relative) => {
        let thrown: unknown;
        try {
            safeJoin(root, relative);
        } catch (error) {
            thrown = error;
        }

        expect(thrown).toMatchObject({
            code: FlashlessErrorCode.PATH_ESCAPE,
            message: `Path escapes root directory: ${relative}`,
        });
    });

    it('should treat absolute paths as relative to the root', () => {
        expect(safeJoin(root, '/../../etc/passwd')).toBe('/srv/dist/etc/passwd');
    });

    it('should not confuse a sibling with a shared prefix for the root', () => {
        expect(isWithinRoot('/srv/dist', '/srv/dist-old/file')).toBe(false);
        expect(isWithinRoot('/srv/dist', '/srv/dist/file')).toBe(true);
    });
});

describe('resolveWithinRoot', () => {
    let project: TempProject;
    let root: string;

    beforeEach(async () => {
        project = await createTempProject();
        root = await project.mkdir('dist');
        await project.write('dist/index.html', '<html></html>');
        await project.write('secret.txt', 'secret');
    });

    afterEach(async () => {
        await project.remove();
    });

    it('should return existing files', async () => {
        await expect(resolveWithinRoot(root, 'index.html')).resolves.toBe(
            join(root, 'index.html'),
        );
    });

    it('should return missing paths as joined', async () => {
        await expect(resolveWithinRoot(root, 'missing/app.js')).resolves.toBe(
            join(root, 'missing/app.js'),
        );
    });

    it('should follow symlinks that stay inside the root', async () => {
        await symlink(join(root, 'index.html'), join(root, 'home.html'));

        await expect(resolveWithinRoot(root, 'home.html')).resolves.toBe(
            join(root, 'index.html'),
        );
    });

    it('should reject symlinks that leave the root', async () => {
        await symlink(join(project.dir, 'secret.txt'), join(root, 'leak.txt'));

        await expect(resolveWithinRoot(root, 'leak.txt')).rejects.toMatchObject({
            code: FlashlessErrorCode.PATH_ESCAPE,
        });
    });
});
