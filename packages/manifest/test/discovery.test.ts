import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'path';
import { FlashlessErrorCode, discoverManifest } from '../src/index.js';
import { createTempProject, type TempProject } from '../../../test/helpers/project.js';

describe('discoverManifest', () => {
    let project: TempProject;

    beforeEach(async () => {
        project = await createTempProject();
    });

    afterEach(async () => {
        await project.remove();
    });

    it('should prefer the manifest at the project root', async () => {
        await project.write('flashless.manifest.json', '{}');
        await project.write('web/flashless.manifest.json', '{}');

        await expect(discoverManifest(project.dir)).resolves.toBe(
            join(project.dir, 'flashless.manifest.json'),
        );
    });

    it('should fall back to the web directory', async () => {
        await project.write('web/flashless.manifest.json', '{}');

        await expect(discoverManifest(project.dir)).resolves.toBe(
            join(project.dir, 'web/flashless.manifest.json'),
        );
    });

    it('should resolve a relative override against the project', async () => {
        await expect(discoverManifest(project.dir, 'ui/preview.json')).resolves.toBe(
            join(project.dir, 'ui/preview.json'),
        );
    });

    it('should return an absolute override unchanged', async () => {
        await expect(discoverManifest(project.dir, '/etc/preview.json')).resolves.toBe(
            '/etc/preview.json',
        );
    });

    it('should fail with a hint when nothing is found', async () => {
        await expect(discoverManifest(project.dir)).rejects.toMatchObject({
            code: FlashlessErrorCode.MANIFEST_NOT_FOUND,
        });
        await expect(discoverManifest(project.dir)).rejects.toThrow(
            "run 'flashless init-manifest'",
        );
    });
});
