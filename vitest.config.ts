import { defineConfig } from 'vitest/config';
import { resolve } from 'path';

export default defineConfig({
    test: {
        environment: 'node',
        include: ['packages/*/test/**/*.test.ts'],
        testTimeout: 15_000,
    },
    resolve: {
        alias: {
            '@flashless/cli': resolve('./packages/cli/src/index.ts'),
            '@flashless/manifest': resolve('./packages/manifest/src/index.ts'),
            '@flashless/server': resolve('./packages/server/src/index.ts'),
            '@flashless/types': resolve('./packages/types/src/index.ts'),
            '@flashless/utils': resolve('./packages/utils/src/index.ts'),
        },
    },
});
