import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

export default defineConfig({
    resolve: {
        // Workspace sources, so tests never need a build first
        alias: {
            '@restage/core': fileURLToPath(new URL('./packages/restage-core/src/index.ts', import.meta.url)),
        },
    },
    test: {
        include: ['packages/*/src/**/*.test.ts'],
        environment: 'node',
    },
});
