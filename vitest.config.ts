import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
    resolve: {
        alias: {
            '@gh-workspace/core': fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
        },
    },
    test: {
        include: ['packages/*/src/**/*.test.ts'],
        environment: 'node',
    },
});
