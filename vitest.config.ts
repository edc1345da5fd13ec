import { defineConfig } from 'vitest/config';
import { resolve } from 'path';

export default defineConfig({
    test: {
        environment: 'node',
        include: ['packages/*/test/**/*.test.ts'],
        coverage: {
            provider: 'v8',
            reporter: ['text', 'html'],
            include: ['packages/*/src/**/*.ts'],
            exclude: ['packages/cli/src/run.ts'],
        },
    },
    resolve: {
        alias: {
            '@pullview/cli': resolve('./packages/cli/src/index.ts'),
            '@pullview/display': resolve('./packages/display/src/index.ts'),
            '@pullview/terminal': resolve('./packages/terminal/src/index.ts'),
            '@pullview/types': resolve('./packages/types/src/index.ts'),
            '@pullview/utils': resolve('./packages/utils/src/index.ts'),
        },
    },
});
