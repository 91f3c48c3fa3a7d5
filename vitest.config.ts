import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        environment: 'node',
        include: ['apps/api/test/**/*.test.ts'],
        setupFiles: ['apps/api/test/setup.ts'],
        testTimeout: 10_000,
    },
});
