import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        globals: true,
        environment: 'node',
        include: ['tests/**/*.test.ts'],
        exclude: ['node_modules/**'],
        coverage: {
            provider: 'v8',
            reporter: ['text', 'json', 'html'],
            reportsDirectory: './coverage',
            include: ['src/src/**/*.ts'],
            exclude: ['src/src/cli.ts', '**/*.d.ts'],
        },
        testTimeout: 30000,
        hookTimeout: 30000,
        pool: 'forks',
    },
});
