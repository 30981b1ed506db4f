import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        globals: true,
        environment: 'node',
        include: ['tests/**/*.test.ts'],
        coverage: {
            provider: 'v8',
            reporter: ['text', 'json-summary'],
            include: ['src/**/*.ts'],
            exclude: ['src/index.ts', 'src/types.ts', 'src/cli.ts'],
            thresholds: {
                lines: 85,
                branches: 75,
                functions: 85,
                statements: 85,
            },
        },
    },
});
