import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        environment: 'node',
        setupFiles: ['./src/setupTests.ts'],
        globals: true,
        include: ['engine/**/*.test.ts', 'src/**/*.test.ts'],
        coverage: {
            provider: 'v8',
            include: ['src/**/*.ts', 'engine/**/*.ts'],
            exclude: [
                '**/*.test.*',
                '**/setupTests.*',
                'src/test-utils/**',
                'engine/index.ts',
            ],
            reporter: ['text', 'text-summary'],
            thresholds: {
                lines: 70,
                functions: 70,
                branches: 65,
                statements: 70,
            },
        },
    },
});
