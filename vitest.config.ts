import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        globals: true,
        environment: 'node',
        include: ['src/**/*.test.ts'],
        testTimeout: 10_000,
        coverage: {
            include: ['src'],
            exclude: ['src/**/*.test.ts'],
            reporter: ['json', 'json-summary', 'text']
        }
    }
});
