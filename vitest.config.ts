import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        globals: true,
        environment: 'node',
        include: ['src/**/__tests__/**/*.test.ts'],
        env: {
            // JSON to stderr, nothing below silent: no pino-pretty worker in tests
            SCENARIO_SYNTH_LOG_LEVEL: 'silent',
            SCENARIO_SYNTH_JSON_LOGS: '1',
        },
        coverage: {
            provider: 'v8',
            include: ['src/**/*.ts'],
            exclude: ['src/**/__tests__/**', 'src/types/**', 'src/cli/**'],
        },
        testTimeout: 10000,
    },
});
