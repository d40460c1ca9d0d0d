import { defineConfig } from 'vitest/config'

export default defineConfig({
    test: {
        globals: false,
        environment: 'node',
        // Keep pino quiet and unformatted under test
        env: { LOG_LEVEL: 'silent', PRETTY_LOGS: 'false' },
        include: ['packages/*/src/**/*.test.ts', 'services/*/src/**/*.test.ts'],
        exclude: ['**/node_modules/**', '**/dist/**'],
        testTimeout: 5000,
        hookTimeout: 5000
    }
})
