import { defineConfig } from 'vitest/config'

export default defineConfig({
    test: {
        include: ['services/*/tests/**/*.test.ts', 'packages/*/src/**/*.test.ts'],
        environment: 'node',
        env: {
            LOG_LEVEL: 'silent',
            PRETTY_LOGS: 'false',
        },
    },
})
