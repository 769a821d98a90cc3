import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        environment: 'node',
        include: ['tests/**/*.test.ts'],
        // Keep test output free of log lines; the logger reads these at import time.
        env: {
            LOG_LEVEL: 'silent',
            LOG_PRETTY: 'false',
        },
    },
});
