import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['src/**/tests/**/*.test.ts'],
        environment: 'node',
        env: {
            NODE_ENV: 'test',
            LOG_LEVEL: 'error',
            LOG_TO_FILE: 'false',
        },
    },
});
