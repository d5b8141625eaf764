import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['core/test/**/*.test.ts', 'bot/test/**/*.test.ts'],
        environment: 'node',
        env: {
            NODE_ENV: 'test',
            LOG_LEVEL: 'silent',
        },
    },
});
