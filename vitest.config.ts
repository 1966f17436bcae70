import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        environment: 'node',
        include: ['tests/**/*.test.ts'],
        env: {
            NODE_ENV: 'test',
            LOG_LEVEL: 'silent',
            PERSISTENCE_DRIVER: 'memory',
        },
    },
});
