import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['src/tests/**/*.test.ts'],
        environment: 'node',
        env: {
            LOG_LEVEL: 'silent',
            LOG_PRETTY: 'false',
            EVENT_BUS_NAME: '',
        },
    },
});
