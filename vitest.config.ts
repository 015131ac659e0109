import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        name: 'existence-numbers',
        environment: 'node',
        include: ['test/**/*.test.ts'],
    },
});
