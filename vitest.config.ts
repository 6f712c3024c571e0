import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
    resolve: {
        alias: {
            '~': fileURLToPath(new URL('./src', import.meta.url)),
        },
    },
    test: {
        include: [ 'src/**/*.test.ts' ],
        setupFiles: [ 'src/test/setup.ts' ],
        environment: 'node',
    },
});
