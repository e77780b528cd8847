import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

function pkg(name: string): string {
    return fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));
}

export default defineConfig({
    resolve: {
        alias: {
            '@tally/shared': pkg('shared'),
            '@tally/core': pkg('core'),
        },
    },
    test: {
        globals: true,
        environment: 'node',
        include: ['packages/*/tests/**/*.test.ts'],
        coverage: {
            provider: 'v8',
            reporter: ['text', 'html'],
            include: ['packages/*/src/**/*.ts'],
        },
    },
});
