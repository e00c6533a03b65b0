import { defineConfig } from 'vitest/config';

/**
 * Root-level Vitest configuration for the monorepo.
 *
 * `npm test` at the root runs every workspace's colocated tests from their
 * TypeScript sources; no build is needed first.
 */
export default defineConfig({
    test: {
        environment: 'node',
        include: [
            'apps/**/src/**/__tests__/**/*.test.ts',
            'packages/**/src/**/__tests__/**/*.test.ts'
        ],
        exclude: ['node_modules', 'dist', '**/*.d.ts'],
        testTimeout: 30_000,
        hookTimeout: 30_000,
        reporters: 'default',
        // Placeholder values; tests never reach a server
        env: {
            NODE_ENV: 'test',
            MONGODB_URI: 'mongodb://localhost:27017/keepsake-test',
            SESSION_SECRET: 'test-secret-test-secret'
        }
    }
});
