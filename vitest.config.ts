import { defineConfig } from 'vitest/config';

/**
 * Root-level Vitest configuration for the monorepo.
 *
 * `npm test` at the root runs every colocated test in every workspace. Tests
 * never reach MongoDB or the network; the connection string below only satisfies
 * environment validation when a test imports modules that read `env`.
 */
export default defineConfig({
    test: {
        environment: 'node',
        include: [
            'apps/**/src/**/__tests__/**/*.test.ts', // Colocated tests in apps
            'packages/**/src/**/__tests__/**/*.test.ts' // Colocated tests in packages
        ],
        exclude: ['**/node_modules/**', '**/dist/**', '**/*.d.ts'],
        testTimeout: 30_000,
        hookTimeout: 30_000,
        reporters: 'default',
        env: {
            NODE_ENV: 'test',
            MONGODB_URI: 'mongodb://localhost:27017/plugin-catalog-test'
        }
    }
});
