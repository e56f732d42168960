import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        // Global test configuration
        globals: true,

        // Include patterns for test files
        include: ['tests/**/*.test.ts'],

        exclude: ['node_modules', 'dist', 'coverage'],

        coverage: {
            provider: 'v8',
            reporter: ['text', 'html', 'lcov'],
            reportsDirectory: './coverage',
            include: ['src/**/*.ts'],
            exclude: [
                'node_modules',
                'tests',
                '**/*.d.ts',
                '**/*.test.ts'
            ]
        },

        // Setup files (run before tests)
        setupFiles: ['./tests/setup.ts'],

        environment: 'node',

        // better-sqlite3 and sharp are native; keep each file in its own process
        pool: 'forks'
    }
});
