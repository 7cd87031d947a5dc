import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: false,
    environment: 'node',
    // Only include test files in tests/ directory
    include: ['tests/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**', '**/.git/**'],
    // Listener tests bind loopback ports; keep files sequential
    fileParallelism: false,
    testTimeout: 30000,
    hookTimeout: 30000,
  },
});
