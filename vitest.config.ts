import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    environment: 'node',
    // Set test timeout
    testTimeout: 10000,
    // Use threads for better performance
    pool: 'threads',
  },
});
