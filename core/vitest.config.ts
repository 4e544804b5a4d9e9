import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    globals: false,
    environment: 'node',
    pool: 'forks',
    // Disable watch mode by default (use vitest --watch explicitly)
    watch: false,
    testTimeout: 30000,
  },
});
