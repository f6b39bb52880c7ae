import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    // End-to-end batch tests walk several AIPs through the filesystem
    testTimeout: 10000,
    globals: true,
  },
});
