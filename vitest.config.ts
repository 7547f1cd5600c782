import { defineConfig } from 'vitest/config';

export default defineConfig({
  // No .env at the repo root is read during tests; settings come from loadSettings({...}) literals
  envDir: 'src',
  test: {
    globals: false,
    environment: 'node',
    include: ['src/__tests__/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    testTimeout: 15000,
    hookTimeout: 15000,
  },
});
