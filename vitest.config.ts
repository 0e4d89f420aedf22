import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    exclude: ['dist/**', '**/node_modules/**', 'e2e/**'],
    setupFiles: ['test/setup.ts'],
    testTimeout: 10_000,
    restoreMocks: true,
    unstubEnvs: true,
  },
});
