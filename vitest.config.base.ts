import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    conditions: ['source'],
  },
  test: {
    environment: 'node',
    globals: true,
    include: ['{src,tests}/**/*.{test,spec}.{ts,tsx}'],
    exclude: ['**/dist/**', '**/coverage/**'],
    clearMocks: true,
    restoreMocks: true,
    unstubEnvs: true,
    unstubGlobals: true,
    coverage: {
      enabled: false,
      provider: 'v8',
      reporter: ['text', 'lcov', 'json-summary'],
      reportsDirectory: 'coverage',
      exclude: ['**/dist/**', '**/coverage/**', '**/*.d.ts', '**/test{,s}/**/*.ts'],
    },
  },
});
