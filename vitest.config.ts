import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    setupFiles: ['tests/setup-env.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      all: true,
      // Measure the real TypeScript sources (the repo doesn’t ship .js in src).
      include: ['src/**/*.ts'],
      // Exclude interactive/CDP entrypoints that aren’t practical to unit test.
      exclude: ['src/browser/cdpSession.ts', 'src/browser/types.ts', 'src/session/types.ts'],
    },
  },
});
