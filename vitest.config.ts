import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',

    // Tests live beside the sources
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**'],

    clearMocks: true,
    restoreMocks: true,
    unstubGlobals: true,
  },
});
