import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.{test,spec}.ts'],

    // Socket tests bind 127.0.0.1 and wait on real timers
    testTimeout: 10_000,
    hookTimeout: 10_000,

    mockReset: true,
    clearMocks: true,
    restoreMocks: true,
  },
});
