import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    env: {
      // Keep scrypt cheap in tests
      TEST_KDF_N: '1024',
    },
    include: ['test/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: ['src/**/*.ts'],
      exclude: ['src/cli/**', 'src/client/sync-worker.ts'],
      thresholds: {
        lines: 85,
        functions: 85,
        branches: 80,
        statements: 85,
      },
    },
    // Integration tests bind real sockets and spawn the CLI through tsx
    testTimeout: 30_000,
    hookTimeout: 30_000,
    poolOptions: {
      forks: {
        singleFork: false,
      },
    },
  },
});
