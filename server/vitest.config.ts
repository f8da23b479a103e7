import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    testTimeout: 30000,
    hookTimeout: 30000,
    env: {
      SATSIM_API_KEY: 'test-secret',
      SIM_TIME_SCALE: '0',
    },

    // Workspace-style projects for tiered testing
    projects: [
      {
        // Unit tests: pure services, scripted randomness, no I/O beyond temp dirs
        extends: true,
        test: {
          name: 'unit',
          include: ['src/__tests__/unit/**/*.test.ts'],
          testTimeout: 10000,
        },
      },
      {
        // Integration tests: Express app on an ephemeral port
        extends: true,
        test: {
          name: 'integration',
          include: ['src/__tests__/integration/**/*.test.ts'],
          testTimeout: 30000,
          pool: 'forks',
          poolOptions: { forks: { singleFork: true } },
        },
      },
      {
        // E2E tests: full command lifecycle over socket.io
        extends: true,
        test: {
          name: 'e2e',
          include: ['src/__tests__/e2e/**/*.test.ts'],
          testTimeout: 60000,
          pool: 'forks',
          poolOptions: { forks: { singleFork: true } },
        },
      },
    ],
  },
});
