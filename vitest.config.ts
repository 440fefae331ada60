import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    projects: [
      {
        test: {
          name: 'proto-unit',
          include: ['packages/idm-proto/tests/unit/**/*.test.ts'],
          testTimeout: 5000,
        },
      },
      {
        test: {
          name: 'server-unit',
          include: ['packages/idm-server/tests/unit/**/*.test.ts'],
          testTimeout: 5000,
        },
      },
      {
        test: {
          name: 'server-integration',
          include: ['packages/idm-server/tests/integration/**/*.test.ts'],
          testTimeout: 30000,
        },
      },
    ],
  },
});
