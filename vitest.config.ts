import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['test/**/*.test.ts'],
    env: {
      GATE_AUDIT_LOG_LEVEL: 'silent',
    },
    testTimeout: 10000,
  },
});
