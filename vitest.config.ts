import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['stitchwork-*/src/**/*.test.ts'],
    environment: 'node',
    env: {
      STITCHWORK_LOG_LEVEL: 'silent',
      STITCHWORK_TELEMETRY_ENABLED: 'false',
    },
  },
});
