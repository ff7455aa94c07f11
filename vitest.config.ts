import { defineConfig } from 'vitest/config';

// Timestamps render in local time; pin it so expectations are stable
process.env.TZ = 'UTC';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    // Config loader tests change the working directory
    pool: 'forks',
    env: {
      TZ: 'UTC',
      LOG_LEVEL: 'silent',
    },
  },
});
