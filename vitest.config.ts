import { defineConfig } from 'vitest/config';

// SQLite's 'localtime' modifier and Date both follow the process zone;
// pin it so day/year bucketing in the fixtures is deterministic.
process.env.TZ = 'UTC';

export default defineConfig({
  test: {
    globals: false,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: ['src/server/**/*.ts'],
      exclude: ['src/server/types/**', 'src/server/__tests__/**'],
    },
  },
});
