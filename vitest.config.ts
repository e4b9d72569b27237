import { defineConfig } from 'vitest/config';

// Output timestamps are local time; pin the zone so expected strings are stable
process.env.TZ = 'UTC';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    env: { TZ: 'UTC' },
  },
});
