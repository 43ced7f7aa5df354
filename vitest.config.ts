import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/unit/**/*.test.ts'],
    env: {
      STATION_TIMEZONE: 'Asia/Colombo',
    },
  },
});
