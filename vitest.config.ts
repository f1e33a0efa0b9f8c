import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/unit/**/*.test.ts'],
    env: {
      NODE_ENV: 'test',
    },
    restoreMocks: true,
  },
});
