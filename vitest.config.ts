import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/test/**/*.test.ts'],
    environment: 'node',
    env: {
      MANTLE_NO_COLOR: '1',
    },
  },
});
