import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tilepack/src/**/__tests__/**/*.test.ts'],
    environment: 'node',
  },
});
