import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['stormline/src/**/__tests__/**/*.test.ts'],
    environment: 'node',
  },
});
