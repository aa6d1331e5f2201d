import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['gateway-service/src/**/*.test.ts'],
    environment: 'node',
    restoreMocks: true,
  },
});
