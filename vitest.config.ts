import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['api/src/**/*.spec.ts'],
    setupFiles: ['./api/src/__tests__/setup.ts'],
  },
});
