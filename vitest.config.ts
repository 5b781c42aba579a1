import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['backend/tests/**/*.test.ts'],
    setupFiles: ['backend/tests/setup.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html'],
      include: ['backend/src/**/*.ts'],
      exclude: ['backend/src/server.ts', 'backend/src/jobs/workers.ts'],
    },
  },
});
