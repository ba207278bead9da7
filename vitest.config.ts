import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['analyzer/src/tests/**/*.test.ts'],
    environment: 'node',
    restoreMocks: true,
    setupFiles: ['analyzer/src/tests/setup.ts'],
  },
});
