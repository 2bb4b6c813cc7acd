import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    setupFiles: ['packages/cli/src/__tests__/helpers/test-env.ts'],
    environment: 'node',
  },
});
