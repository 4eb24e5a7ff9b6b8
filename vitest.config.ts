import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['worker/**/*.test.ts', 'src/**/*.test.ts'],
    setupFiles: ['worker/test/setup.ts'],
  },
});
