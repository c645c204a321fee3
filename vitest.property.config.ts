import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['test/**/*.property.test.ts'],
    setupFiles: ['./test/setup.ts'],
    testTimeout: 60000, // Property tests can take longer
    hookTimeout: 30000,
  },
});
