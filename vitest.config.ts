import { defineConfig } from 'vitest/config';
import path from 'path';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/{src,tests}/**/*.test.ts', 'workers/*/{src,tests}/**/*.test.ts']
  },
  resolve: {
    alias: {
      '@burrow/core': path.resolve(__dirname, 'packages/burrow-core/src'),
      '@burrow/test-utils': path.resolve(__dirname, 'packages/burrow-test-utils/src')
    }
  }
});
