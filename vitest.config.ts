import { defineConfig } from 'vitest/config';
import path from 'path';
import { fileURLToPath } from 'url';

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', 'node_modules', 'dist'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules', 'dist', '**/*.test.ts'],
    },
    testTimeout: 30000,
  },
  resolve: {
    alias: {
      '@dispatch/shared': path.resolve(rootDir, './src/backend/shared/src/index.ts'),
      '@dispatch/scoring-service': path.resolve(
        rootDir,
        './src/backend/scoring-service/src/index.ts'
      ),
    },
  },
});
