import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

const rootDir = fileURLToPath(new URL('./', import.meta.url));

export default defineConfig({
  resolve: {
    alias: [{ find: /^@\//, replacement: rootDir }],
  },
  test: {
    environment: 'node',
    include: ['**/tests/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**'],
  },
});
