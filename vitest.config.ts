import { dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const __dirname = dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    root: __dirname,
    include: ['packages/*/tests/**/*.test.ts'],
    testTimeout: 10000,
  },
});
