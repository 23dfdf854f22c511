import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';
import { dirname } from 'path';

export default defineConfig({
  root: dirname(fileURLToPath(import.meta.url)),
  test: {
    environment: 'node',
    globals: true, // So we don't need to import describe, it, etc.
    include: ['src/__tests__/**/*.test.ts'],
    // better-sqlite3 is a native addon; keep each test file in its own process
    pool: 'forks',
  },
});
