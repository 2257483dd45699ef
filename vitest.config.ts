import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

/**
 * Vitest configuration.
 * Mirrors the @shared/ path alias from tsconfig.json so tests resolve shared code.
 */
export default defineConfig({
  resolve: {
    alias: {
      '@shared': fileURLToPath(new URL('./shared', import.meta.url)),
    },
  },
  test: {
    include: ['shared/**/*.test.ts', 'cli/**/*.test.ts'],
    environment: 'node',
  },
});
