import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';
import tsconfigPaths from 'vite-tsconfig-paths';

export default defineConfig({
  plugins: [tsconfigPaths()],
  test: {
    globals: true,
    environment: 'node',
    setupFiles: ['./api/tests/setup.ts'],
    include: ['api/tests/**/*.test.ts', 'sdk/tests/**/*.test.ts'],
    pool: 'forks',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['api/src/**/*.ts', 'sdk/src/**/*.ts'],
      exclude: [
        'api/src/types/**',
        'api/src/index.ts',
      ],
    },
  },
  resolve: {
    alias: {
      '@': fileURLToPath(new URL('./api/src', import.meta.url)),
    },
  },
});
