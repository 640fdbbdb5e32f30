import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

// catalog-app imports the library by its package name, as a consumer would.
const alias = {
  'search-spec/memory': fileURLToPath(new URL('./src/memory/index.ts', import.meta.url)),
  'search-spec': fileURLToPath(new URL('./src/index.ts', import.meta.url)),
};

export default defineConfig({
  test: {
    projects: [
      {
        resolve: { alias },
        test: {
          name: 'unit',
          include: ['tests/unit/**/*.test.ts'],
          testTimeout: 5000,
        },
      },
      {
        resolve: { alias },
        test: {
          name: 'app',
          include: ['catalog-app/tests/**/*.test.ts'],
          testTimeout: 10000,
        },
      },
    ],
  },
});
