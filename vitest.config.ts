import { defineConfig } from 'vitest/config';

// Workspace packages resolve to their TypeScript sources, no build needed
const conditions = ['source'];

export default defineConfig({
  resolve: { conditions },
  ssr: { resolve: { conditions } },
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    testTimeout: 15_000,
  },
});
