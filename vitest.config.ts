import { defineConfig } from 'vitest/config';

export default defineConfig({
  esbuild: {
    jsx: 'automatic',
  },
  test: {
    include: [
      'backend/src/**/__tests__/**/*.test.ts',
      'frontend/src/**/__tests__/**/*.test.tsx',
    ],
    environment: 'node',
    env: {
      LOG_LEVEL: 'silent',
    },
  },
});
