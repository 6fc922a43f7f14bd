import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const dir = (p: string) => fileURLToPath(new URL(p, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@api': dir('./src/api'),
      '@config': dir('./src/config'),
      '@core': dir('./src/core'),
      '@infra': dir('./src/infrastructure'),
      '@middleware': dir('./src/middleware'),
      '@services': dir('./src/services'),
      '@test': dir('./src/test'),
      '@utils': dir('./src/utils'),
    },
  },
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    setupFiles: ['./src/test/setupEnv.ts'],
    restoreMocks: true,
  },
});
