import path from 'node:path';
import swc from 'unplugin-swc';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  plugins: [swc.vite()],
  resolve: {
    alias: {
      '@spo-admin/logger': path.resolve(__dirname, 'packages/logger/src/index.ts'),
      '@spo-admin/utils': path.resolve(__dirname, 'packages/utils/src/index.ts'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    exclude: ['**/node_modules/**', '**/dist/**'],
    include: ['packages/*/src/**/*.spec.ts', 'services/*/src/**/*.spec.ts'],
    setupFiles: ['services/admin-console/test/setup.ts'],
  },
});
