import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    setupFiles: ['./test/setup.ts'],
    include: [
      // Unit tests in packages
      'packages/**/src/**/__tests__/**/*.test.ts',
      // Integration tests
      'test/integration/**/*.test.ts',
    ],
    exclude: ['node_modules/', 'dist/', '**/node_modules/**'],
  },
  resolve: {
    alias: {
      '@scimkit/lib-core': fileURLToPath(new URL('./packages/lib-core/src', import.meta.url)),
      '@scimkit/scim': fileURLToPath(new URL('./packages/scim/src', import.meta.url)),
    },
  },
});
