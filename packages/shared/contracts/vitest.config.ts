import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'contracts',
    globals: true,
    environment: 'node',
    include: ['src/**/__tests__/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
});
