import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['world/**/__tests__/**/*.spec.ts', 'terminal-client/src/**/__tests__/**/*.spec.ts'],
    environment: 'node',
  },
});
