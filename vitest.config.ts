import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    environment: 'node',
    // RSA key generation in beforeAll can take a moment on slow machines
    hookTimeout: 30000,
  },
});
