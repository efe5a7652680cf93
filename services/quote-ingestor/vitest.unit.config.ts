import { defineConfig } from 'vitest/config';
export default defineConfig({
  test: {
    environment: 'node',
    clearMocks: true,
    include: ['tests/unit/**/*.test.ts'],
    reporters: ['default'],
    coverage: { reporter: ['text', 'lcov'] }
  }
});
