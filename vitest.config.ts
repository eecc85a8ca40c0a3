import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['bridge/**/*.test.ts'],
    environment: 'node',
    restoreMocks: true,
  },
});
