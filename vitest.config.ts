import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/formfiller/__tests__/**/*.test.ts'],
    environment: 'node',
  },
});
