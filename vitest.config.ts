import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['lib/**/*.test.ts', 'utils/**/*.test.ts', 'scripts/**/*.test.ts'],
  },
});
