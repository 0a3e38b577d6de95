import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['parser/tests/**/*.test.ts']
  }
});
