import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts', 'mcp-server/src/**/*.test.ts'],
    environment: 'node',
  },
});
