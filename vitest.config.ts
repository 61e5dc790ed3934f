import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts', 'infrastructure/**/*.test.ts'],
    exclude: ['node_modules', 'dist', 'cdk.out', 'layer'],
    testTimeout: 30000,
  },
});
