import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['**/__tests__/**/*.test.ts'],
    exclude: ['**/node_modules/**', 'dist/**', 'build/**', 'cdk.out/**'],
    // CDK synthesis and esbuild runs are slow on cold CI containers
    testTimeout: 30000,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['lib/**/*.ts', 'pipeline/lib/**/*.ts', 'functions/**/*.ts', 'layer/jwstascii-helpers/src/**/*.ts'],
      exclude: ['**/__tests__/**']
    }
  }
});
