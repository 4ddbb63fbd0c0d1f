import { coverageConfigDefaults, defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['./src/**/*.test.ts', './e2e/**/*.test.ts'],
    coverage: {
      exclude: ['**/types/**', '**/*types.ts', '**/*.d.ts', 'e2e/**', ...coverageConfigDefaults.exclude],
    },
  },
});
