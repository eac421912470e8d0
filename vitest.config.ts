import { coverageConfigDefaults, defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    include: ['./src/**/*.test.ts'],
    coverage: {
      exclude: ['examples/**', '**/types/**', '**/*types.ts', '**/*.d.ts', ...coverageConfigDefaults.exclude],
    },
  },
});
