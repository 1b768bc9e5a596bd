import { coverageConfigDefaults, defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['./src/**/*.test.ts'],
    coverage: {
      exclude: ['**/index.ts', '**/types.ts', 'src/types/request.ts', ...coverageConfigDefaults.exclude],
    },
  },
});
