import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['test/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: [
        'src/diagnostics/types.ts',
        'src/formats/types.ts',
        'src/pipeline.ts',
        'src/lowering/stack.ts',
      ],
    },
  },
});
