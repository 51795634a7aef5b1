import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    coverage: {
      provider: 'v8',
      reportsDirectory: './coverage',
      reporter: ['text', 'html'],
      include: ['src/**/*.ts'],
      // CLI 入口只做参数装配，测试覆盖在 commands.ts
      exclude: ['src/**/*.test.ts', 'src/**/__test__/**', 'src/cli/index.ts'],
    },
  },
});
