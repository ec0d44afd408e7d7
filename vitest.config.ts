import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // 需要 window 的测试文件通过 @vitest-environment jsdom 单独指定
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    setupFiles: ['./tests/setup.ts'],
    restoreMocks: true,
  },
});
