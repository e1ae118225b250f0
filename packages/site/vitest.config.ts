import { defineConfig } from 'vitest/config';
import { workspaceAliases } from '../../vitest.shared.js';

export default defineConfig({
  resolve: {
    alias: workspaceAliases,
  },
  test: {
    exclude: [
      '**/node_modules/**',
      '**/dist/**', // ビルド成果物を除外（重複実行を防止）
    ],
    environment: 'node',
  },
});
