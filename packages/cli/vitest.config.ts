import { defineConfig } from 'vitest/config';
import { workspaceAliases } from '../../vitest.shared.js';

export default defineConfig({
  resolve: {
    alias: workspaceAliases,
  },
  test: {
    exclude: [
      '**/node_modules/**',
      '**/dist/**',
    ],

    // ファイルシステムを使うテストは1つずつ実行
    pool: 'forks',
    poolOptions: {
      forks: {
        singleFork: true,
      },
    },

    // 出力設定: テスト失敗時のみ詳細を表示
    reporters: ['default'],

    // テスト環境
    environment: 'node',
  },
});
