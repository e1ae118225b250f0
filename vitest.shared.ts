import { fileURLToPath } from 'node:url';

/**
 * ワークスペースパッケージをビルドせずにソースから読み込むためのエイリアス
 * package.jsonのexportsはビルド成果物（dist/）を指すため、テストではsrc/に向ける
 */
export const workspaceAliases: Record<string, string> = {
  '@site-search/types': fileURLToPath(new URL('./packages/types/src/index.ts', import.meta.url)),
  '@site-search/indexer': fileURLToPath(new URL('./packages/indexer/src/index.ts', import.meta.url)),
  '@site-search/site': fileURLToPath(new URL('./packages/site/src/index.ts', import.meta.url)),
};
