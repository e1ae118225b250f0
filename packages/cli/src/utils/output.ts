/**
 * 出力フォーマットユーティリティ
 */

import type { BuildStats } from '@site-search/indexer';

export interface BuildSummary extends BuildStats {
  /** search_index.jsonの絶対パス */
  outputPath: string;
  /** 検証済みの言語コード */
  lang: string[];
  /** コピーした言語ファイル */
  assets: string[];
}

/**
 * ビルド結果をJSON形式で出力
 */
export function formatBuildSummaryAsJson(summary: BuildSummary): string {
  return JSON.stringify(summary, null, 2);
}

/**
 * ビルド結果をテキスト形式で出力
 */
export function formatBuildSummaryAsText(summary: BuildSummary): string {
  const lines = [
    `Search index written: ${summary.outputPath}`,
    `  Pages:      ${summary.pages}`,
    `  Records:    ${summary.records}`,
    `  Collisions: ${summary.collisions}`,
    `  Languages:  ${summary.lang.join(', ')}`,
  ];

  if (summary.assets.length > 0) {
    lines.push(`  Assets:     ${summary.assets.join(', ')}`);
  }

  return lines.join('\n');
}
