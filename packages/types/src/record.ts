/**
 * 検索レコードの型定義
 *
 * Note: 親子関係はlocationのパス部分から導出できるため保持しない
 */

export interface SearchRecord {
  /** ページパス（セクションの場合は `#anchor` 付き）。インデックス内で一意 */
  location: string;
  /** ページタイトルまたは見出しテキスト */
  title: string;
  /** プレーンテキストの本文（空の場合は空文字列） */
  text: string;
}
