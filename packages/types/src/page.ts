/**
 * ページデータの型定義
 */

/**
 * 見出しノード
 * childrenでネストした見出しを表現する（目次と同じ形）
 */
export interface PageHeading {
  /** 見出しテキスト */
  text: string;
  /** アンカーID（ない場合はセクションとしてアドレスできない） */
  anchor?: string;
  /** 見出しレベル（1-6、省略時はネストの深さ+1） */
  level?: number;
  /** 見出し直下の本文（子見出しの本文は含まない） */
  body?: string;
  /** 子見出し */
  children?: PageHeading[];
}

export interface Page {
  /** ページのパス（サイト内URL） */
  path: string;
  /** タイトル */
  title?: string;
  /** 最初の見出しより前の本文 */
  body?: string;
  /** 見出しツリー（文書順） */
  headings?: PageHeading[];
}
