/**
 * 検索インデックス設定と成果物の型定義
 */

import type { SearchRecord } from './record.js';

/** インデックスの粒度 */
export type IndexingMode = 'full' | 'sections' | 'titles';

/** 事前ビルドの指定（成果物にそのまま渡す） */
export type PrebuildIndex = boolean | 'node' | 'python';

export const INDEXING_MODES: readonly IndexingMode[] = ['full', 'sections', 'titles'];

export const PREBUILD_INDEX_VALUES: readonly PrebuildIndex[] = [false, true, 'node', 'python'];

/**
 * 検索インデックスのオプション（ホストから渡される未検証の値）
 */
export interface SearchIndexOptions {
  /** 言語コード（単一または配列） */
  lang?: unknown;
  /** 単語区切りの正規表現 */
  separator?: unknown;
  /** 最小検索文字数 */
  minSearchLength?: unknown;
  /** 事前ビルド指定 */
  prebuildIndex?: unknown;
  /** インデックスの粒度 */
  indexing?: unknown;
}

/**
 * 検証済みのインデックス設定
 * ビルド中は変更しない
 */
export interface IndexConfig {
  readonly lang: readonly string[];
  readonly separator: string;
  readonly minSearchLength: number;
  readonly prebuildIndex: PrebuildIndex;
  readonly indexing: IndexingMode;
}

/**
 * 成果物（search_index.json）
 * キー名は検索ランタイムの形式に合わせる
 */
export interface SearchIndexArtifact {
  config: {
    lang: string[];
    separator: string;
    min_search_length: number;
    prebuild_index: PrebuildIndex;
  };
  docs: SearchRecord[];
}

/** デフォルトのインデックスオプション */
export const DEFAULT_SEARCH_OPTIONS = {
  lang: ['en'],
  separator: '[\\s\\-]+',
  minSearchLength: 3,
  prebuildIndex: false,
  indexing: 'full',
} as const satisfies SearchIndexOptions;
