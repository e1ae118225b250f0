/**
 * SearchIndexBuilder
 * ページごとにレコードを蓄積し、検索インデックスの成果物を生成する
 */

import type { IndexConfig, Page, SearchIndexArtifact, SearchRecord } from '@site-search/types';
import { normalizePage } from '../normalizer/page-normalizer.js';
import { serializeArtifact } from './serializer.js';

export interface BuildStats {
  /** 追加したページ数 */
  pages: number;
  /** 重複除去後のレコード数 */
  records: number;
  /** locationの衝突（上書き）回数 */
  collisions: number;
}

/**
 * 1回のビルドに対応するビルダー
 *
 * addPageはページ順に1件ずつ呼び出すこと（衝突時は後勝ちのため順序に依存する）
 */
export class SearchIndexBuilder {
  /** location -> レコード（挿入順を保持。上書きしても位置は変わらない） */
  private records = new Map<string, SearchRecord>();
  private pageCount = 0;
  private collisionCount = 0;

  constructor(private readonly config: IndexConfig) {}

  /**
   * ページを追加
   */
  addPage(page: Page): void {
    for (const record of normalizePage(page, this.config.indexing)) {
      if (this.records.has(record.location)) {
        this.collisionCount++;
        console.warn(
          `[SearchIndexBuilder] Duplicate location "${record.location}" (page: ${page.path}), overwriting the earlier record`
        );
      }
      this.records.set(record.location, record);
    }
    this.pageCount++;
  }

  /**
   * 成果物を構築
   * 返り値はビルダーの状態と参照を共有しない
   */
  buildArtifact(): SearchIndexArtifact {
    return {
      config: {
        lang: [...this.config.lang],
        separator: this.config.separator,
        min_search_length: this.config.minSearchLength,
        prebuild_index: this.config.prebuildIndex,
      },
      docs: Array.from(this.records.values(), (record) => ({ ...record })),
    };
  }

  /**
   * 成果物をシリアライズして返す
   * addPageを挟まなければ何度呼んでも同じ文字列になる
   */
  generateIndex(): string {
    return serializeArtifact(this.buildArtifact());
  }

  /**
   * ビルドの統計を取得
   */
  getStats(): BuildStats {
    return {
      pages: this.pageCount,
      records: this.records.size,
      collisions: this.collisionCount,
    };
  }
}
