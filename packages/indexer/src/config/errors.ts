import type { SearchIndexOptions } from '@site-search/types';

/**
 * インデックスオプションの検証エラー
 * ビルド開始前にのみ発生し、ビルドを中断する
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly field: keyof SearchIndexOptions
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
