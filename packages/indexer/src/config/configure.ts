import {
  DEFAULT_SEARCH_OPTIONS,
  INDEXING_MODES,
  PREBUILD_INDEX_VALUES,
  type IndexConfig,
  type IndexingMode,
  type PrebuildIndex,
  type SearchIndexOptions,
} from '@site-search/types';
import { ConfigurationError } from './errors.js';
import { validateLanguages } from './languages.js';

export type ConfigureResult =
  | { ok: true; config: IndexConfig }
  | { ok: false; error: ConfigurationError };

/**
 * インデックスオプションを検証して設定を作成
 * 1つでも不正な値があれば設定全体を拒否する
 */
export function configure(options: SearchIndexOptions = {}): ConfigureResult {
  try {
    return { ok: true, config: createIndexConfig(options) };
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return { ok: false, error };
    }
    throw error;
  }
}

/**
 * インデックスオプションを検証して設定を作成（例外版）
 * @throws ConfigurationError
 */
export function createIndexConfig(options: SearchIndexOptions = {}): IndexConfig {
  const indexing = options.indexing ?? DEFAULT_SEARCH_OPTIONS.indexing;
  if (!isIndexingMode(indexing)) {
    throw new ConfigurationError(
      `indexing must be "full", "sections" or "titles" (got ${formatValue(indexing)})`,
      'indexing'
    );
  }

  const minSearchLength = options.minSearchLength ?? DEFAULT_SEARCH_OPTIONS.minSearchLength;
  if (typeof minSearchLength !== 'number' || !Number.isInteger(minSearchLength) || minSearchLength < 0) {
    throw new ConfigurationError(
      `minSearchLength must be a non-negative integer (got ${formatValue(minSearchLength)})`,
      'minSearchLength'
    );
  }

  const separator = options.separator ?? DEFAULT_SEARCH_OPTIONS.separator;
  if (typeof separator !== 'string') {
    throw new ConfigurationError('separator must be a string', 'separator');
  }
  if (!isValidPattern(separator)) {
    throw new ConfigurationError(
      `separator must be a valid regular expression (got ${formatValue(separator)})`,
      'separator'
    );
  }

  const prebuildIndex = options.prebuildIndex ?? DEFAULT_SEARCH_OPTIONS.prebuildIndex;
  if (!isPrebuildIndex(prebuildIndex)) {
    throw new ConfigurationError(
      `prebuildIndex must be false, true, "node" or "python" (got ${formatValue(prebuildIndex)})`,
      'prebuildIndex'
    );
  }

  const lang = validateLanguages(options.lang ?? DEFAULT_SEARCH_OPTIONS.lang);

  return Object.freeze({
    lang: Object.freeze(lang),
    separator,
    minSearchLength,
    prebuildIndex,
    indexing,
  });
}

function isIndexingMode(value: unknown): value is IndexingMode {
  return INDEXING_MODES.some((mode) => mode === value);
}

function isPrebuildIndex(value: unknown): value is PrebuildIndex {
  return PREBUILD_INDEX_VALUES.some((candidate) => candidate === value);
}

function isValidPattern(pattern: string): boolean {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
}

function formatValue(value: unknown): string {
  return typeof value === 'string' ? `"${value}"` : String(value);
}
