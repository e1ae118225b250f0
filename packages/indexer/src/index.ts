/**
 * @site-search/indexer
 *
 * 検索インデックス構築エンジン
 */

export { normalizePage } from './normalizer/page-normalizer.js';
export { buildHeadingArena, type HeadingArenaNode } from './normalizer/heading-arena.js';
export { normalizeWhitespace, joinText } from './normalizer/text.js';
export { SearchIndexBuilder, type BuildStats } from './builder/search-index-builder.js';
export { serializeArtifact } from './builder/serializer.js';
export { configure, createIndexConfig, type ConfigureResult } from './config/configure.js';
export { ConfigurationError } from './config/errors.js';
export {
  validateLanguages,
  resolveSupportedLanguage,
  SUPPORTED_LANGUAGES,
  LANGUAGE_FALLBACKS,
} from './config/languages.js';
