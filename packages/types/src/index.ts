/**
 * @site-search/types
 * site-searchの共通型定義
 */

// Page
export type { Page, PageHeading } from './page.js';

// Record
export type { SearchRecord } from './record.js';

// Search index
export type {
  IndexingMode,
  PrebuildIndex,
  SearchIndexOptions,
  IndexConfig,
  SearchIndexArtifact,
} from './search-index.js';
export { INDEXING_MODES, PREBUILD_INDEX_VALUES, DEFAULT_SEARCH_OPTIONS } from './search-index.js';

// Config
export type {
  SiteSearchConfig,
  ProjectConfig,
  FilesConfig,
  SiteConfig,
  SearchConfig,
} from './config.js';
export { DEFAULT_CONFIG } from './config.js';
export {
  ConfigLoader,
  CONFIG_FILE_NAMES,
  validateConfig,
  type ResolveConfigOptions,
  type ResolvedConfig,
} from './config/index.js';
