/**
 * @site-search/site
 *
 * ソース文書の検索・読み込みと検索インデックスの書き出し
 */

export { FileDiscovery, sortSourcePaths, type FileDiscoveryOptions } from './discovery/file-discovery.js';
export {
  MarkdownPageReader,
  AnchorRegistry,
  slugifyHeading,
  sourcePathToUrl,
  titleFromPath,
  parsePages,
  readPagesFile,
  pagesFileSchema,
  type PageReader,
  type MarkdownPageReaderOptions,
} from './reader/index.js';
export { ArtifactWriter, SEARCH_INDEX_PATH, type ArtifactWriterOptions } from './output/artifact-writer.js';
export { selectLanguageAssets } from './output/language-assets.js';
export {
  buildSiteIndex,
  type SiteIndexBuildOptions,
  type SiteIndexBuildResult,
} from './site-index-build.js';
