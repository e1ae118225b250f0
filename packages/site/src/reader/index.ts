import type { Page } from '@site-search/types';

/**
 * ソース文書をPageに変換するリーダー
 */
export interface PageReader {
  read(content: string, sourcePath: string): Page;
}

export { MarkdownPageReader, sourcePathToUrl, titleFromPath } from './markdown-page-reader.js';
export type { MarkdownPageReaderOptions } from './markdown-page-reader.js';
export { AnchorRegistry, slugifyHeading } from './anchors.js';
export { parsePages, readPagesFile, pagesFileSchema } from './pages-file.js';
