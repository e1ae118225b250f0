/**
 * 設定ファイルの型定義
 */

import type { SearchIndexOptions } from './search-index.js';

export interface SiteSearchConfig {
  version: string;
  project: ProjectConfig;
  files: FilesConfig;
  site: SiteConfig;
  search: SearchConfig;
}

export interface ProjectConfig {
  /** プロジェクト名 */
  name: string;
  /** プロジェクトルート */
  root: string;
}

export interface FilesConfig {
  /** ソース文書のディレクトリ（プロジェクトルートからの相対パス） */
  docsDir: string;
  /** 含めるファイルパターン（glob） */
  include: string[];
  /** 除外するファイルパターン（glob） */
  exclude: string[];
  /** .gitignoreを尊重するか */
  ignoreGitignore: boolean;
}

export interface SiteConfig {
  /** サイトの出力ディレクトリ */
  siteDir: string;
  /** `a/b.md` を `a/b/` として公開するか（falseなら `a/b.html`） */
  useDirectoryUrls: boolean;
}

/**
 * search設定
 * インデックスオプションの検証はconfigure()で行う
 */
export interface SearchConfig extends SearchIndexOptions {
  /** lunr-languagesのファイルがあるディレクトリ（nullならコピーしない） */
  languageAssetsDir: string | null;
}

/** デフォルト設定 */
export const DEFAULT_CONFIG: SiteSearchConfig = {
  version: '1.0',
  project: {
    name: '',
    root: '.',
  },
  files: {
    docsDir: 'docs',
    include: ['**/*.md'],
    exclude: ['**/node_modules/**', '**/.git/**'],
    ignoreGitignore: true,
  },
  site: {
    siteDir: 'site',
    useDirectoryUrls: true,
  },
  search: {
    lang: ['en'],
    separator: '[\\s\\-]+',
    minSearchLength: 3,
    prebuildIndex: false,
    indexing: 'full',
    languageAssetsDir: null,
  },
};
