import * as fs from 'fs/promises';
import * as path from 'path';
import type { IndexConfig, Page, SiteSearchConfig } from '@site-search/types';
import { createIndexConfig, SearchIndexBuilder, type BuildStats } from '@site-search/indexer';
import { FileDiscovery } from './discovery/file-discovery.js';
import { MarkdownPageReader } from './reader/markdown-page-reader.js';
import { readPagesFile } from './reader/pages-file.js';
import { ArtifactWriter } from './output/artifact-writer.js';
import { selectLanguageAssets } from './output/language-assets.js';

export interface SiteIndexBuildOptions {
  /** プロジェクトルート（絶対パス） */
  rootDir: string;
  /** マージ済みの設定 */
  config: SiteSearchConfig;
  /** 対象のソースパス（docsDirからの相対パス）。省略時は全件検索 */
  paths?: string[];
  /** 構造化済みページのJSONファイル。指定時はMarkdownを読まない */
  pagesFile?: string;
}

export interface SiteIndexBuildResult {
  /** 検証済みのインデックス設定 */
  indexConfig: IndexConfig;
  /** 書き出したJSON */
  json: string;
  stats: BuildStats;
  /** search_index.jsonの絶対パス */
  outputPath: string;
  /** コピーした言語ファイル */
  assets: string[];
}

/**
 * サイトの検索インデックスを構築して書き出す
 * @throws ConfigurationError search設定が不正な場合（何も書き出さない）
 */
export async function buildSiteIndex(options: SiteIndexBuildOptions): Promise<SiteIndexBuildResult> {
  const { rootDir, config } = options;

  // 1. 設定の検証（不正ならここで中断）
  const indexConfig = createIndexConfig(config.search);

  // 2. ページの読み込み
  const pages = options.pagesFile
    ? await readPagesFile(path.resolve(rootDir, options.pagesFile))
    : await readMarkdownPages(rootDir, config, options.paths);

  // 3. インデックス構築（ページ順に追加）
  const builder = new SearchIndexBuilder(indexConfig);
  for (const page of pages) {
    builder.addPage(page);
  }
  const json = builder.generateIndex();

  // 4. 書き出し
  const writer = new ArtifactWriter({ siteDir: path.resolve(rootDir, config.site.siteDir) });
  const outputPath = await writer.write(json);

  let assets: string[] = [];
  if (config.search.languageAssetsDir !== null) {
    assets = await writer.copyLanguageAssets(
      selectLanguageAssets(indexConfig.lang),
      path.resolve(rootDir, config.search.languageAssetsDir)
    );
  }

  return { indexConfig, json, stats: builder.getStats(), outputPath, assets };
}

async function readMarkdownPages(
  rootDir: string,
  config: SiteSearchConfig,
  paths: string[] | undefined
): Promise<Page[]> {
  const discovery = new FileDiscovery({ rootDir, config: config.files });
  const files =
    paths && paths.length > 0 ? await discovery.filterFiles(paths) : await discovery.findFiles();

  const reader = new MarkdownPageReader({ useDirectoryUrls: config.site.useDirectoryUrls });
  const pages: Page[] = [];
  for (const file of files) {
    const content = await fs.readFile(path.join(discovery.getDocsDir(), file), 'utf-8');
    pages.push(reader.read(content, file));
  }
  return pages;
}
