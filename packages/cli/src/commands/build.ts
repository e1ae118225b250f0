/**
 * build コマンド実装
 */

import * as path from 'path';
import { ConfigLoader, type SiteSearchConfig } from '@site-search/types';
import { buildSiteIndex } from '@site-search/site';
import {
  formatBuildSummaryAsJson,
  formatBuildSummaryAsText,
  type BuildSummary,
} from '../utils/output.js';

export interface BuildCommandOptions {
  config?: string;
  docsDir?: string;
  siteDir?: string;
  pages?: string;
  indexing?: string;
  lang?: string[];
  format?: string;
  /** カレントワーキングディレクトリ（テスト用、デフォルト: process.cwd()） */
  cwd?: string;
}

export type OutputFormat = 'text' | 'json';

const OUTPUT_FORMATS: readonly OutputFormat[] = ['text', 'json'];

/**
 * --lang の値（カンマ区切り）を言語コードの配列に変換
 */
export function parseLanguageList(value: string): string[] {
  return value
    .split(',')
    .map((code) => code.trim())
    .filter((code) => code !== '');
}

/**
 * 出力形式を検証
 */
export function resolveOutputFormat(format: string | undefined): OutputFormat {
  const resolved = format ?? 'text';
  const match = OUTPUT_FORMATS.find((candidate) => candidate === resolved);
  if (match === undefined) {
    throw new Error(`format must be "text" or "json" (got "${resolved}")`);
  }
  return match;
}

/**
 * コマンドラインの指定で設定を上書き
 */
function applyOverrides(config: SiteSearchConfig, options: BuildCommandOptions): SiteSearchConfig {
  return {
    ...config,
    files: {
      ...config.files,
      docsDir: options.docsDir ?? config.files.docsDir,
    },
    site: {
      ...config.site,
      siteDir: options.siteDir ?? config.site.siteDir,
    },
    search: {
      ...config.search,
      indexing: options.indexing ?? config.search.indexing,
      lang: options.lang ?? config.search.lang,
    },
  };
}

/**
 * インデックスを構築してサマリーを返す
 */
export async function runBuild(paths: string[], options: BuildCommandOptions = {}): Promise<BuildSummary> {
  const cwd = options.cwd || process.cwd();

  // 設定を解決
  const { config, projectRoot } = await ConfigLoader.resolve({
    configPath: options.config,
    cwd,
  });

  const result = await buildSiteIndex({
    rootDir: projectRoot,
    config: applyOverrides(config, options),
    paths,
    pagesFile: options.pages ? path.resolve(cwd, options.pages) : undefined,
  });

  return {
    ...result.stats,
    outputPath: result.outputPath,
    lang: [...result.indexConfig.lang],
    assets: result.assets,
  };
}

/**
 * build コマンドを実行
 */
export async function executeBuild(paths: string[], options: BuildCommandOptions): Promise<void> {
  try {
    // 書き出す前に出力形式を検証
    const format = resolveOutputFormat(options.format);
    const summary = await runBuild(paths, options);

    const output = format === 'json'
      ? formatBuildSummaryAsJson(summary)
      : formatBuildSummaryAsText(summary);

    console.log(output);
  } catch (error) {
    if (error instanceof Error) {
      console.error(`Error: ${error.message}`);
    } else {
      console.error('Error: an unknown error occurred');
    }
    process.exit(1);
  }
}
