/**
 * site-search CLI のコマンド定義
 */

import { Command } from 'commander';
import { executeBuild, parseLanguageList, type BuildCommandOptions } from './commands/build.js';
import { executeConfigInit, type ConfigInitOptions } from './commands/config/init.js';

export function createProgram(version: string): Command {
  // グローバル設定（preSubcommandフックで設定）
  let globalConfigPath: string | undefined;

  const program = new Command();

  program
    .name('site-search')
    .description('静的サイトの検索インデックスを生成')
    .version(version)
    .option('-c, --config <path>', '設定ファイルのパス')
    .hook('preSubcommand', (thisCommand) => {
      const opts = thisCommand.opts<{ config?: string }>();
      globalConfigPath = opts.config;
    });

  // build コマンド
  program
    .command('build')
    .description('検索インデックスを構築')
    .argument('[paths...]', '対象のソースパス（docsDirからの相対パス）')
    .option('--docs-dir <dir>', 'ソース文書のディレクトリ')
    .option('--site-dir <dir>', 'サイトの出力ディレクトリ')
    .option('--pages <file>', '構造化済みページのJSONファイル')
    .option('--indexing <mode>', 'インデックスの粒度 (full, sections, titles)')
    .option('--lang <codes>', '言語コード（カンマ区切り、例: en,ja）', parseLanguageList)
    .option('--format <format>', '出力形式 (text, json)', 'text')
    .action(async (paths: string[], options: BuildCommandOptions) => {
      await executeBuild(paths, { ...options, config: globalConfigPath });
    });

  // config コマンド
  const configCmd = program
    .command('config')
    .description('設定管理');

  configCmd
    .command('init')
    .description('設定ファイルを初期化')
    .option('-f, --force', '既存ファイルを上書き')
    .action(async (options: ConfigInitOptions) => {
      await executeConfigInit(options);
    });

  return program;
}
