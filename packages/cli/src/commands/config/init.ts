/**
 * config init コマンド
 * 設定ファイルを生成する
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { CONFIG_FILE_NAMES, ConfigLoader, type SiteSearchConfig } from '@site-search/types';

export interface ConfigInitOptions {
  /** 既存ファイルを上書き */
  force?: boolean;
  /** カレントワーキングディレクトリ（テスト用、デフォルト: process.cwd()） */
  cwd?: string;
}

/**
 * デフォルト設定オブジェクトを生成
 */
function createDefaultConfig(projectRoot: string): SiteSearchConfig {
  const config = ConfigLoader.getDefaultConfig();
  config.project.name = path.basename(projectRoot);
  return config;
}

/**
 * config init コマンドを実行
 * @returns 生成したファイルのパス
 */
export async function initConfig(options: ConfigInitOptions = {}): Promise<string> {
  const cwd = options.cwd || process.cwd();
  const configPath = path.join(cwd, CONFIG_FILE_NAMES[0]);

  console.log('Initializing site-search configuration...\n');

  // 既存ファイルチェック
  try {
    await fs.access(configPath);

    if (!options.force) {
      throw new Error(
        `Configuration file already exists: ${configPath}\n` +
        'Use --force to overwrite the existing file.'
      );
    }

    console.log('⚠️  Overwriting existing configuration file...\n');
  } catch (error) {
    // ファイルが存在しない場合は正常（続行）
    if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
      throw error;
    }
  }

  const config = createDefaultConfig(cwd);

  // ファイル書き込み
  const configContent = JSON.stringify(config, null, 2) + '\n';
  await fs.writeFile(configPath, configContent, 'utf-8');

  console.log('✅ Configuration file created successfully!\n');
  console.log(`📄 File: ${configPath}`);
  console.log(`🚀 Project: ${config.project.name}`);
  console.log(`📁 Docs: ${config.files.docsDir}\n`);
  console.log('Next steps:');
  console.log(`  1. Review and customize ${CONFIG_FILE_NAMES[0]}`);
  console.log('  2. Build the index: site-search build\n');

  return configPath;
}

/**
 * config init コマンドを実行（CLI用）
 */
export async function executeConfigInit(options: ConfigInitOptions): Promise<void> {
  try {
    await initConfig(options);
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }
}
