import { readFile, access, realpath } from 'fs/promises';
import { constants } from 'fs';
import * as path from 'path';
import type { SiteSearchConfig } from '../config.js';
import { DEFAULT_CONFIG } from '../config.js';
import { validateConfig } from './validator.js';

/**
 * Config解決オプション
 */
export interface ResolveConfigOptions {
  /** 明示的に指定された設定ファイルパス */
  configPath?: string;
  /** 親ディレクトリを遡って探索するか（デフォルト: true） */
  traverseUp?: boolean;
  /** カレントワーキングディレクトリ（デフォルト: process.cwd()） */
  cwd?: string;
  /** 設定ファイルが必須かどうか（デフォルト: false）。trueの場合、見つからなければエラー */
  requireConfig?: boolean;
}

export interface ResolvedConfig {
  config: SiteSearchConfig;
  configPath: string | null;
  projectRoot: string;
}

/**
 * 設定ファイル名の候補
 * 優先順位: .site-search.json > site-search.json
 */
export const CONFIG_FILE_NAMES = ['.site-search.json', 'site-search.json'] as const;

export class ConfigLoader {
  /**
   * 設定ファイルを読み込む
   * @param configPath 設定ファイルのパス（デフォルト: ./.site-search.json）
   * @returns 設定オブジェクト
   */
  static async load(configPath: string = './.site-search.json'): Promise<SiteSearchConfig> {
    const config = await this.readConfigFile(configPath);
    if (!config) {
      // ファイルが存在しない場合はデフォルト設定を返す
      return this.getDefaultConfig();
    }
    return this.mergeWithDefaults(config);
  }

  /**
   * 統一されたConfig解決
   * - 設定ファイルの自動探索
   * - プロジェクトルートの決定
   * - 設定の読み込み
   */
  static async resolve(options: ResolveConfigOptions = {}): Promise<ResolvedConfig> {
    const {
      configPath: explicitPath,
      traverseUp = true,
      cwd = process.cwd(),
      requireConfig = false,
    } = options;

    // 1. 設定ファイルパスを解決
    const configPath = await this.resolveConfigPath(explicitPath, cwd, traverseUp);

    if (!configPath) {
      if (requireConfig) {
        throw new Error(
          'Configuration file not found. Please create a configuration file.\n' +
            'Run: site-search config init'
        );
      }
      // 設定ファイルが見つからない場合はカレントディレクトリを使用
      return {
        config: this.getDefaultConfig(),
        configPath: null,
        projectRoot: await this.normalizeProjectRoot(cwd),
      };
    }

    // 2. 設定を読み込む
    const partial = await this.readConfigFile(configPath);
    if (!partial && requireConfig) {
      throw new Error(`Configuration file not found: ${configPath}`);
    }
    const config = partial ? this.mergeWithDefaults(partial) : this.getDefaultConfig();

    // 3. プロジェクトルートを決定（project.rootは設定ファイルからの相対パス）
    const configDir = path.dirname(configPath);
    const projectRoot = await this.normalizeProjectRoot(
      partial?.project?.root ? path.resolve(configDir, partial.project.root) : configDir
    );

    return { config, configPath, projectRoot };
  }

  /**
   * デフォルト設定を取得
   * 呼び出し側が変更してもDEFAULT_CONFIGに影響しないようコピーを返す
   */
  static getDefaultConfig(): SiteSearchConfig {
    return this.mergeWithDefaults({});
  }

  /**
   * 設定ファイルを読み込んでバリデーション
   * @returns 存在しない場合はnull
   */
  private static async readConfigFile(
    configPath: string
  ): Promise<Partial<SiteSearchConfig> | null> {
    try {
      // ファイルの存在確認
      await access(configPath, constants.F_OK | constants.R_OK);

      const content = await readFile(configPath, 'utf-8');
      const parsed: unknown = JSON.parse(content);

      return validateConfig(parsed);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return null;
      }
      throw error;
    }
  }

  /**
   * 設定ファイルを探索
   * @param startDir 探索開始ディレクトリ
   * @param traverseUp 親ディレクトリを遡るかどうか
   */
  private static async findConfigFile(
    startDir: string,
    traverseUp: boolean
  ): Promise<string | null> {
    let currentDir = path.resolve(startDir);
    const root = path.parse(currentDir).root;

    while (true) {
      // 候補ファイルを順に試す
      for (const fileName of CONFIG_FILE_NAMES) {
        const configPath = path.join(currentDir, fileName);

        try {
          await access(configPath);
          return configPath;
        } catch {
          // ファイルが存在しない、次を試す
          continue;
        }
      }

      if (!traverseUp || currentDir === root) {
        return null;
      }

      currentDir = path.dirname(currentDir);
    }
  }

  /**
   * 設定ファイルパスを解決
   * 優先順位: 明示指定 > 環境変数 > 自動探索
   */
  private static async resolveConfigPath(
    explicitPath: string | undefined,
    cwd: string,
    traverseUp: boolean
  ): Promise<string | null> {
    if (explicitPath) {
      return path.resolve(cwd, explicitPath);
    }

    const envPath = process.env.SITE_SEARCH_CONFIG;
    if (envPath) {
      return path.resolve(cwd, envPath);
    }

    return await this.findConfigFile(cwd, traverseUp);
  }

  /**
   * プロジェクトルートを正規化
   * - 絶対パスに変換
   * - シンボリックリンクを解決
   * - 末尾のスラッシュを削除
   */
  private static async normalizeProjectRoot(root: string): Promise<string> {
    const absolutePath = path.resolve(root);

    try {
      const realPath = await realpath(absolutePath);
      return realPath.replace(/\/$/, '');
    } catch (error) {
      // ディレクトリが存在しない場合は絶対パスをそのまま返す
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return absolutePath.replace(/\/$/, '');
      }
      throw error;
    }
  }

  /**
   * 設定とデフォルト値をマージ
   */
  private static mergeWithDefaults(config: Partial<SiteSearchConfig>): SiteSearchConfig {
    return {
      version: config.version ?? DEFAULT_CONFIG.version,
      project: {
        name: config.project?.name ?? DEFAULT_CONFIG.project.name,
        root: config.project?.root ?? DEFAULT_CONFIG.project.root,
      },
      files: {
        docsDir: config.files?.docsDir ?? DEFAULT_CONFIG.files.docsDir,
        include: config.files?.include ?? [...DEFAULT_CONFIG.files.include],
        exclude: config.files?.exclude ?? [...DEFAULT_CONFIG.files.exclude],
        ignoreGitignore: config.files?.ignoreGitignore ?? DEFAULT_CONFIG.files.ignoreGitignore,
      },
      site: {
        siteDir: config.site?.siteDir ?? DEFAULT_CONFIG.site.siteDir,
        useDirectoryUrls: config.site?.useDirectoryUrls ?? DEFAULT_CONFIG.site.useDirectoryUrls,
      },
      search: {
        lang: config.search?.lang ?? DEFAULT_CONFIG.search.lang,
        separator: config.search?.separator ?? DEFAULT_CONFIG.search.separator,
        minSearchLength: config.search?.minSearchLength ?? DEFAULT_CONFIG.search.minSearchLength,
        prebuildIndex: config.search?.prebuildIndex ?? DEFAULT_CONFIG.search.prebuildIndex,
        indexing: config.search?.indexing ?? DEFAULT_CONFIG.search.indexing,
        languageAssetsDir:
          config.search?.languageAssetsDir ?? DEFAULT_CONFIG.search.languageAssetsDir,
      },
    };
  }
}
