import fg from 'fast-glob';
import * as fs from 'fs/promises';
import * as path from 'path';
import { minimatch } from 'minimatch';
import type { FilesConfig } from '@site-search/types';

// ignoreパッケージの型定義（手動）
interface Ignore {
  add(pattern: string | string[]): this;
  ignores(pathname: string): boolean;
}

// ignoreパッケージのファクトリ関数をdynamic importで使用
let ignoreFactory: (() => Ignore) | null = null;

export interface FileDiscoveryOptions {
  /** プロジェクトルート */
  rootDir: string;
  /** ファイル検索設定 */
  config: FilesConfig;
}

/**
 * ソース文書の検索クラス
 * Globパターンと.gitignoreを使用してdocsDir配下のMarkdownファイルを検索
 */
export class FileDiscovery {
  private rootDir: string;
  private docsDir: string;
  private config: FilesConfig;
  private ignoreFilter: Ignore | null = null;
  private gitignoreLoaded = false;

  constructor(options: FileDiscoveryOptions) {
    this.rootDir = path.resolve(options.rootDir);
    this.docsDir = path.resolve(this.rootDir, options.config.docsDir);
    this.config = options.config;
  }

  /**
   * ソース文書のディレクトリ（絶対パス）
   */
  getDocsDir(): string {
    return this.docsDir;
  }

  /**
   * ファイルを検索
   * @returns 見つかったファイルのパス一覧（docsDirからの相対パス、ページ順）
   */
  async findFiles(): Promise<string[]> {
    await this.ensureGitignore();

    const files = await fg(this.config.include, {
      cwd: this.docsDir,
      ignore: this.config.exclude,
      absolute: false, // 相対パスを返す
      onlyFiles: true,
      dot: false, // ドットファイルを除外
    });

    return sortSourcePaths(files.filter((file) => !this.isGitignored(file)));
  }

  /**
   * 指定されたパスのうち対象となるものを返す
   * @param filePaths docsDirからの相対パス
   * @returns 対象のパス一覧（ページ順、重複なし）
   */
  async filterFiles(filePaths: string[]): Promise<string[]> {
    await this.ensureGitignore();

    const normalized = filePaths.map((filePath) => filePath.replace(/\\/g, '/').replace(/^\.\//, ''));
    const unique = [...new Set(normalized)];

    return sortSourcePaths(unique.filter((filePath) => !this.shouldIgnore(filePath)));
  }

  /**
   * パスがパターンにマッチするか判定
   * @param filePath ファイルパス（docsDirからの相対パス）
   * @returns マッチする場合true
   */
  matchesPattern(filePath: string): boolean {
    const matchesInclude = this.config.include.some((pattern) => matchGlob(filePath, pattern));
    if (!matchesInclude) {
      return false;
    }

    return !this.config.exclude.some((pattern) => matchGlob(filePath, pattern));
  }

  /**
   * パスを除外すべきか判定
   * @param filePath ファイルパス（docsDirからの相対パス）
   * @returns 除外する場合true
   */
  shouldIgnore(filePath: string): boolean {
    if (this.isGitignored(filePath)) {
      return true;
    }

    return !this.matchesPattern(filePath);
  }

  private isGitignored(filePath: string): boolean {
    return this.config.ignoreGitignore && this.ignoreFilter !== null && this.ignoreFilter.ignores(filePath);
  }

  private async ensureGitignore(): Promise<void> {
    if (this.config.ignoreGitignore && !this.gitignoreLoaded) {
      await this.loadGitignore();
      this.gitignoreLoaded = true;
    }
  }

  /**
   * .gitignoreを読み込む
   * docsDir直下の.gitignoreを使用する
   */
  private async loadGitignore(): Promise<void> {
    try {
      // ignoreパッケージを動的にロード
      if (!ignoreFactory) {
        const ignoreModule = await import('ignore');
        ignoreFactory = ignoreModule.default as unknown as () => Ignore;
      }

      const gitignorePath = path.join(this.docsDir, '.gitignore');
      const content = await fs.readFile(gitignorePath, 'utf-8');
      this.ignoreFilter = ignoreFactory().add(content);
    } catch (error) {
      // .gitignoreが存在しない場合は無視
      if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
        throw error;
      }
    }
  }
}

// minimatchはfast-globと異なり、**/patternがルートレベルにマッチしない
// fast-globの挙動に合わせるため、**/で始まるパターンは
// ルートレベルとネストレベルの両方をチェック
function matchGlob(filePath: string, pattern: string): boolean {
  if (pattern.startsWith('**/')) {
    return minimatch(filePath, pattern) || minimatch(filePath, pattern.slice(3));
  }
  return minimatch(filePath, pattern);
}

/**
 * ソースパスをページ順に並べる
 * ディレクトリごとに index.md を先頭にし、それ以外は名前順
 */
export function sortSourcePaths(filePaths: string[]): string[] {
  return [...filePaths].sort(compareSourcePaths);
}

function compareSourcePaths(a: string, b: string): number {
  const left = sortKey(a);
  const right = sortKey(b);
  const length = Math.min(left.length, right.length);

  for (let i = 0; i < length; i++) {
    if (left[i] !== right[i]) {
      return left[i] < right[i] ? -1 : 1;
    }
  }
  return left.length - right.length;
}

function sortKey(filePath: string): string[] {
  const segments = filePath.split('/');
  const last = segments.length - 1;
  if (segments[last].toLowerCase() === 'index.md') {
    segments[last] = '';
  }
  return segments;
}
