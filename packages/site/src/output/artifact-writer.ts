import * as fs from 'fs/promises';
import * as path from 'path';

export interface ArtifactWriterOptions {
  /** サイトの出力ディレクトリ（絶対パス） */
  siteDir: string;
}

/** 検索インデックスのサイト内パス */
export const SEARCH_INDEX_PATH = 'search/search_index.json';

/**
 * 検索インデックスと言語ファイルをサイトに書き出す
 */
export class ArtifactWriter {
  private searchDir: string;

  constructor(private options: ArtifactWriterOptions) {
    this.searchDir = path.join(options.siteDir, 'search');
  }

  /**
   * 検索インデックスを書き出す
   * @returns 書き出したファイルの絶対パス
   */
  async write(json: string): Promise<string> {
    const outputPath = path.join(this.options.siteDir, SEARCH_INDEX_PATH);
    await fs.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.writeFile(outputPath, json, 'utf-8');
    return outputPath;
  }

  /**
   * 言語ファイルを search/ にコピー
   * 見つからないファイルは警告してスキップ
   * @returns コピーしたファイル名
   */
  async copyLanguageAssets(files: readonly string[], fromDir: string): Promise<string[]> {
    if (files.length === 0) {
      return [];
    }

    await fs.mkdir(this.searchDir, { recursive: true });

    const copied: string[] = [];
    for (const file of files) {
      try {
        await fs.copyFile(path.join(fromDir, file), path.join(this.searchDir, file));
        copied.push(file);
      } catch (error) {
        if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
          throw error;
        }
        console.warn(`[ArtifactWriter] Language asset not found: ${file}`);
      }
    }
    return copied;
  }
}
