/**
 * build コマンドのテスト
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { tmpdir } from 'os';
import { executeBuild, parseLanguageList, resolveOutputFormat, runBuild } from '../build.js';

describe('build', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = path.join(tmpdir(), `test-build-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await fs.mkdir(path.join(testDir, 'docs'), { recursive: true });
    await fs.writeFile(path.join(testDir, 'docs', 'index.md'), '# Home\n\nWelcome.\n');
    await fs.writeFile(path.join(testDir, 'docs', 'usage.md'), '# Usage\n\nRun it.\n');
    await fs.writeFile(
      path.join(testDir, '.site-search.json'),
      JSON.stringify({ version: '1.0', site: { siteDir: 'public' } })
    );

    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'info').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(testDir, { recursive: true, force: true });
  });

  describe('runBuild', () => {
    it('設定ファイルに従ってインデックスを書き出す', async () => {
      const summary = await runBuild([], { cwd: testDir });
      const root = await fs.realpath(testDir);

      expect(summary).toEqual({
        pages: 2,
        records: 2,
        collisions: 0,
        outputPath: path.join(root, 'public', 'search', 'search_index.json'),
        lang: ['en'],
        assets: [],
      });
    });

    it('コマンドラインの指定で設定を上書きできる', async () => {
      const summary = await runBuild(['usage.md'], {
        cwd: testDir,
        indexing: 'sections',
        siteDir: 'out',
        lang: ['fr', 'xx'],
      });
      const root = await fs.realpath(testDir);

      expect(summary.pages).toBe(1);
      expect(summary.records).toBe(2);
      expect(summary.lang).toEqual(['fr', 'en']);
      expect(summary.outputPath).toBe(path.join(root, 'out', 'search', 'search_index.json'));

      const json = await fs.readFile(summary.outputPath, 'utf-8');
      expect(json).toContain(
        '"docs":[{"location":"usage/","title":"Usage","text":""},{"location":"usage/#usage","title":"Usage","text":"Run it."}]'
      );
    });
  });

  describe('parseLanguageList', () => {
    it('カンマ区切りの言語コードを配列にする', () => {
      expect(parseLanguageList('en, ja,,de')).toEqual(['en', 'ja', 'de']);
      expect(parseLanguageList('fr')).toEqual(['fr']);
    });
  });

  describe('resolveOutputFormat', () => {
    it('text/jsonを受け付け、省略時はtext', () => {
      expect(resolveOutputFormat(undefined)).toBe('text');
      expect(resolveOutputFormat('json')).toBe('json');
    });

    it('未知の形式はエラー', () => {
      expect(() => resolveOutputFormat('xml')).toThrow('format must be "text" or "json" (got "xml")');
    });
  });

  describe('executeBuild', () => {
    it('テキスト形式でサマリーを出力する', async () => {
      await executeBuild([], { cwd: testDir, format: 'text' });
      const root = await fs.realpath(testDir);

      expect(vi.mocked(console.log)).toHaveBeenCalledWith(
        [
          `Search index written: ${path.join(root, 'public', 'search', 'search_index.json')}`,
          '  Pages:      2',
          '  Records:    2',
          '  Collisions: 0',
          '  Languages:  en',
        ].join('\n')
      );
    });

    it('未知の出力形式ではエラーを表示して何も書き出さずに終了する', async () => {
      vi.spyOn(process, 'exit').mockImplementation((code) => {
        throw new Error(`process.exit(${String(code)})`);
      });

      await expect(executeBuild([], { cwd: testDir, format: 'xml' })).rejects.toThrow(
        'process.exit(1)'
      );
      expect(vi.mocked(console.error)).toHaveBeenCalledWith(
        'Error: format must be "text" or "json" (got "xml")'
      );
      await expect(fs.access(path.join(testDir, 'public'))).rejects.toThrow();
    });

    it('不正な設定の場合はエラーを表示して終了する', async () => {
      vi.spyOn(process, 'exit').mockImplementation((code) => {
        throw new Error(`process.exit(${String(code)})`);
      });

      await expect(executeBuild([], { cwd: testDir, indexing: 'paragraphs' })).rejects.toThrow(
        'process.exit(1)'
      );
      expect(vi.mocked(console.error)).toHaveBeenCalledWith(
        'Error: indexing must be "full", "sections" or "titles" (got "paragraphs")'
      );
    });
  });
});
