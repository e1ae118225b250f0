import { describe, it, expect, beforeAll, afterAll, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { tmpdir } from 'os';
import { ConfigLoader } from '../loader.js';
import { validateConfig } from '../validator.js';

const TEST_DIR = path.join(tmpdir(), `site-search-config-test-${process.pid}`);

describe('ConfigLoader', () => {
  beforeAll(async () => {
    // テスト用ディレクトリ作成
    await fs.mkdir(TEST_DIR, { recursive: true });
  });

  afterAll(async () => {
    // テスト用ディレクトリ削除
    await fs.rm(TEST_DIR, { recursive: true, force: true });
  });

  describe('getDefaultConfig', () => {
    it('デフォルト設定を取得できる', () => {
      const config = ConfigLoader.getDefaultConfig();
      expect(config.version).toBe('1.0');
      expect(config.files.docsDir).toBe('docs');
      expect(config.files.include).toEqual(['**/*.md']);
      expect(config.site.siteDir).toBe('site');
      expect(config.search.indexing).toBe('full');
    });

    it('返り値を変更してもデフォルト設定に影響しない', () => {
      const config = ConfigLoader.getDefaultConfig();
      config.files.include.push('**/*.txt');

      expect(ConfigLoader.getDefaultConfig().files.include).toEqual(['**/*.md']);
    });
  });

  describe('load', () => {
    it('存在しないファイルはデフォルト設定を返す', async () => {
      const config = await ConfigLoader.load(path.join(TEST_DIR, 'nonexistent.json'));
      expect(config).toEqual(ConfigLoader.getDefaultConfig());
    });

    it('部分的な設定をデフォルト値とマージする', async () => {
      const configPath = path.join(TEST_DIR, 'partial.json');
      await fs.writeFile(
        configPath,
        JSON.stringify({ site: { siteDir: 'public' }, search: { indexing: 'sections', lang: 'de' } })
      );

      const config = await ConfigLoader.load(configPath);
      expect(config.site.siteDir).toBe('public');
      expect(config.search.indexing).toBe('sections');
      expect(config.search.lang).toBe('de');
      // 他はデフォルト値
      expect(config.site.useDirectoryUrls).toBe(true);
      expect(config.search.minSearchLength).toBe(3);
      expect(config.search.languageAssetsDir).toBeNull();
    });

    it('不正なJSON形式でエラー', async () => {
      const configPath = path.join(TEST_DIR, 'invalid-json.json');
      await fs.writeFile(configPath, '{ invalid json }');

      await expect(ConfigLoader.load(configPath)).rejects.toThrow();
    });

    it('型が不正な設定でエラー', async () => {
      const configPath = path.join(TEST_DIR, 'invalid-type.json');
      await fs.writeFile(configPath, JSON.stringify({ site: { useDirectoryUrls: 'yes' } }));

      await expect(ConfigLoader.load(configPath)).rejects.toThrow(
        'config.site.useDirectoryUrls must be a boolean'
      );
    });
  });

  describe('resolve', () => {
    const originalEnv = process.env.SITE_SEARCH_CONFIG;

    afterEach(() => {
      if (originalEnv === undefined) {
        delete process.env.SITE_SEARCH_CONFIG;
      } else {
        process.env.SITE_SEARCH_CONFIG = originalEnv;
      }
    });

    it('親ディレクトリを遡って設定ファイルを見つける', async () => {
      delete process.env.SITE_SEARCH_CONFIG;
      const projectDir = path.join(TEST_DIR, 'project');
      const nestedDir = path.join(projectDir, 'docs', 'guide');
      await fs.mkdir(nestedDir, { recursive: true });
      await fs.writeFile(
        path.join(projectDir, '.site-search.json'),
        JSON.stringify({ project: { name: 'demo' } })
      );

      const resolved = await ConfigLoader.resolve({ cwd: nestedDir });

      expect(resolved.configPath).toBe(path.join(projectDir, '.site-search.json'));
      expect(resolved.projectRoot).toBe(await fs.realpath(projectDir));
      expect(resolved.config.project.name).toBe('demo');
    });

    it('project.rootは設定ファイルからの相対パスとして解決する', async () => {
      delete process.env.SITE_SEARCH_CONFIG;
      const configDir = path.join(TEST_DIR, 'with-root');
      await fs.mkdir(path.join(configDir, 'site-src'), { recursive: true });
      const configPath = path.join(configDir, 'site-search.json');
      await fs.writeFile(configPath, JSON.stringify({ project: { root: 'site-src' } }));

      const resolved = await ConfigLoader.resolve({ configPath, cwd: TEST_DIR });

      expect(resolved.projectRoot).toBe(await fs.realpath(path.join(configDir, 'site-src')));
    });

    it('環境変数で設定ファイルを指定できる', async () => {
      const configPath = path.join(TEST_DIR, 'from-env.json');
      await fs.writeFile(configPath, JSON.stringify({ files: { docsDir: 'content' } }));
      process.env.SITE_SEARCH_CONFIG = configPath;

      const resolved = await ConfigLoader.resolve({ cwd: TEST_DIR });

      expect(resolved.configPath).toBe(configPath);
      expect(resolved.config.files.docsDir).toBe('content');
    });

    it('設定ファイルが必須で見つからない場合はエラー', async () => {
      delete process.env.SITE_SEARCH_CONFIG;
      const emptyDir = path.join(TEST_DIR, 'empty');
      await fs.mkdir(emptyDir, { recursive: true });

      await expect(
        ConfigLoader.resolve({ cwd: emptyDir, traverseUp: false, requireConfig: true })
      ).rejects.toThrow('Configuration file not found');
    });
  });
});

describe('validateConfig', () => {
  it('有効な設定を検証できる', () => {
    const config = {
      version: '1.0',
      project: { name: 'test', root: '.' },
      files: {
        docsDir: 'docs',
        include: ['**/*.md'],
        exclude: ['**/node_modules/**'],
        ignoreGitignore: true,
      },
      site: { siteDir: 'site', useDirectoryUrls: false },
      search: { lang: ['en'], indexing: 'sections', languageAssetsDir: 'vendor/lunr-languages' },
    };

    expect(() => validateConfig(config)).not.toThrow();
  });

  it('オブジェクト以外でエラー', () => {
    expect(() => validateConfig(null)).toThrow('Config must be an object');
    expect(() => validateConfig('string')).toThrow('Config must be an object');
    expect(() => validateConfig([])).toThrow('Config must be an object');
  });

  describe('files設定', () => {
    it('includeが配列でない場合エラー', () => {
      expect(() => validateConfig({ files: { include: 'not-array' } })).toThrow(
        'config.files.include must be an array'
      );
    });

    it('excludeが文字列配列でない場合エラー', () => {
      expect(() => validateConfig({ files: { exclude: [1, 2, 3] } })).toThrow(
        'config.files.exclude must be an array of strings'
      );
    });

    it('docsDirが文字列でない場合エラー', () => {
      expect(() => validateConfig({ files: { docsDir: 1 } })).toThrow(
        'config.files.docsDir must be a string'
      );
    });
  });

  describe('search設定', () => {
    it('オブジェクトでない場合エラー', () => {
      expect(() => validateConfig({ search: 'full' })).toThrow('config.search must be an object');
    });

    it('languageAssetsDirが文字列でもnullでもない場合エラー', () => {
      expect(() => validateConfig({ search: { languageAssetsDir: 3 } })).toThrow(
        'config.search.languageAssetsDir must be a string or null'
      );
    });

    it('インデックスオプションの値はここでは検証しない', () => {
      expect(() => validateConfig({ search: { indexing: 'unknown' } })).not.toThrow();
    });
  });
});
