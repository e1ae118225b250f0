import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { tmpdir } from 'os';
import { ArtifactWriter } from '../artifact-writer.js';

const TEST_DIR = path.join(tmpdir(), 'site-search-writer-test');
const SITE_DIR = path.join(TEST_DIR, 'site');
const ASSETS_DIR = path.join(TEST_DIR, 'assets');

describe('ArtifactWriter', () => {
  beforeEach(async () => {
    await fs.mkdir(ASSETS_DIR, { recursive: true });
    await fs.writeFile(path.join(ASSETS_DIR, 'lunr.de.js'), '// de');
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(TEST_DIR, { recursive: true, force: true });
  });

  it('search/search_index.jsonに書き出す', async () => {
    const writer = new ArtifactWriter({ siteDir: SITE_DIR });
    const outputPath = await writer.write('{"docs":[]}');

    expect(outputPath).toBe(path.join(SITE_DIR, 'search', 'search_index.json'));
    expect(await fs.readFile(outputPath, 'utf-8')).toBe('{"docs":[]}');
  });

  it('言語ファイルをコピーし、存在しないものは警告してスキップする', async () => {
    const writer = new ArtifactWriter({ siteDir: SITE_DIR });
    const copied = await writer.copyLanguageAssets(
      ['lunr.stemmer.support.js', 'lunr.de.js'],
      ASSETS_DIR
    );

    expect(copied).toEqual(['lunr.de.js']);
    expect(await fs.readFile(path.join(SITE_DIR, 'search', 'lunr.de.js'), 'utf-8')).toBe('// de');
    expect(vi.mocked(console.warn)).toHaveBeenCalledWith(
      '[ArtifactWriter] Language asset not found: lunr.stemmer.support.js'
    );
  });

  it('対象がなければ何もしない', async () => {
    const writer = new ArtifactWriter({ siteDir: SITE_DIR });
    expect(await writer.copyLanguageAssets([], ASSETS_DIR)).toEqual([]);
    await expect(fs.access(SITE_DIR)).rejects.toThrow();
  });
});
