import type { SiteSearchConfig } from '../config.js';

/**
 * 設定オブジェクトをバリデーション
 * searchセクションの値の意味的な検証はconfigure()で行う
 */
export function validateConfig(config: unknown): Partial<SiteSearchConfig> {
  if (!isRecord(config)) {
    throw new Error('Config must be an object');
  }

  // バージョンのチェック
  if (config.version !== undefined && typeof config.version !== 'string') {
    throw new Error('config.version must be a string');
  }

  // project設定のバリデーション
  if (config.project !== undefined) {
    validateProjectConfig(config.project);
  }

  // files設定のバリデーション
  if (config.files !== undefined) {
    validateFilesConfig(config.files);
  }

  // site設定のバリデーション
  if (config.site !== undefined) {
    validateSiteConfig(config.site);
  }

  // search設定のバリデーション
  if (config.search !== undefined) {
    validateSearchConfig(config.search);
  }

  return config as Partial<SiteSearchConfig>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateProjectConfig(project: unknown): void {
  if (!isRecord(project)) {
    throw new Error('config.project must be an object');
  }

  if (project.name !== undefined && typeof project.name !== 'string') {
    throw new Error('config.project.name must be a string');
  }

  if (project.root !== undefined && typeof project.root !== 'string') {
    throw new Error('config.project.root must be a string');
  }
}

function validateStringArray(value: unknown, name: string): void {
  if (!Array.isArray(value)) {
    throw new Error(`${name} must be an array`);
  }

  if (!value.every((item) => typeof item === 'string')) {
    throw new Error(`${name} must be an array of strings`);
  }
}

function validateFilesConfig(files: unknown): void {
  if (!isRecord(files)) {
    throw new Error('config.files must be an object');
  }

  if (files.docsDir !== undefined && typeof files.docsDir !== 'string') {
    throw new Error('config.files.docsDir must be a string');
  }

  if (files.include !== undefined) {
    validateStringArray(files.include, 'config.files.include');
  }

  if (files.exclude !== undefined) {
    validateStringArray(files.exclude, 'config.files.exclude');
  }

  if (files.ignoreGitignore !== undefined && typeof files.ignoreGitignore !== 'boolean') {
    throw new Error('config.files.ignoreGitignore must be a boolean');
  }
}

function validateSiteConfig(site: unknown): void {
  if (!isRecord(site)) {
    throw new Error('config.site must be an object');
  }

  if (site.siteDir !== undefined && typeof site.siteDir !== 'string') {
    throw new Error('config.site.siteDir must be a string');
  }

  if (site.useDirectoryUrls !== undefined && typeof site.useDirectoryUrls !== 'boolean') {
    throw new Error('config.site.useDirectoryUrls must be a boolean');
  }
}

function validateSearchConfig(search: unknown): void {
  if (!isRecord(search)) {
    throw new Error('config.search must be an object');
  }

  if (
    search.languageAssetsDir !== undefined &&
    search.languageAssetsDir !== null &&
    typeof search.languageAssetsDir !== 'string'
  ) {
    throw new Error('config.search.languageAssetsDir must be a string or null');
  }
}
