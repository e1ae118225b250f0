import { ConfigurationError } from './errors.js';

/**
 * 検索ランタイム（lunr-languages）がサポートする言語コード
 */
export const SUPPORTED_LANGUAGES: ReadonlySet<string> = new Set([
  'ar', 'da', 'de', 'du', 'en', 'es', 'fi', 'fr', 'hi', 'hu',
  'hy', 'it', 'ja', 'jp', 'kn', 'ko', 'nl', 'no', 'pt', 'ro',
  'ru', 'sa', 'sv', 'ta', 'te', 'th', 'tr', 'vi', 'zh',
]);

/**
 * サポート外の言語から最も近いサポート言語への置き換え
 */
export const LANGUAGE_FALLBACKS: Readonly<Record<string, string>> = {
  uk: 'ru',
};

/**
 * 言語コードをサポートされている基本コードに解決
 * 地域・文字体系の部分（`_` または `-` 以降）は無視し、大文字小文字を区別しない
 * @returns 解決できない場合はnull
 */
export function resolveSupportedLanguage(lang: string): string | null {
  const base = lang.split(/[_-]/)[0].toLowerCase();
  const resolved = LANGUAGE_FALLBACKS[base] ?? base;
  return SUPPORTED_LANGUAGES.has(resolved) ? resolved : null;
}

/**
 * lang オプションを検証
 *
 * - 単一のコードは配列に正規化する
 * - 'en' は常に有効
 * - 解決できたが異なるコードは置き換える（末尾に追加）
 * - 解決できないコードは除外し、'en' がなければ追加する
 *
 * 重複は除去しない（言語ファイルの選択側で扱う）
 */
export function validateLanguages(value: unknown): string[] {
  const requested = typeof value === 'string' ? [value] : value;

  if (!Array.isArray(requested)) {
    throw new ConfigurationError('lang must be a language code or a list of language codes', 'lang');
  }

  const langs: string[] = [];
  for (const item of requested) {
    if (typeof item !== 'string') {
      throw new ConfigurationError('lang must contain only string language codes', 'lang');
    }
    langs.push(item);
  }

  if (langs.length === 0) {
    console.info("[LanguageOption] lang is empty, using 'en'");
    return ['en'];
  }

  const result = [...langs];
  for (const lang of langs) {
    if (lang === 'en') {
      continue;
    }

    const detected = resolveSupportedLanguage(lang);
    if (detected === null) {
      console.info(`[LanguageOption] lang '${lang}' is not supported, falling back to 'en'`);
      removeFirst(result, lang);
      if (!result.includes('en')) {
        result.push('en');
      }
    } else if (detected !== lang) {
      removeFirst(result, lang);
      result.push(detected);
      console.info(`[LanguageOption] lang '${lang}' switched to '${detected}'`);
    }
  }

  return result;
}

function removeFirst(list: string[], value: string): void {
  const index = list.indexOf(value);
  if (index !== -1) {
    list.splice(index, 1);
  }
}
