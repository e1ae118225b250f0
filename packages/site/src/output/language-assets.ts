/**
 * 検索UIが言語ごとに必要とするlunr-languagesのファイルを選ぶ
 *
 * - 英語以外を含む、または複数言語の場合は lunr.stemmer.support.js
 * - 複数言語の場合は lunr.multi.js
 * - 日本語の場合は分かち書き用の tinyseg.js
 * - 英語以外の各言語に lunr.<code>.js
 */
export function selectLanguageAssets(lang: readonly string[]): string[] {
  const assets: string[] = [];

  if (lang.length > 1 || !lang.includes('en')) {
    assets.push('lunr.stemmer.support.js');
  }
  if (lang.length > 1) {
    assets.push('lunr.multi.js');
  }
  if (lang.includes('ja') || lang.includes('jp')) {
    assets.push('tinyseg.js');
  }
  for (const code of lang) {
    if (code !== 'en') {
      assets.push(`lunr.${code}.js`);
    }
  }

  return [...new Set(assets)];
}
