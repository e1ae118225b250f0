/**
 * 空白を正規化
 * 連続する空白を1つのスペースにまとめ、前後の空白を除去する
 */
export function normalizeWhitespace(text: string | null | undefined): string {
  if (!text) {
    return '';
  }
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * テキスト片を文書順に連結して正規化
 */
export function joinText(parts: ReadonlyArray<string | null | undefined>): string {
  return normalizeWhitespace(parts.filter((part) => part).join(' '));
}
