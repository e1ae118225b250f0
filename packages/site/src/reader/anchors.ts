/**
 * 見出しテキストからアンカーIDを生成
 * 小文字化し、文字・数字・空白・ハイフン・アンダースコア以外を除去して空白をハイフンにする
 */
export function slugifyHeading(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s_-]/gu, '')
    .trim()
    .replace(/[\s-]+/g, '-');
}

/**
 * ページ内のアンカーIDを一意にする
 * 重複したIDには `_1`, `_2`... を付ける
 */
export class AnchorRegistry {
  private used = new Set<string>();
  /** ページ内で明示的に指定されたID（自動生成のIDはこれを避ける） */
  private reserved: ReadonlySet<string>;

  constructor(reserved: Iterable<string> = []) {
    this.reserved = new Set(reserved);
  }

  /**
   * 明示的に指定されたIDを登録（そのまま使う）
   * 同じIDが既に使われている場合は警告する
   */
  reserve(id: string): string {
    if (this.used.has(id)) {
      console.warn(`[AnchorRegistry] Duplicate anchor "${id}"`);
    }
    this.used.add(id);
    return id;
  }

  /**
   * 見出しテキストから一意なIDを生成
   * @returns slugが空になる場合はundefined
   */
  unique(text: string): string | undefined {
    const slug = slugifyHeading(text);
    if (!slug) {
      return undefined;
    }

    let candidate = slug;
    let count = 0;
    while (this.used.has(candidate) || this.reserved.has(candidate)) {
      count++;
      candidate = `${slug}_${count}`;
    }

    this.used.add(candidate);
    return candidate;
  }
}
