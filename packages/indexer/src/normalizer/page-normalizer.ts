import type { IndexingMode, Page, SearchRecord } from '@site-search/types';
import { buildHeadingArena } from './heading-arena.js';
import { joinText, normalizeWhitespace } from './text.js';

interface SectionEntry {
  location: string;
  title: string;
  parts: string[];
}

/**
 * 1ページをインデックスレコードに変換
 *
 * - full: ページ全体を1レコードにまとめる（見出しテキストも本文に含める）
 * - sections: ページ前文のレコード + アンカー付き見出しごとのレコード
 * - titles: sectionsと同じレコードで本文は常に空
 *
 * 不正なネストや欠けた値で例外は投げない。
 */
export function normalizePage(page: Page, indexing: IndexingMode): SearchRecord[] {
  const title = normalizeWhitespace(page.title);
  const nodes = buildHeadingArena(page.headings);

  if (indexing === 'full') {
    const parts: string[] = [normalizeWhitespace(page.body)];
    for (const node of nodes) {
      parts.push(node.text, node.body);
    }
    return [{ location: page.path, title, text: joinText(parts) }];
  }

  // 各ノードの本文の行き先（アンカーなしの見出しは最も近いアンカー付きの祖先へ）
  const pageParts: string[] = [normalizeWhitespace(page.body)];
  const owners: string[][] = [];
  const sections: SectionEntry[] = [];

  for (const node of nodes) {
    if (node.anchor !== null) {
      const parts = [node.body];
      sections.push({ location: `${page.path}#${node.anchor}`, title: node.text, parts });
      owners[node.index] = parts;
    } else {
      const target = node.parent === null ? pageParts : owners[node.parent];
      target.push(node.text, node.body);
      owners[node.index] = target;
    }
  }

  const withText = indexing !== 'titles';
  const records: SearchRecord[] = [];

  const pageText = joinText(pageParts);
  if (title !== '' || pageText !== '') {
    records.push({ location: page.path, title, text: withText ? pageText : '' });
  }

  for (const { location, title: heading, parts } of sections) {
    records.push({ location, title: heading, text: withText ? joinText(parts) : '' });
  }

  return records;
}
