import type { PageHeading } from '@site-search/types';
import { normalizeWhitespace } from './text.js';

/**
 * 平坦化された見出しノード
 * 配列内の位置（index）で参照する
 */
export interface HeadingArenaNode {
  /** 文書順の位置 */
  index: number;
  /** 親ノードの位置（トップレベルはnull） */
  parent: number | null;
  /** 見出しレベル（1以上） */
  level: number;
  /** 見出しテキスト（正規化済み） */
  text: string;
  /** アンカーID（ない場合はnull） */
  anchor: string | null;
  /** 見出し直下の本文（正規化済み） */
  body: string;
}

interface PendingHeading {
  heading: PageHeading;
  parentLevel: number;
}

/**
 * 見出しツリーを文書順の配列に平坦化
 *
 * 親子関係はネストではなくレベルから決める:
 * 直前にある、自分より小さいレベルの見出しが親になる。
 * 該当する見出しがない場合はトップレベルとして扱う。
 */
export function buildHeadingArena(headings: readonly PageHeading[] = []): HeadingArenaNode[] {
  const nodes: HeadingArenaNode[] = [];
  // レベルが単調増加する祖先のスタック
  const ancestors: HeadingArenaNode[] = [];

  // 末尾から積んで先頭から取り出す（前順走査）
  const pending: PendingHeading[] = [];
  pushChildren(pending, headings, 0);

  let item = pending.pop();
  while (item !== undefined) {
    const { heading, parentLevel } = item;
    const level = resolveLevel(heading.level, parentLevel);

    while (ancestors.length > 0 && ancestors[ancestors.length - 1].level >= level) {
      ancestors.pop();
    }

    const node: HeadingArenaNode = {
      index: nodes.length,
      parent: ancestors.length > 0 ? ancestors[ancestors.length - 1].index : null,
      level,
      text: normalizeWhitespace(heading.text),
      anchor: normalizeAnchor(heading.anchor),
      body: normalizeWhitespace(heading.body),
    };
    nodes.push(node);
    ancestors.push(node);

    pushChildren(pending, heading.children ?? [], level);
    item = pending.pop();
  }

  return nodes;
}

function pushChildren(
  pending: PendingHeading[],
  children: readonly PageHeading[],
  parentLevel: number
): void {
  for (let i = children.length - 1; i >= 0; i--) {
    pending.push({ heading: children[i], parentLevel });
  }
}

/**
 * 見出しレベルを決定
 * 不正な値や省略時はコンテナのレベル+1
 */
function resolveLevel(level: number | undefined, parentLevel: number): number {
  if (level !== undefined && Number.isInteger(level) && level >= 1) {
    return level;
  }
  return parentLevel + 1;
}

function normalizeAnchor(anchor: string | undefined): string | null {
  const trimmed = anchor?.trim();
  return trimmed ? trimmed : null;
}
