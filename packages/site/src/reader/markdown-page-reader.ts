import { marked, type Token, type Tokens } from 'marked';
import type { Page, PageHeading } from '@site-search/types';
import { AnchorRegistry } from './anchors.js';

export interface MarkdownPageReaderOptions {
  /** `a/b.md` を `a/b/` として公開するか（falseなら `a/b.html`） */
  useDirectoryUrls: boolean;
}

interface HeadingEntry {
  heading: PageHeading;
  content: string[];
}

// 見出し末尾の明示的なID指定（例: `## Setup {#install}`）
const EXPLICIT_ID = /\s*\{#([^\s}]+)\}\s*$/;

/**
 * MarkdownをPageに変換するクラス
 * 見出しはフラットにレベル付きで並べ、親子関係はインデクサ側でレベルから決める
 */
export class MarkdownPageReader {
  constructor(private options: MarkdownPageReaderOptions) {}

  /**
   * Markdownを読み込む
   * @param markdown Markdownテキスト
   * @param sourcePath docsDirからの相対パス
   */
  read(markdown: string, sourcePath: string): Page {
    // 1. Markdownをパース
    const tokens = marked.lexer(markdown);

    // 2. 明示的なIDを先に集め、自動生成のIDと衝突しないようにする
    const headingTokens = tokens.filter((token): token is Tokens.Heading => token.type === 'heading');
    const anchors = new AnchorRegistry(
      headingTokens.flatMap((token) => {
        const explicitId = this.parseHeading(token).explicitId;
        return explicitId === undefined ? [] : [explicitId];
      })
    );

    // 3. 見出しごとに本文を振り分け
    const entries: HeadingEntry[] = [];
    const body: string[] = [];
    let title: string | undefined;

    for (const token of tokens) {
      if (token.type === 'heading') {
        // 型ガード: heading型であることを明示
        const headingToken = token as Tokens.Heading;
        const heading = this.buildHeading(headingToken, anchors);
        entries.push({ heading, content: [] });

        if (title === undefined && headingToken.depth === 1) {
          title = heading.text;
        }
      } else {
        const text = this.tokenToText(token);
        if (text.trim()) {
          const current = entries[entries.length - 1];
          (current ? current.content : body).push(text);
        }
      }
    }

    // 4. Pageに変換
    return {
      path: sourcePathToUrl(sourcePath, this.options.useDirectoryUrls),
      title: title ?? titleFromPath(sourcePath),
      body: body.join('\n'),
      headings: entries.map(({ heading, content }) => ({
        ...heading,
        body: content.join('\n'),
      })),
    };
  }

  /**
   * 見出しトークンをPageHeadingに変換
   */
  private buildHeading(token: Tokens.Heading, anchors: AnchorRegistry): PageHeading {
    const { text, explicitId } = this.parseHeading(token);
    const anchor = explicitId !== undefined ? anchors.reserve(explicitId) : anchors.unique(text);

    const heading: PageHeading = { text, level: token.depth };
    if (anchor !== undefined) {
      heading.anchor = anchor;
    }
    return heading;
  }

  /**
   * 見出しテキストと明示的なIDを取り出す
   */
  private parseHeading(token: Tokens.Heading): { text: string; explicitId?: string } {
    const raw = this.tokensToText(token.tokens, '');
    const explicit = EXPLICIT_ID.exec(raw);
    if (!explicit) {
      return { text: raw };
    }
    return { text: raw.slice(0, explicit.index), explicitId: explicit[1] };
  }

  private tokensToText(tokens: Token[] | undefined, separator: string): string {
    if (!tokens) {
      return '';
    }
    return tokens.map((token) => this.tokenToText(token)).join(separator);
  }

  /**
   * marked.Tokenをプレーンテキストに変換
   * インライン記法・HTMLタグ・リンク先は除去し、コードブロックの内容はそのまま残す
   */
  private tokenToText(token: Token): string {
    switch (token.type) {
      case 'code':
        return token.text;
      case 'codespan':
      case 'escape':
        // markedのレキサーがエスケープするインライントークン
        return decodeEntities(token.text);
      case 'space':
      case 'hr':
        return '';
      case 'br':
        return ' ';
      case 'html':
        return token.text.replace(/<[^>]*>/g, ' ');
      case 'list': {
        const list = token as Tokens.List;
        return list.items.map((item) => this.tokensToText(item.tokens, '\n')).join('\n');
      }
      case 'table': {
        const table = token as Tokens.Table;
        const cells = [...table.header, ...table.rows.flat()];
        return cells.map((cell) => this.tokensToText(cell.tokens, '')).join(' ');
      }
      case 'blockquote':
        return this.tokensToText(token.tokens, '\n');
      case 'text':
        if (token.tokens) {
          return this.tokensToText(token.tokens, '');
        }
        return decodeEntities(token.text);
      default:
        if ('tokens' in token && Array.isArray(token.tokens)) {
          return this.tokensToText(token.tokens, '');
        }
        if ('text' in token && typeof token.text === 'string') {
          return token.text;
        }
        return '';
    }
  }
}

/**
 * ソースパスをサイト内URLに変換
 * - index.md はディレクトリのURL
 * - useDirectoryUrls: `a/b.md` -> `a/b/`、それ以外は `a/b.html`
 */
export function sourcePathToUrl(sourcePath: string, useDirectoryUrls: boolean): string {
  const segments = sourcePath
    .replace(/\\/g, '/')
    .replace(/\.(md|markdown)$/i, '')
    .split('/');
  const name = segments[segments.length - 1];

  if (!useDirectoryUrls) {
    return `${segments.join('/')}.html`;
  }

  if (name.toLowerCase() === 'index') {
    segments.pop();
  }
  return segments.length > 0 ? `${segments.join('/')}/` : '';
}

/**
 * ファイル名からタイトルを作る
 * `getting-started.md` -> `Getting started`、ルートの index.md は `Home`
 */
export function titleFromPath(sourcePath: string): string {
  const segments = sourcePath
    .replace(/\\/g, '/')
    .replace(/\.(md|markdown)$/i, '')
    .split('/');
  if (segments[segments.length - 1].toLowerCase() === 'index') {
    segments.pop();
  }

  const name = segments[segments.length - 1];
  if (!name) {
    return 'Home';
  }

  const label = name.replace(/[-_]+/g, ' ').trim();
  return label.charAt(0).toUpperCase() + label.slice(1);
}

const ENTITIES: Readonly<Record<string, string>> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
};

function decodeEntities(text: string): string {
  return text.replace(/&(?:amp|lt|gt|quot|#39);/g, (entity) => ENTITIES[entity] ?? entity);
}
