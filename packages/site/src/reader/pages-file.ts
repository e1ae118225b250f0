import { readFile } from 'fs/promises';
import { z } from 'zod';
import type { Page, PageHeading } from '@site-search/types';

const headingSchema: z.ZodType<PageHeading> = z.lazy(() =>
  z.object({
    text: z.string(),
    anchor: z.string().optional(),
    level: z.number().int().min(1).optional(),
    body: z.string().optional(),
    children: z.array(headingSchema).optional(),
  })
);

const pageSchema: z.ZodType<Page> = z.object({
  path: z.string(),
  title: z.string().optional(),
  body: z.string().optional(),
  headings: z.array(headingSchema).optional(),
});

export const pagesFileSchema = z.array(pageSchema);

/**
 * 事前に構造化されたページ一覧をパース
 * Markdownを経由せずにインデックスを作る場合の入力
 */
export function parsePages(value: unknown): Page[] {
  const result = pagesFileSchema.safeParse(value);
  if (!result.success) {
    const details = result.error.issues.map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `  ${where}: ${issue.message}`;
    });
    throw new Error(`Invalid pages file:\n${details.join('\n')}`);
  }
  return result.data;
}

/**
 * JSONファイルからページ一覧を読み込む
 */
export async function readPagesFile(filePath: string): Promise<Page[]> {
  const content = await readFile(filePath, 'utf-8');

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new Error(`Failed to parse pages file ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
  }

  return parsePages(parsed);
}
