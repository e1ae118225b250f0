import { describe, it, expect } from 'vitest';
import type { Command } from 'commander';
import { createProgram } from '../program.js';

function findCommand(program: Command, name: string): Command {
  const command = program.commands.find((candidate) => candidate.name() === name);
  if (!command) {
    throw new Error(`command not found: ${name}`);
  }
  return command;
}

describe('createProgram', () => {
  it('buildの--langはカンマ区切りで、後続のパスを言語コードとして取り込まない', () => {
    const build = findCommand(createProgram('0.1.0'), 'build');

    const result = build.parseOptions(['--lang', 'de,fr', 'guide/setup.md']);

    expect(build.opts<{ lang?: string[] }>().lang).toEqual(['de', 'fr']);
    expect(result.operands).toEqual(['guide/setup.md']);
  });

  it('buildの--formatのデフォルトはtext', () => {
    const build = findCommand(createProgram('0.1.0'), 'build');

    build.parseOptions([]);

    expect(build.opts<{ format?: string }>().format).toBe('text');
  });

  it('バージョンを設定する', () => {
    expect(createProgram('1.2.3').version()).toBe('1.2.3');
  });
});
