#!/usr/bin/env node
/**
 * site-search CLI
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { createProgram } from './program.js';

// package.jsonからバージョンを読み込む（src/ と dist/ のどちらからでも1つ上にある）
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJsonPath = join(__dirname, '..', 'package.json');
const packageJson = JSON.parse(readFileSync(packageJsonPath, 'utf-8')) as {
  version: string;
};

// コマンドラインを解析
await createProgram(packageJson.version).parseAsync(process.argv);
