// packages/cli/src/tests/helpers.ts
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { buildProgram } from '../program.js';

export function makeHome(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'pixelctl-test-'));
}

export type CliRun = {
  out: string[];
  warnings: string[];
};

/**
 * argv is user args only, e.g. ['artwork', 'ls'].
 * --home is prepended so nothing resolves against the real cwd or env.
 */
export async function runCli(home: string, argv: string[]): Promise<CliRun> {
  const out: string[] = [];
  const warnings: string[] = [];

  const program = buildProgram({
    cwd: home,
    env: {},
    print: (line) => out.push(line),
    logger: { warn: (msg: string) => warnings.push(msg) },
  });
  await program.parseAsync(['--home', home, ...argv], { from: 'user' });

  return { out, warnings };
}

export function saveDirOf(home: string): string {
  return path.join(home, '.pixel-records', 'save');
}

export function writeJson(file: string, value: unknown): void {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, JSON.stringify(value, null, 2), 'utf8');
}
