// packages/persistence/src/file.ts
import fs from 'node:fs';
import path from 'node:path';

import { errorMessage, type Logger } from '@pixel-records/records';

export type FileOptions = {
  logger?: Logger;
};

function ensureParentDir(filename: string) {
  fs.mkdirSync(path.dirname(filename), { recursive: true });
}

/**
 * Best-effort synchronous write. Failures are logged, never thrown.
 * Returns whether the write went through.
 */
export function saveToFile(json: string, filename: string, opts: FileOptions = {}): boolean {
  try {
    ensureParentDir(filename);
    fs.writeFileSync(filename, json, 'utf8');
    return true;
  } catch (e) {
    (opts.logger ?? console).warn(`[json-persistence] Failed to save file: ${errorMessage(e)}`);
    return false;
  }
}

/**
 * Returns null when the file does not exist or cannot be read (the latter is logged).
 */
export function loadFromFile(filename: string, opts: FileOptions = {}): string | null {
  try {
    if (!fs.existsSync(filename)) return null;
    return fs.readFileSync(filename, 'utf8');
  } catch (e) {
    (opts.logger ?? console).warn(`[json-persistence] Failed to load file: ${errorMessage(e)}`);
    return null;
  }
}
