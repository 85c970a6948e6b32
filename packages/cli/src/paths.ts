// packages/cli/src/paths.ts
import path from 'node:path';
import fs from 'node:fs';

export const STATE_DIRNAME = '.pixel-records';
export const CONFIG_FILENAME = 'config.json';
export const SAVE_DIRNAME = 'save';

export type DataPaths = {
  root: string;
  stateDir: string;
  configFile: string;
  saveDir: string;
};

/**
 * Find the nearest directory at-or-above `startCwd` containing `.pixel-records/config.json`.
 * If not found, fall back to `startCwd`.
 */
export function findConfigRoot(startCwd: string): string {
  let dir = path.resolve(startCwd);

  while (true) {
    const candidate = path.join(dir, STATE_DIRNAME, CONFIG_FILENAME);
    if (fs.existsSync(candidate)) return dir;

    const parent = path.dirname(dir);
    if (parent === dir) break; // reached filesystem root
    dir = parent;
  }

  return path.resolve(startCwd);
}

/**
 * If set, PIXEL_RECORDS_HOME forces the root directory used to locate `.pixel-records/`.
 */
function getForcedHomeFromEnv(env: NodeJS.ProcessEnv): string | null {
  const raw = String(env.PIXEL_RECORDS_HOME ?? '').trim();
  if (!raw) return null;
  return path.resolve(process.cwd(), raw);
}

/**
 * Root precedence: --home, then PIXEL_RECORDS_HOME, then find-up from cwd.
 *
 * Layout:
 *   <root>/.pixel-records/config.json
 *   <root>/.pixel-records/save/{artworks,requests}.json
 */
export function resolveDataPaths(args: {
  cwd: string;
  home?: string | null;
  saveDirOverride?: string | null;
  env?: NodeJS.ProcessEnv;
}): DataPaths {
  const { cwd, home, saveDirOverride } = args;
  const env = args.env ?? process.env;

  const root = (home && path.resolve(cwd, home)) || getForcedHomeFromEnv(env) || findConfigRoot(cwd);
  const stateDir = path.resolve(root, STATE_DIRNAME);

  return {
    root,
    stateDir,
    configFile: path.join(stateDir, CONFIG_FILENAME),
    saveDir: (saveDirOverride && path.resolve(root, saveDirOverride)) || path.join(stateDir, SAVE_DIRNAME),
  };
}
