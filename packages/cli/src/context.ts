// packages/cli/src/context.ts
import {
  IntVariable,
  RecordStore,
  countSinksFor,
  type ChallengeConfig,
  type Logger,
} from '@pixel-records/records';
import {
  loadStore,
  resolveSavePaths,
  saveStore,
  type LoadSummary,
  type SavePaths,
  type SaveSummary,
} from '@pixel-records/persistence';

import { challengeConfigFrom, ensureConfigDefaults, readConfig } from './config_store.js';
import type { DataPaths } from './paths.js';

export type GetActivePaths = () => DataPaths;

export type CommandDeps = {
  getActivePaths: GetActivePaths;
  logger?: Logger;
  print?: (line: string) => void;
};

export type StoreSession = {
  store: RecordStore;
  challenge: ChallengeConfig;
  counts: {
    artworkCount: IntVariable;
    activeRequestCount: IntVariable;
  };
  paths: DataPaths;
  savePaths: SavePaths;
  loaded: LoadSummary;

  /** True once the store has emitted `changed` since open (or since the last save). */
  isDirty(): boolean;

  /** Writes both save files if anything changed; null when there was nothing to write. */
  save(): SaveSummary | null;
};

/**
 * Build a store from config (predefined requests) and then the save files.
 * Loading does not make the session dirty.
 */
export function openSession(deps: CommandDeps): StoreSession {
  const paths = deps.getActivePaths();
  const logger = deps.logger;

  const config = ensureConfigDefaults(readConfig({ configFile: paths.configFile }));
  const challenge = challengeConfigFrom(config);

  const artworkCount = new IntVariable();
  const activeRequestCount = new IntVariable();

  const store = new RecordStore({
    sinks: countSinksFor({ artworkCount, activeRequestCount }),
    config: challenge,
    logger,
  });

  const savePaths = resolveSavePaths(paths.saveDir);
  const loaded = loadStore({ store, paths: savePaths, logger });

  let dirty = false;
  store.on('changed', () => {
    dirty = true;
  });

  return {
    store,
    challenge,
    counts: { artworkCount, activeRequestCount },
    paths,
    savePaths,
    loaded,
    isDirty: () => dirty,
    save() {
      if (!dirty) return null;
      const summary = saveStore({ store, paths: savePaths, logger });
      dirty = false;
      return summary;
    },
  };
}

export function printerFor(deps: CommandDeps): (line: string) => void {
  return deps.print ?? ((line) => console.log(line));
}

/** Report a save summary in one line per failed file; silent on success. */
export function reportSave(session: StoreSession, print: (line: string) => void): void {
  const res = session.save();
  if (!res) return;
  if (!res.artworks) print(`warning: could not write ${session.savePaths.artworksFile}`);
  if (!res.requests) print(`warning: could not write ${session.savePaths.requestsFile}`);
}
