// packages/cli/src/commands/transfer.ts
import path from 'node:path';
import type { Command } from 'commander';

import {
  exportArtworks,
  exportRequests,
  importArtworks,
  importRequests,
  loadFromFile,
  saveToFile,
} from '@pixel-records/persistence';

import { openSession, printerFor, reportSave, type CommandDeps, type StoreSession } from '../context.js';
import { parseCollectionKind, type CollectionKind } from './shared.js';

const SINGULAR: Record<CollectionKind, string> = {
  artworks: 'artwork',
  requests: 'request',
};

function exportText(session: StoreSession, kind: CollectionKind): { json: string; count: number } {
  const { store } = session;
  if (kind === 'artworks') {
    return { json: exportArtworks(store.getAllArtworks()), count: store.artworkCount };
  }
  return { json: exportRequests(store.getAllRequests()), count: store.requestCount };
}

/** Returns the number of records installed; 0 leaves the store untouched. */
function importText(session: StoreSession, kind: CollectionKind, json: string, deps: CommandDeps): number {
  const opts = { logger: deps.logger };

  if (kind === 'artworks') {
    const artworks = importArtworks(json, opts);
    if (artworks.length) session.store.setAllArtworks(artworks);
    return artworks.length;
  }

  const requests = importRequests(json, opts);
  if (requests.length) session.store.setAllRequests(requests);
  return requests.length;
}

export function registerTransferCommands(program: Command, deps: CommandDeps) {
  const print = printerFor(deps);

  program
    .command('export')
    .description('Export a collection as JSON (stdout unless --out)')
    .argument('<kind>', 'artworks | requests')
    .option('--out <file>', 'write to a file instead of stdout')
    .action(async (rawKind: string, opts: { out?: string }) => {
      const kind = parseCollectionKind(rawKind);
      const session = openSession(deps);
      const { json, count } = exportText(session, kind);

      if (!opts.out) {
        print(json);
        return;
      }

      const out = path.resolve(opts.out);
      if (!saveToFile(json, out, { logger: deps.logger })) {
        throw new Error(`export failed: could not write ${out}`);
      }
      print(`Exported ${count} ${kind} to ${out}`);
    });

  program
    .command('import')
    .description('Replace a collection with the contents of a JSON export')
    .argument('<kind>', 'artworks | requests')
    .argument('<file>', 'JSON file written by export')
    .action(async (rawKind: string, file: string) => {
      const kind = parseCollectionKind(rawKind);
      const session = openSession(deps);

      const json = loadFromFile(path.resolve(file), { logger: deps.logger });
      const count = json ? importText(session, kind, json, deps) : 0;

      if (count === 0) {
        print(`Import failed: no valid ${SINGULAR[kind]} data found.`);
        return;
      }

      reportSave(session, print);
      print(`Imported ${count} ${kind}.`);
    });
}
