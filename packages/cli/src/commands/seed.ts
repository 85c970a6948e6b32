// packages/cli/src/commands/seed.ts
import type { Command } from 'commander';

import { openSession, printerFor, reportSave, type CommandDeps } from '../context.js';
import { generateArtworks, generateRequests, loadSeedTemplates } from '../seeder.js';
import { parseCount } from './shared.js';

export const DEFAULT_SEED_ARTWORKS = 10;
export const DEFAULT_SEED_REQUESTS = 5;

export function registerSeedCommand(program: Command, deps: CommandDeps) {
  const print = printerFor(deps);

  program
    .command('seed')
    .description('Replace both collections with generated sample data')
    .option('--artworks <n>', 'number of artworks', String(DEFAULT_SEED_ARTWORKS))
    .option('--requests <n>', 'number of requests', String(DEFAULT_SEED_REQUESTS))
    .action(async (opts: { artworks: string; requests: string }) => {
      const artworkCount = parseCount(opts.artworks, '--artworks');
      const requestCount = parseCount(opts.requests, '--requests');

      const templates = loadSeedTemplates();
      const session = openSession(deps);

      session.store.setAllArtworks(generateArtworks(artworkCount, templates));
      session.store.setAllRequests(generateRequests(requestCount, templates));
      reportSave(session, print);

      print(`Seeded ${session.store.artworkCount} artworks and ${session.store.requestCount} requests.`);
    });
}
