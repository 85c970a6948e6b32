// packages/cli/src/commands/artwork.ts
import { randomUUID } from 'node:crypto';
import type { Command } from 'commander';

import { hasLiked, toggleLike, type ArtworkRecord } from '@pixel-records/records';

import { openSession, printerFor, reportSave, type CommandDeps } from '../context.js';
import { getOrCreateSubcommand, parseCount } from './shared.js';

type AddFlags = {
  name: string;
  width: string;
  height: string;
  id?: string;
};

export function formatArtworkLine(a: ArtworkRecord): string {
  const mark = a.isLiked ? '*' : ' ';
  return `${mark} ${a.id}  ${a.name} (${a.width}x${a.height}, ${a.pixels.length} px)`;
}

export function registerArtworkCommands(program: Command, deps: CommandDeps) {
  const artwork = getOrCreateSubcommand(program, 'artwork', 'Artwork commands');
  const print = printerFor(deps);

  artwork
    .command('add')
    .description('Add an empty artwork')
    .requiredOption('--name <name>', 'display name')
    .option('--width <n>', 'canvas width', '32')
    .option('--height <n>', 'canvas height', '32')
    .option('--id <id>', 'explicit id (defaults to a random uuid)')
    .action(async (opts: AddFlags) => {
      const width = parseCount(opts.width, '--width', 1);
      const height = parseCount(opts.height, '--height', 1);

      const session = openSession(deps);
      const record: ArtworkRecord = {
        id: opts.id || randomUUID(),
        name: opts.name,
        pixels: [],
        width,
        height,
        createdTimestamp: Math.floor(Date.now() / 1000),
        isLiked: false,
      };
      session.store.addArtwork(record);
      reportSave(session, print);

      print(`added artwork: ${record.id}`);
      print(`artworks:      ${session.counts.artworkCount.value}`);
    });

  artwork
    .command('rm')
    .description('Remove an artwork by id')
    .argument('<id>', 'artwork id')
    .action(async (id: string) => {
      const session = openSession(deps);
      const removed = session.store.removeArtwork(id);
      reportSave(session, print);

      print(removed ? `removed artwork: ${id}` : `artwork not found: ${id}`);
    });

  artwork
    .command('like')
    .description('Toggle the like flag of an artwork')
    .argument('<id>', 'artwork id')
    .action(async (id: string) => {
      const session = openSession(deps);
      if (!session.store.getArtwork(id)) {
        print(`artwork not found: ${id}`);
        return;
      }

      toggleLike(session.store, id);
      reportSave(session, print);

      print(`${id} liked: ${hasLiked(session.store, id) ? 'yes' : 'no'}`);
    });

  artwork
    .command('show')
    .description('Print one artwork as JSON')
    .argument('<id>', 'artwork id')
    .action(async (id: string) => {
      const { store } = openSession(deps);
      const a = store.getArtwork(id);
      print(a ? JSON.stringify(a, null, 2) : `artwork not found: ${id}`);
    });

  artwork
    .command('ls')
    .description('List artworks (liked ones marked with *)')
    .action(async () => {
      const { store } = openSession(deps);
      const all = store.getAllArtworks();
      if (all.length === 0) {
        print('(no artworks)');
        return;
      }
      for (const a of all) print(formatArtworkLine(a));
    });

  return artwork;
}
