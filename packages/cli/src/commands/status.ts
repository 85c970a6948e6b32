// packages/cli/src/commands/status.ts
import fs from 'node:fs';
import type { Command } from 'commander';

import { openSession, printerFor, type CommandDeps } from '../context.js';
import { getOrCreateSubcommand } from './shared.js';

function existsTag(file: string): string {
  return fs.existsSync(file) ? '(exists)' : '(missing)';
}

export function registerStatusCommand(program: Command, deps: CommandDeps) {
  const status = getOrCreateSubcommand(program, 'status', 'Show data paths and record counts');
  const print = printerFor(deps);

  status.action(async () => {
    const { store, challenge, counts, paths, savePaths } = openSession(deps);

    print(`root:             ${paths.root}`);
    print(`config:           ${paths.configFile} ${existsTag(paths.configFile)}`);
    print(`artworks file:    ${savePaths.artworksFile} ${existsTag(savePaths.artworksFile)}`);
    print(`requests file:    ${savePaths.requestsFile} ${existsTag(savePaths.requestsFile)}`);
    print(`artworks:         ${counts.artworkCount.value}`);
    print(`active requests:  ${counts.activeRequestCount.value} / ${store.requestCount}`);
    print(`max active shown: ${challenge.maxActiveRequests}`);
  });

  return status;
}
