// packages/cli/src/program.ts
import { Command } from 'commander';

import type { Logger } from '@pixel-records/records';

import type { CommandDeps } from './context.js';
import { resolveDataPaths, type DataPaths } from './paths.js';

import { registerArtworkCommands } from './commands/artwork.js';
import { registerConfigCommands } from './commands/config.js';
import { registerRequestCommands } from './commands/request.js';
import { registerSeedCommand } from './commands/seed.js';
import { registerStatusCommand } from './commands/status.js';
import { registerTransferCommands } from './commands/transfer.js';

export type ProgramOptions = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  print?: (line: string) => void;
};

type GlobalFlags = {
  home?: string;
  saveDir?: string;
};

export function buildProgram(opts: ProgramOptions = {}): Command {
  const program = new Command();

  program
    .name('pixelctl')
    .description('Manage pixel-art records and challenge requests')
    .option('--home <dir>', 'root directory containing .pixel-records/ (default: $PIXEL_RECORDS_HOME or find-up)')
    .option('--save-dir <dir>', 'save directory (default: <root>/.pixel-records/save)');

  // resolved per command, after commander has parsed the global flags
  const getActivePaths = (): DataPaths => {
    const flags = program.opts<GlobalFlags>();
    return resolveDataPaths({
      cwd: opts.cwd ?? process.cwd(),
      home: flags.home ?? null,
      saveDirOverride: flags.saveDir ?? null,
      env: opts.env,
    });
  };

  const deps: CommandDeps = { getActivePaths, logger: opts.logger, print: opts.print };

  registerStatusCommand(program, deps);
  registerArtworkCommands(program, deps);
  registerRequestCommands(program, deps);
  registerTransferCommands(program, deps);
  registerSeedCommand(program, deps);
  registerConfigCommands(program, deps);

  return program;
}
