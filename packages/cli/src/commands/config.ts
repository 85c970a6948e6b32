// packages/cli/src/commands/config.ts
import fs from 'node:fs';
import type { Command } from 'commander';

import { DEFAULT_CHALLENGE_CONFIG } from '@pixel-records/records';

import { ensureConfigDefaults, writeConfig } from '../config_store.js';
import { printerFor, type CommandDeps } from '../context.js';
import { getOrCreateSubcommand } from './shared.js';

export function registerConfigCommands(program: Command, deps: CommandDeps) {
  const config = getOrCreateSubcommand(program, 'config', 'Config file commands');
  const print = printerFor(deps);

  config
    .command('init')
    .description('Write a default config file')
    .option('--force', 'overwrite an existing config', false)
    .action(async (opts: { force?: boolean }) => {
      const { configFile } = deps.getActivePaths();

      if (fs.existsSync(configFile) && !opts.force) {
        throw new Error(`config already exists: ${configFile} (use --force to overwrite)`);
      }

      const defaults = ensureConfigDefaults({ challenge: { ...DEFAULT_CHALLENGE_CONFIG } });
      writeConfig({ configFile, config: defaults });
      print(`wrote config: ${configFile}`);
    });

  return config;
}
