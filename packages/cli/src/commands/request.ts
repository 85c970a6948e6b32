// packages/cli/src/commands/request.ts
import type { Command } from 'commander';

import type { ConstraintData, RequestRecord } from '@pixel-records/records';

import { openSession, printerFor, reportSave, type CommandDeps } from '../context.js';
import { getOrCreateSubcommand } from './shared.js';

export function formatConstraint(c: ConstraintData): string {
  switch (c.type) {
    case 'colorLimit':
      return `colors<=${c.intValue}`;
    case 'timeLimit':
      return `time ${c.floatValue}s`;
    case 'symmetryRequired':
      return 'symmetry';
    case 'pixelLimit':
      return `pixels<=${c.intValue}`;
    case 'paletteRestriction':
      return 'palette';
  }
}

export function formatRequestLine(r: RequestRecord): string {
  const mark = r.isCompleted ? 'x' : ' ';
  const constraints = r.constraints.length ? ` [${r.constraints.map(formatConstraint).join(', ')}]` : '';
  return `${mark} ${r.id}  ${r.prompt}${constraints}`;
}

export function registerRequestCommands(program: Command, deps: CommandDeps) {
  const request = getOrCreateSubcommand(program, 'request', 'Challenge request commands');
  const print = printerFor(deps);

  request
    .command('ls')
    .description('List active requests (up to maxActiveRequests unless --all)')
    .option('--all', 'list every request, completed ones included', false)
    .action(async (opts: { all?: boolean }) => {
      const { store, challenge } = openSession(deps);
      const list = opts.all
        ? store.getAllRequests()
        : store.getActiveRequests().slice(0, challenge.maxActiveRequests);

      if (list.length === 0) {
        print(opts.all ? '(no requests)' : '(no active requests)');
        return;
      }
      for (const r of list) print(formatRequestLine(r));
    });

  request
    .command('complete')
    .description('Mark a request as completed')
    .argument('<id>', 'request id')
    .action(async (id: string) => {
      const session = openSession(deps);
      const found = session.store.completeRequest(id);
      reportSave(session, print);

      if (!found) {
        print(`request not found: ${id}`);
        return;
      }
      print(`completed request: ${id}`);
      print(`active requests:   ${session.counts.activeRequestCount.value}`);
    });

  return request;
}
