#!/usr/bin/env node
// packages/cli/src/index.ts
import { errorMessage } from '@pixel-records/records';

import { buildProgram } from './program.js';

const program = buildProgram();

// MUST await parseAsync or Node may exit before async actions finish
(async () => {
  await program.parseAsync(process.argv);
})().catch((err: unknown) => {
  console.error('❌', errorMessage(err));
  process.exitCode = 1;
});
