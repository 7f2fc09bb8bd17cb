#!/usr/bin/env -S node --import tsx
// packages/cli/src/index.ts
/**
 * stockctl: inventory tracker CLI
 * -------------------------------
 * One inventory file per profile, kept under `.stockctl/`:
 *
 *   stockctl add apple 10
 *   stockctl remove apple 3
 *   stockctl get apple
 *   stockctl low --threshold 8
 *   stockctl report
 *   stockctl log --all
 *
 * Profiles:
 *   stockctl --profile shop add nails 200
 *   stockctl config use shop
 *   stockctl config set-threshold 20
 */

import { Command } from 'commander';

import { errToString } from '@stockctl/inventory-state';

import type { ProfilePaths } from './paths.js';
import { resolveActivePaths, type CommandDeps } from './context.js';

import { registerStockCommands } from './commands/stock.js';
import { registerQueryCommands } from './commands/query.js';
import { registerConfigCommands } from './commands/config.js';
import { registerStatusCommand } from './commands/status.js';
import { registerDemoCommand } from './commands/demo.js';

type GlobalOpts = {
  profile?: string;
  stateFile?: string;
  logFile?: string;
};

const program = new Command();

program
  .name('stockctl')
  .description('In-memory inventory tracker with JSON file persistence')
  .option('--profile <name>', 'profile to use (defaults to config currentProfile, else "default")')
  .option('--state-file <path>', 'inventory file (defaults to <profile dir>/inventory.json)')
  .option('--log-file <path>', 'events log (defaults to <profile dir>/events.ndjson)');

function getActivePaths(): ProfilePaths {
  const opts = program.opts<GlobalOpts>();
  return resolveActivePaths({
    cwd: process.cwd(),
    profile: opts.profile,
    stateFile: opts.stateFile,
    logFile: opts.logFile,
  });
}

const deps: CommandDeps = { getActivePaths };

registerStockCommands(program, deps);
registerQueryCommands(program, deps);
registerConfigCommands(program, deps);
registerStatusCommand(program, deps);
registerDemoCommand(program, deps);

try {
  await program.parseAsync(process.argv);
} catch (e) {
  console.error(`[stockctl] ${errToString(e)}`);
  process.exitCode = 1;
}
