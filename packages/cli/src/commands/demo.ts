// packages/cli/src/commands/demo.ts
import path from 'node:path';
import type { Command } from 'commander';

import {
  InventoryStore,
  formatLowStock,
  printReport,
  type InventoryData,
  type InventoryLogger,
} from '@stockctl/inventory-state';

import { makeCommandContext, type CommandDeps } from '../context.js';
import { parseQuantityArg } from '../utils.js';

export const DEMO_FILENAME = 'demo-inventory.json';

/**
 * Walk a fresh store through every accepted and rejected path, persist it,
 * read it back and print the report. Returns what was read back.
 */
export function runDemo(args: { filename: string; log: InventoryLogger }): InventoryData {
  const { filename, log } = args;
  const store = new InventoryStore({ logger: log });

  store.add('apple', 10);
  store.add('banana', -2);
  store.add('123', parseQuantityArg('ten'));

  store.remove('apple', 3);
  store.remove('orange', 1);

  log.info(`Apple stock: ${store.getQuantity('apple')}`);
  log.info(formatLowStock(store.lowStock()));

  store.save(filename);

  const reloaded = InventoryStore.fromFile(filename, { logger: log }).toJSON();
  printReport(reloaded, log);
  return reloaded;
}

export function registerDemoCommand(program: Command, deps: CommandDeps) {
  program
    .command('demo')
    .description(`Run the walkthrough against a scratch file (default: <profile dir>/${DEMO_FILENAME})`)
    .option('--file <path>', 'where the demo inventory is written')
    .action(async (opts: { file?: string }) => {
      const { paths, log } = makeCommandContext(deps);
      const filename = opts.file ? path.resolve(paths.cwd, opts.file) : path.resolve(paths.profileDir, DEMO_FILENAME);
      runDemo({ filename, log });
    });

  return program;
}
