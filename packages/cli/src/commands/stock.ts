// packages/cli/src/commands/stock.ts
import type { Command } from 'commander';

import type { InventoryResult } from '@stockctl/inventory-state';

import { makeCommandContext, openStore, type CommandDeps } from '../context.js';
import { appendEvents, recordEvents } from '../events.js';
import { parseQuantityArg } from '../utils.js';

type StockOp = 'add' | 'remove';

function runStockOp(deps: CommandDeps, op: StockOp, item: string, qtyArg: string): void {
  const ctx = makeCommandContext(deps);
  const { paths, log, fail } = ctx;

  const store = openStore(ctx);
  if (!store) {
    log.warn(`[stockctl] ${paths.stateFile} was not changed`);
    return;
  }

  const recorder = recordEvents(store);

  const qty = parseQuantityArg(qtyArg);
  const res: InventoryResult = op === 'add' ? store.add(item, qty) : store.remove(item, qty);
  recorder.detach();

  // store already reported the reason
  if (!res.ok) {
    fail();
    return;
  }

  const saved = store.save(paths.stateFile);
  if (!saved.ok) {
    fail();
    return;
  }

  appendEvents(paths.logFile, recorder.events);
  log.info(`${res.item}: ${res.quantity}`);
}

export function registerStockCommands(program: Command, deps: CommandDeps) {
  program
    .command('add')
    .description('Add a quantity of an item (creates the item if absent)')
    .argument('<item>', 'item name')
    .argument('<qty>', 'non-negative integer quantity')
    .action(async (item: string, qtyArg: string) => {
      runStockOp(deps, 'add', item, qtyArg);
    });

  program
    .command('remove')
    .description('Remove a quantity of an item (deletes it when stock reaches 0)')
    .argument('<item>', 'item name')
    .argument('<qty>', 'integer quantity')
    .action(async (item: string, qtyArg: string) => {
      runStockOp(deps, 'remove', item, qtyArg);
    });

  return program;
}
