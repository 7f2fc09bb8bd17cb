// packages/cli/src/commands/query.ts
import type { Command } from 'commander';

import { formatLogEntry, formatLowStock, printReport } from '@stockctl/inventory-state';

import { readConfig, resolveLowStockThreshold } from '../config_store.js';
import { makeCommandContext, openStore, type CommandDeps } from '../context.js';
import { readEvents, type StockEvent } from '../events.js';
import { parseIntOption } from '../utils.js';

function formatEvent(e: StockEvent): string {
  if (e.type === 'added') return formatLogEntry(e);
  return `${e.at}: Removed ${e.qty} of ${e.item} (${e.remaining} left)`;
}

export function registerQueryCommands(program: Command, deps: CommandDeps) {
  // stockctl get <item>
  program
    .command('get')
    .description('Print the quantity in stock for an item (0 if absent)')
    .argument('<item>', 'item name')
    .action(async (item: string) => {
      const ctx = makeCommandContext(deps);
      const store = openStore(ctx);
      if (store) ctx.log.info(`${item}: ${store.getQuantity(item)}`);
    });

  // stockctl low [--threshold n]
  program
    .command('low')
    .description('List items whose quantity is strictly below the threshold')
    .option('--threshold <n>', 'low-stock threshold (defaults to the profile setting, else 5)', parseIntOption)
    .action(async (opts: { threshold?: number }) => {
      const ctx = makeCommandContext(deps);
      const { paths, log } = ctx;
      const threshold =
        opts.threshold ??
        resolveLowStockThreshold(readConfig({ configFile: paths.configFile, logger: log }), paths.profile);

      const store = openStore(ctx);
      if (store) log.info(formatLowStock(store.lowStock(threshold)));
    });

  // stockctl report
  program
    .command('report')
    .description('Print every item and its quantity')
    .action(async () => {
      const ctx = makeCommandContext(deps);
      const store = openStore(ctx);
      if (store) printReport(store.toJSON(), ctx.log);
    });

  // stockctl log [--all]
  program
    .command('log')
    .description('Print the add history from the events log')
    .option('--all', 'include remove events', false)
    .action(async (opts: { all: boolean }) => {
      const { paths, log } = makeCommandContext(deps);
      const events = readEvents(paths.logFile).filter((e) => opts.all || e.type === 'added');

      if (events.length === 0) {
        log.info('(no events)');
        return;
      }
      for (const e of events) log.info(formatEvent(e));
    });

  return program;
}
