// packages/inventory-state/src/report.ts
import type { AddLogEntry, InventoryData, InventoryLogger, JsonValue } from './types.js';
import { consoleLogger } from './logger.js';

function formatQuantity(v: JsonValue): string {
  return typeof v === 'number' ? String(v) : JSON.stringify(v);
}

export function formatReport(data: InventoryData): string[] {
  const lines = ['Items Report:'];
  for (const [item, qty] of Object.entries(data)) {
    lines.push(`${item} -> ${formatQuantity(qty)}`);
  }
  return lines;
}

export function printReport(data: InventoryData, logger: InventoryLogger = consoleLogger): void {
  logger.info('');
  for (const line of formatReport(data)) logger.info(line);
}

export function formatLowStock(items: readonly string[]): string {
  return `Low items: ${items.length > 0 ? items.join(', ') : '(none)'}`;
}

export function formatLogEntry(entry: AddLogEntry): string {
  return `${entry.at}: Added ${entry.qty} of ${entry.item}`;
}
