// packages/inventory-state/src/index.ts
//
// Public exports for @stockctl/inventory-state.

export {
  DEFAULT_INVENTORY_FILENAME,
  DEFAULT_LOW_STOCK_THRESHOLD,
} from './types.js';

export type {
  JsonValue,
  InventoryData,
  AddLogEntry,
  RemoveEvent,
  InventoryEvents,
  InventoryLogger,
} from './types.js';

export { InventoryError, errToString } from './errors.js';
export type { InventoryErrorCode, InventoryResult } from './errors.js';

export { consoleLogger, silentLogger } from './logger.js';

export { InventoryStore } from './store.js';
export type { InventoryStoreOptions } from './store.js';

export { loadInventory, saveInventory } from './io.js';
export type { LoadStatus, LoadResult, SaveResult, InventoryIoOptions } from './io.js';

export { formatReport, printReport, formatLowStock, formatLogEntry } from './report.js';
