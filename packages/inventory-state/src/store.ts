// packages/inventory-state/src/store.ts
import { EventEmitter } from 'eventemitter3';

import type {
  AddLogEntry,
  InventoryData,
  InventoryEvents,
  InventoryLogger,
  JsonValue,
  RemoveEvent,
} from './types.js';
import { DEFAULT_LOW_STOCK_THRESHOLD } from './types.js';
import { InventoryError, type InventoryResult } from './errors.js';
import { consoleLogger } from './logger.js';
import { loadInventory, saveInventory, type SaveResult } from './io.js';

export type InventoryStoreOptions = {
  initial?: InventoryData | null;
  logger?: InventoryLogger;
  now?: () => Date;
};

/**
 * Single-owner inventory: item name -> quantity, plus an append-only add log.
 *
 * Invariants kept by add/remove:
 * - an item that drops to <= 0 is deleted, absence means "none in stock"
 * - rejected operations never mutate
 *
 * Loaded data is taken as-is, so entries may hold non-numeric values; those
 * read as 0 and are rejected by add/remove with INVALID_QUANTITY.
 */
export class InventoryStore extends EventEmitter<InventoryEvents> {
  private readonly items = new Map<string, JsonValue>();
  private readonly addLog: AddLogEntry[] = [];
  private readonly logger: InventoryLogger;
  private readonly now: () => Date;

  public constructor(opts: InventoryStoreOptions = {}) {
    super();
    this.logger = opts.logger ?? consoleLogger;
    this.now = opts.now ?? (() => new Date());

    for (const [item, value] of Object.entries(opts.initial ?? {})) {
      this.items.set(item, value);
    }
  }

  public static fromFile(filename: string, opts: Omit<InventoryStoreOptions, 'initial'> = {}): InventoryStore {
    const { data } = loadInventory(filename, { logger: opts.logger });
    return new InventoryStore({ ...opts, initial: data });
  }

  public get size(): number {
    return this.items.size;
  }

  public has(item: string): boolean {
    return this.items.has(item);
  }

  public add(item: string, qty: number): InventoryResult {
    if (typeof item !== 'string' || !Number.isInteger(qty)) {
      return this.reject(
        new InventoryError('INVALID_TYPE', 'Invalid input types. Item must be string, qty must be integer.', {
          item,
          qty,
        })
      );
    }

    if (qty < 0) {
      return this.reject(
        new InventoryError('NEGATIVE_QUANTITY', `Cannot add negative quantity (${qty} of "${item}").`, { item, qty })
      );
    }

    if (item === '') {
      return this.reject(new InventoryError('EMPTY_ITEM', 'Item name is empty.'), { silent: true });
    }

    const current = this.items.get(item);
    if (current !== undefined && typeof current !== 'number') {
      return this.reject(
        new InventoryError(
          'INVALID_QUANTITY',
          `Invalid quantity or data type: stored value for "${item}" is ${JSON.stringify(current)}`,
          { item, qty }
        )
      );
    }

    const next = (current ?? 0) + qty;
    this.setOrDelete(item, next);

    const entry: AddLogEntry = Object.freeze({ at: this.now().toISOString(), item, qty });
    this.addLog.push(entry);
    this.emit('added', entry);

    return { ok: true, item, quantity: Math.max(0, next) };
  }

  /**
   * Decrement an item. A negative qty is not rejected and increases stock.
   */
  public remove(item: string, qty: number): InventoryResult {
    if (!this.items.has(item)) {
      return this.reject(new InventoryError('ITEM_NOT_FOUND', `Item '${item}' not found in inventory.`, { item }));
    }

    const current = this.items.get(item);
    if (typeof current !== 'number' || !Number.isInteger(qty)) {
      const what =
        typeof current !== 'number'
          ? `stored value for "${item}" is ${JSON.stringify(current)}`
          : `qty ${String(qty)} is not an integer`;
      return this.reject(
        new InventoryError('INVALID_QUANTITY', `Invalid quantity or data type: ${what}`, { item, qty })
      );
    }

    const remaining = current - qty;
    this.setOrDelete(item, remaining);

    const event: RemoveEvent = Object.freeze({
      at: this.now().toISOString(),
      item,
      qty,
      remaining: Math.max(0, remaining),
    });
    this.emit('removed', event);

    return { ok: true, item, quantity: event.remaining };
  }

  public getQuantity(item: string): number {
    const v = this.items.get(item);
    return typeof v === 'number' ? v : 0;
  }

  public lowStock(threshold: number = DEFAULT_LOW_STOCK_THRESHOLD): string[] {
    const out: string[] = [];
    for (const [item, v] of this.items) {
      if (typeof v === 'number' && v < threshold) out.push(item);
    }
    return out;
  }

  public logs(): readonly AddLogEntry[] {
    return this.addLog.slice();
  }

  public entries(): Array<[string, JsonValue]> {
    return [...this.items.entries()];
  }

  public toJSON(): InventoryData {
    return Object.fromEntries(this.items);
  }

  public save(filename: string): SaveResult {
    return saveInventory(this.toJSON(), filename, { logger: this.logger });
  }

  private setOrDelete(item: string, quantity: number): void {
    if (quantity <= 0) this.items.delete(item);
    else this.items.set(item, quantity);
  }

  private reject(error: InventoryError, opts: { silent?: boolean } = {}): InventoryResult {
    if (!opts.silent) this.logger.warn(`[inventory] ${error.message}`);
    return { ok: false, error };
  }
}
