// packages/inventory-state/src/types.ts

export const DEFAULT_INVENTORY_FILENAME = 'inventory.json';
export const DEFAULT_LOW_STOCK_THRESHOLD = 5;

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * On-disk shape: item name -> quantity.
 * Values are whatever the file held; nothing is schema-checked on load,
 * so non-numeric values are carried until an operation trips over them.
 */
export type InventoryData = Record<string, JsonValue>;

export type AddLogEntry = Readonly<{
  at: string; // ISO
  item: string;
  qty: number;
}>;

export type RemoveEvent = Readonly<{
  at: string; // ISO
  item: string;
  qty: number;
  remaining: number;
}>;

export type InventoryEvents = {
  added: [entry: AddLogEntry];
  removed: [event: RemoveEvent];
};

export type InventoryLogger = {
  info(message: string): void;
  warn(message: string): void;
};
