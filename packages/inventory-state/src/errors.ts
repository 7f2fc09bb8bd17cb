// packages/inventory-state/src/errors.ts

export type InventoryErrorCode =
  | 'INVALID_TYPE'
  | 'NEGATIVE_QUANTITY'
  | 'EMPTY_ITEM'
  | 'ITEM_NOT_FOUND'
  | 'INVALID_QUANTITY'
  | 'FILE_ABSENT'
  | 'DECODE_ERROR'
  | 'READ_FAILURE'
  | 'WRITE_FAILURE';

export class InventoryError extends Error {
  public readonly code: InventoryErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(code: InventoryErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'InventoryError';
    this.code = code;
    if (details && typeof details === 'object' && !Array.isArray(details)) {
      this.details = details;
    }
  }
}

export type InventoryResult =
  | { ok: true; item: string; quantity: number }
  | { ok: false; error: InventoryError };

export function errToString(e: unknown): string {
  if (e instanceof Error) return e.message;
  if (typeof e === 'string') return e;
  try {
    return JSON.stringify(e);
  } catch {
    return String(e);
  }
}
