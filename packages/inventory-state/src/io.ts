// packages/inventory-state/src/io.ts
import fs from 'node:fs';
import path from 'node:path';

import type { InventoryData, InventoryLogger } from './types.js';
import { DEFAULT_INVENTORY_FILENAME } from './types.js';
import { InventoryError, errToString } from './errors.js';
import { consoleLogger } from './logger.js';

export type LoadStatus = 'loaded' | 'FILE_ABSENT' | 'DECODE_ERROR' | 'READ_FAILURE';

export type LoadResult = {
  data: InventoryData;
  status: LoadStatus;
  error?: InventoryError;
};

export type SaveResult =
  | { ok: true; filename: string }
  | { ok: false; error: InventoryError };

export type InventoryIoOptions = {
  logger?: InventoryLogger;
};

function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && 'code' in e;
}

function isInventoryObject(x: unknown): x is InventoryData {
  return typeof x === 'object' && x !== null && !Array.isArray(x);
}

/**
 * Read an inventory file.
 * - Missing file: empty inventory, "starting fresh".
 * - Unparseable or non-object JSON: empty inventory, decode error reported.
 * - Any other read error: empty inventory, status READ_FAILURE. Callers that
 *   write back must check for it.
 * - Never throws; callers branch on `status` if they care.
 */
export function loadInventory(
  filename: string = DEFAULT_INVENTORY_FILENAME,
  opts: InventoryIoOptions = {}
): LoadResult {
  const logger = opts.logger ?? consoleLogger;

  let raw: string;
  try {
    raw = fs.readFileSync(filename, 'utf8');
  } catch (e) {
    if (isErrnoException(e) && e.code === 'ENOENT') {
      const error = new InventoryError('FILE_ABSENT', `No existing inventory file found at ${filename}.`, {
        filename,
      });
      logger.info(`[load] ${error.message} Starting fresh.`);
      return { data: {}, status: 'FILE_ABSENT', error };
    }

    const error = new InventoryError('READ_FAILURE', `Error reading inventory file ${filename}: ${errToString(e)}`, {
      filename,
    });
    logger.warn(`[load] ${error.message}`);
    return { data: {}, status: 'READ_FAILURE', error };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e) {
    const error = new InventoryError('DECODE_ERROR', `Error decoding inventory file ${filename}: ${errToString(e)}`, {
      filename,
    });
    logger.warn(`[load] ${error.message}. Starting fresh.`);
    return { data: {}, status: 'DECODE_ERROR', error };
  }

  if (!isInventoryObject(parsed)) {
    const kind = Array.isArray(parsed) ? 'array' : parsed === null ? 'null' : typeof parsed;
    const error = new InventoryError(
      'DECODE_ERROR',
      `Error decoding inventory file ${filename}: top level is ${kind}, expected an object`,
      { filename }
    );
    logger.warn(`[load] ${error.message}. Starting fresh.`);
    return { data: {}, status: 'DECODE_ERROR', error };
  }

  return { data: parsed, status: 'loaded' };
}

/**
 * Write the inventory as 4-space indented JSON, in place.
 * No temp file and no backup: a failed write leaves whatever the OS left.
 */
export function saveInventory(
  data: InventoryData,
  filename: string = DEFAULT_INVENTORY_FILENAME,
  opts: InventoryIoOptions = {}
): SaveResult {
  const logger = opts.logger ?? consoleLogger;

  try {
    fs.mkdirSync(path.dirname(filename), { recursive: true });
    fs.writeFileSync(filename, JSON.stringify(data, null, 4) + '\n', 'utf8');
    return { ok: true, filename };
  } catch (e) {
    const error = new InventoryError('WRITE_FAILURE', `Error saving data to ${filename}: ${errToString(e)}`, {
      filename,
    });
    logger.warn(`[save] ${error.message}`);
    return { ok: false, error };
  }
}
