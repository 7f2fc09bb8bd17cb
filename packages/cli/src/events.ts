// packages/cli/src/events.ts
//
// Per-profile operation history, one JSON object per line (events.ndjson).
import fs from 'node:fs';
import path from 'node:path';

import type { AddLogEntry, InventoryStore, RemoveEvent } from '@stockctl/inventory-state';

export type StockEvent = ({ type: 'added' } & AddLogEntry) | ({ type: 'removed' } & RemoveEvent);

export type EventRecorder = {
  events: StockEvent[];
  detach: () => void;
};

/**
 * Buffer store events in memory; callers append them only once the
 * inventory itself has been saved.
 */
export function recordEvents(store: InventoryStore): EventRecorder {
  const events: StockEvent[] = [];
  const onAdded = (e: AddLogEntry) => events.push({ type: 'added', ...e });
  const onRemoved = (e: RemoveEvent) => events.push({ type: 'removed', ...e });

  store.on('added', onAdded);
  store.on('removed', onRemoved);

  return {
    events,
    detach: () => {
      store.off('added', onAdded);
      store.off('removed', onRemoved);
    },
  };
}

export function appendEvents(logFile: string, events: readonly StockEvent[]): void {
  if (events.length === 0) return;
  fs.mkdirSync(path.dirname(logFile), { recursive: true });
  fs.appendFileSync(logFile, events.map((e) => JSON.stringify(e) + '\n').join(''), 'utf8');
}

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === 'object' && x !== null && !Array.isArray(x);
}

export function parseEventLine(line: string): StockEvent | null {
  let x: unknown;
  try {
    x = JSON.parse(line);
  } catch {
    return null;
  }
  if (!isRecord(x)) return null;

  const { type, at, item, qty } = x;
  if (typeof at !== 'string' || typeof item !== 'string' || typeof qty !== 'number') return null;

  if (type === 'added') return { type, at, item, qty };
  if (type === 'removed' && typeof x.remaining === 'number') {
    return { type, at, item, qty, remaining: x.remaining };
  }
  return null;
}

/** Missing file reads as no history; unparseable lines are skipped. */
export function readEvents(logFile: string): StockEvent[] {
  if (!fs.existsSync(logFile)) return [];
  const raw = fs.readFileSync(logFile, 'utf8');

  const out: StockEvent[] = [];
  for (const line of raw.split('\n')) {
    if (!line.trim()) continue;
    const ev = parseEventLine(line);
    if (ev) out.push(ev);
  }
  return out;
}
