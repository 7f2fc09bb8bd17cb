// packages/cli/src/config_store.ts
import fs from 'node:fs';
import path from 'node:path';

import {
  DEFAULT_LOW_STOCK_THRESHOLD,
  consoleLogger,
  errToString,
  type InventoryLogger,
} from '@stockctl/inventory-state';

export type ProfileConfigV1 = {
  lowStockThreshold?: number;
};

export type StockctlConfigV1 = {
  version: 1;
  createdAt: string;
  currentProfile: string;
  profiles: Record<string, ProfileConfigV1>;
};

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === 'object' && x !== null && !Array.isArray(x);
}

function ensureParentDir(filename: string) {
  fs.mkdirSync(path.dirname(filename), { recursive: true });
}

function normalizeProfile(x: unknown): ProfileConfigV1 {
  if (!isRecord(x)) return {};
  const t = x.lowStockThreshold;
  return typeof t === 'number' && Number.isInteger(t) ? { lowStockThreshold: t } : {};
}

export function ensureConfigDefaults(partial?: unknown): StockctlConfigV1 {
  const now = new Date().toISOString();
  const p = isRecord(partial) ? partial : {};

  const profiles: Record<string, ProfileConfigV1> = {};
  if (isRecord(p.profiles)) {
    for (const [name, prof] of Object.entries(p.profiles)) profiles[name] = normalizeProfile(prof);
  }

  return {
    version: 1,
    createdAt: typeof p.createdAt === 'string' && p.createdAt ? p.createdAt : now,
    currentProfile: typeof p.currentProfile === 'string' && p.currentProfile ? p.currentProfile : 'default',
    profiles,
  };
}

/**
 * Missing or undecodable config reads as null, so every command still runs
 * on defaults. The undecodable case is reported.
 */
export function readConfig(args: { configFile: string; logger?: InventoryLogger }): StockctlConfigV1 | null {
  const { configFile } = args;
  if (!fs.existsSync(configFile)) return null;

  const raw = fs.readFileSync(configFile, 'utf8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e) {
    (args.logger ?? consoleLogger).warn(`[config] Error decoding ${configFile}: ${errToString(e)}. Using defaults.`);
    return null;
  }
  return ensureConfigDefaults(parsed);
}

export function writeConfig(args: { configFile: string; config: StockctlConfigV1 }): void {
  const { configFile, config } = args;
  ensureParentDir(configFile);
  const normalized = ensureConfigDefaults(config);
  fs.writeFileSync(configFile, JSON.stringify(normalized, null, 2) + '\n', 'utf8');
}

export function upsertProfile(
  config: StockctlConfigV1,
  profile: string,
  patch: Partial<ProfileConfigV1>
): StockctlConfigV1 {
  const c = ensureConfigDefaults(config);
  const prev = c.profiles[profile] ?? {};
  return {
    ...c,
    profiles: {
      ...c.profiles,
      [profile]: { ...prev, ...patch },
    },
  };
}

export function resolveLowStockThreshold(config: StockctlConfigV1 | null, profile: string): number {
  return config?.profiles[profile]?.lowStockThreshold ?? DEFAULT_LOW_STOCK_THRESHOLD;
}
