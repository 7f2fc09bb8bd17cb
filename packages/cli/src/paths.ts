// packages/cli/src/paths.ts
//
// Where a profile's files live:
//
//   <root>/.stockctl/config.json
//   <root>/.stockctl/profiles/<profile>/inventory.json
//   <root>/.stockctl/profiles/<profile>/events.ndjson
//
// <root> is STOCKCTL_HOME when set, else the closest directory above the
// invocation cwd that already has a config, else the cwd itself.
import path from 'node:path';
import fs from 'node:fs';

import { DEFAULT_INVENTORY_FILENAME } from '@stockctl/inventory-state';

export const STORE_DIRNAME = '.stockctl';
export const CONFIG_FILENAME = 'config.json';
export const EVENTS_FILENAME = 'events.ndjson';

const PROFILE_NAME = /^[\w-]+$/;

export type StoreRootSource = 'STOCKCTL_HOME' | 'config' | 'cwd';

export type StoreRoot = {
  dir: string;
  source: StoreRootSource;
};

export type ProfilePaths = {
  profile: string;
  /** invocation directory; relative paths given on the command line resolve here */
  cwd: string;
  root: StoreRoot;
  profileDir: string;
  configFile: string;
  stateFile: string;
  logFile: string;
};

export function sanitizeProfileName(name: string): string {
  const n = name.trim();
  if (n === '') return 'default';
  if (!PROFILE_NAME.test(n)) {
    throw new Error(`invalid profile name "${n}": use letters, digits, "_" or "-"`);
  }
  return n;
}

function hasConfig(dir: string): boolean {
  return fs.existsSync(path.join(dir, STORE_DIRNAME, CONFIG_FILENAME));
}

/** Closest directory at or above `start` holding `.stockctl/config.json`, or null. */
export function findConfigRoot(start: string): string | null {
  const dir = path.resolve(start);
  if (hasConfig(dir)) return dir;

  const parent = path.dirname(dir);
  return parent === dir ? null : findConfigRoot(parent);
}

export function resolveStoreRoot(cwd: string, env: NodeJS.ProcessEnv): StoreRoot {
  const home = env.STOCKCTL_HOME?.trim();
  if (home) return { dir: path.resolve(cwd, home), source: 'STOCKCTL_HOME' };

  const found = findConfigRoot(cwd);
  if (found) return { dir: found, source: 'config' };

  return { dir: path.resolve(cwd), source: 'cwd' };
}

export type ResolvePathsArgs = {
  cwd: string;
  profile: string;
  stateOverride?: string | null;
  logOverride?: string | null;
  env?: NodeJS.ProcessEnv;
};

export function resolveProfilePaths(args: ResolvePathsArgs): ProfilePaths {
  const cwd = path.resolve(args.cwd);
  const profile = sanitizeProfileName(args.profile);
  const root = resolveStoreRoot(cwd, args.env ?? process.env);

  const storeDir = path.join(root.dir, STORE_DIRNAME);
  const profileDir = path.join(storeDir, 'profiles', profile);

  // overrides are user input, so they follow the shell's cwd rather than the store root
  const fromCwd = (p: string | null | undefined) => (p ? path.resolve(cwd, p) : null);

  return {
    profile,
    cwd,
    root,
    profileDir,
    configFile: path.join(storeDir, CONFIG_FILENAME),
    stateFile: fromCwd(args.stateOverride) ?? path.join(profileDir, DEFAULT_INVENTORY_FILENAME),
    logFile: fromCwd(args.logOverride) ?? path.join(profileDir, EVENTS_FILENAME),
  };
}
