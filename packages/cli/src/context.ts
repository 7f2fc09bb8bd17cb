// packages/cli/src/context.ts
import {
  InventoryStore,
  consoleLogger,
  loadInventory,
  type InventoryLogger,
} from '@stockctl/inventory-state';

import { readConfig } from './config_store.js';
import { resolveProfilePaths, type ProfilePaths } from './paths.js';

export type GetActivePaths = () => ProfilePaths;

export type CommandDeps = {
  getActivePaths: GetActivePaths;
  logger?: InventoryLogger;
  setExitCode?: (code: number) => void;
};

export type CommandContext = {
  paths: ProfilePaths;
  log: InventoryLogger;
  fail: () => void;
};

export function makeCommandContext(deps: CommandDeps): CommandContext {
  const setExitCode =
    deps.setExitCode ??
    ((code: number) => {
      process.exitCode = code;
    });

  return {
    paths: deps.getActivePaths(),
    log: deps.logger ?? consoleLogger,
    fail: () => setExitCode(1),
  };
}

/**
 * --profile wins; otherwise the config's currentProfile, otherwise "default".
 */
export function resolveActivePaths(args: {
  cwd: string;
  profile?: string;
  stateFile?: string;
  logFile?: string;
  env?: NodeJS.ProcessEnv;
  logger?: InventoryLogger;
}): ProfilePaths {
  const { cwd, env } = args;

  let profile = args.profile;
  if (!profile) {
    const { configFile } = resolveProfilePaths({ cwd, profile: 'default', env });
    profile = readConfig({ configFile, logger: args.logger })?.currentProfile ?? 'default';
  }

  return resolveProfilePaths({
    cwd,
    profile,
    stateOverride: args.stateFile ?? null,
    logOverride: args.logFile ?? null,
    env,
  });
}

/**
 * Load the profile's inventory. A missing or undecodable file gives an empty
 * store; a file that exists but cannot be read gives null and marks the command
 * failed, so nothing is ever saved over it.
 */
export function openStore(ctx: CommandContext): InventoryStore | null {
  const loaded = loadInventory(ctx.paths.stateFile, { logger: ctx.log });
  if (loaded.status === 'READ_FAILURE') {
    ctx.fail();
    return null;
  }
  return new InventoryStore({ initial: loaded.data, logger: ctx.log });
}
