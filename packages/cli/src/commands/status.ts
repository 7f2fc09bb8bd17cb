// packages/cli/src/commands/status.ts
import fs from 'node:fs';
import type { Command } from 'commander';

import { readConfig, resolveLowStockThreshold } from '../config_store.js';
import { makeCommandContext, type CommandDeps } from '../context.js';
import { getOrCreateSubcommand } from '../utils.js';

function existsTag(file: string): string {
  return fs.existsSync(file) ? '(exists)' : '(missing)';
}

export function registerStatusCommand(program: Command, deps: CommandDeps) {
  const status = getOrCreateSubcommand(program, 'status', 'Show current profile and file locations');

  status.action(async () => {
    const { paths, log } = makeCommandContext(deps);
    const cfg = readConfig({ configFile: paths.configFile, logger: log });

    log.info(`profile:           ${paths.profile}`);
    log.info(`store root:        ${paths.root.dir} (${paths.root.source})`);
    log.info(`currentProfile:    ${cfg?.currentProfile ?? 'default'}`);
    log.info(`config:            ${paths.configFile} ${existsTag(paths.configFile)}`);
    log.info(`state file:        ${paths.stateFile} ${existsTag(paths.stateFile)}`);
    log.info(`events log:        ${paths.logFile} ${existsTag(paths.logFile)}`);
    log.info(`lowStockThreshold: ${resolveLowStockThreshold(cfg, paths.profile)}`);
  });

  return status;
}
