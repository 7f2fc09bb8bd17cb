// packages/cli/src/commands/config.ts
import fs from 'node:fs';
import type { Command } from 'commander';

import {
  ensureConfigDefaults,
  readConfig,
  resolveLowStockThreshold,
  upsertProfile,
  writeConfig,
} from '../config_store.js';
import { makeCommandContext, type CommandDeps } from '../context.js';
import { sanitizeProfileName } from '../paths.js';
import { getOrCreateSubcommand, parseIntOption } from '../utils.js';

export function registerConfigCommands(program: Command, deps: CommandDeps) {
  const config = getOrCreateSubcommand(program, 'config', 'Read and write profile settings');

  config
    .command('show')
    .description('Print the settings of the active profile')
    .action(async () => {
      const { paths, log } = makeCommandContext(deps);
      const cfg = readConfig({ configFile: paths.configFile, logger: log });
      const tag = fs.existsSync(paths.configFile) ? '(exists)' : '(missing)';

      log.info(`config:            ${paths.configFile} ${tag}`);
      log.info(`currentProfile:    ${cfg?.currentProfile ?? 'default'}`);
      log.info(`profile:           ${paths.profile}`);
      log.info(`lowStockThreshold: ${resolveLowStockThreshold(cfg, paths.profile)}`);
    });

  config
    .command('set-threshold')
    .description('Store the low-stock threshold for the active profile')
    .argument('<n>', 'integer threshold', parseIntOption)
    .action(async (threshold: number) => {
      const { paths, log } = makeCommandContext(deps);
      const cfg0 = ensureConfigDefaults(readConfig({ configFile: paths.configFile, logger: log }));
      const cfg = upsertProfile(cfg0, paths.profile, { lowStockThreshold: threshold });
      writeConfig({ configFile: paths.configFile, config: cfg });

      log.info(`lowStockThreshold for "${paths.profile}" set to ${threshold}`);
    });

  config
    .command('use')
    .description('Make a profile the default when --profile is not given')
    .argument('<profile>', 'profile name')
    .action(async (profileArg: string) => {
      const { paths, log } = makeCommandContext(deps);
      const profile = sanitizeProfileName(profileArg);

      const cfg0 = ensureConfigDefaults(readConfig({ configFile: paths.configFile, logger: log }));
      const cfg = upsertProfile({ ...cfg0, currentProfile: profile }, profile, {});
      writeConfig({ configFile: paths.configFile, config: cfg });

      log.info(`currentProfile set to "${profile}"`);
    });

  return config;
}
