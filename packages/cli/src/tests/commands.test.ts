import { strict as assert } from 'node:assert';
import { describe, it } from 'node:test';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { Command } from 'commander';

import type { InventoryLogger } from '@stockctl/inventory-state';

import { resolveActivePaths, type CommandDeps } from '../context.js';
import { resolveProfilePaths, type ProfilePaths } from '../paths.js';
import { ensureConfigDefaults, upsertProfile, writeConfig } from '../config_store.js';
import { readEvents } from '../events.js';
import { registerStockCommands } from '../commands/stock.js';
import { registerQueryCommands } from '../commands/query.js';
import { registerConfigCommands } from '../commands/config.js';
import { registerDemoCommand, runDemo } from '../commands/demo.js';
import { registerStatusCommand } from '../commands/status.js';

type Harness = {
  paths: ProfilePaths;
  info: string[];
  warn: string[];
  exitCodes: number[];
  deps: CommandDeps;
};

function makeHarness(): Harness {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), 'stockctl-cmd-'));
  const paths = resolveProfilePaths({ cwd: root, profile: 'test', env: {} });
  const info: string[] = [];
  const warn: string[] = [];
  const exitCodes: number[] = [];
  const logger: InventoryLogger = {
    info: (m) => info.push(m),
    warn: (m) => warn.push(m),
  };

  return {
    paths,
    info,
    warn,
    exitCodes,
    deps: {
      getActivePaths: () => paths,
      logger,
      setExitCode: (code) => exitCodes.push(code),
    },
  };
}

function writeState(paths: ProfilePaths, data: Record<string, number>) {
  fs.mkdirSync(path.dirname(paths.stateFile), { recursive: true });
  fs.writeFileSync(paths.stateFile, JSON.stringify(data), 'utf8');
}

function eacces(file: string): NodeJS.ErrnoException {
  return Object.assign(new Error(`EACCES: permission denied, open '${file}'`), { code: 'EACCES' });
}

/**
 * With { from: 'user' } Commander expects only user args, e.g. ['add', 'apple', '10'].
 */
async function runCmd(userArgv: string[], h: Harness) {
  const program = new Command();
  program.exitOverride();
  registerStockCommands(program, h.deps);
  registerQueryCommands(program, h.deps);
  registerConfigCommands(program, h.deps);
  registerDemoCommand(program, h.deps);
  registerStatusCommand(program, h.deps);
  await program.parseAsync(userArgv, { from: 'user' });
}

describe('cli add/remove', () => {
  it('add on a fresh profile creates the file and records the event', async () => {
    const h = makeHarness();

    await runCmd(['add', 'apple', '10'], h);

    assert.deepEqual(h.info, [
      `[load] No existing inventory file found at ${h.paths.stateFile}. Starting fresh.`,
      'apple: 10',
    ]);
    assert.deepEqual(h.exitCodes, []);
    assert.equal(fs.readFileSync(h.paths.stateFile, 'utf8'), '{\n    "apple": 10\n}\n');

    const events = readEvents(h.paths.logFile);
    assert.equal(events.length, 1);
    assert.equal(events[0]?.type, 'added');
    assert.equal(events[0]?.item, 'apple');
    assert.equal(events[0]?.qty, 10);
  });

  it('add with a non-integer qty is rejected, nothing written', async () => {
    const h = makeHarness();
    writeState(h.paths, { apple: 3 });

    await runCmd(['add', 'apple', 'ten'], h);

    assert.deepEqual(h.warn, ['[inventory] Invalid input types. Item must be string, qty must be integer.']);
    assert.deepEqual(h.exitCodes, [1]);
    assert.equal(fs.readFileSync(h.paths.stateFile, 'utf8'), '{"apple":3}');
    assert.equal(fs.existsSync(h.paths.logFile), false);
  });

  it('remove of an absent item reports not-found and leaves the file alone', async () => {
    const h = makeHarness();
    writeState(h.paths, { apple: 7 });

    await runCmd(['remove', 'orange', '1'], h);

    assert.deepEqual(h.warn, ["[inventory] Item 'orange' not found in inventory."]);
    assert.deepEqual(h.exitCodes, [1]);
    assert.equal(fs.readFileSync(h.paths.stateFile, 'utf8'), '{"apple":7}');
  });

  it('add with a quantity past the safe integer range is rejected', async () => {
    const h = makeHarness();
    writeState(h.paths, { apple: 3 });

    await runCmd(['add', 'apple', '99999999999999999999'], h);

    assert.deepEqual(h.warn, ['[inventory] Invalid input types. Item must be string, qty must be integer.']);
    assert.deepEqual(h.exitCodes, [1]);
    assert.equal(fs.readFileSync(h.paths.stateFile, 'utf8'), '{"apple":3}');
  });

  it('an unreadable inventory file is never overwritten', async (t) => {
    const h = makeHarness();
    writeState(h.paths, { apple: 7, banana: 12 });
    const file = h.paths.stateFile;

    const readFileSync = fs.readFileSync;
    const read = t.mock.method(fs, 'readFileSync', (...args: Parameters<typeof fs.readFileSync>) => {
      if (args[0] === file) throw eacces(file);
      return readFileSync(...args);
    });

    await runCmd(['add', 'pear', '1'], h);
    await runCmd(['get', 'apple'], h);
    read.mock.restore();

    assert.deepEqual(h.warn, [
      `[load] Error reading inventory file ${file}: EACCES: permission denied, open '${file}'`,
      `[stockctl] ${file} was not changed`,
      `[load] Error reading inventory file ${file}: EACCES: permission denied, open '${file}'`,
    ]);
    assert.deepEqual(h.info, []);
    assert.deepEqual(h.exitCodes, [1, 1]);
    assert.equal(fs.readFileSync(file, 'utf8'), '{"apple":7,"banana":12}');
    assert.equal(fs.existsSync(h.paths.logFile), false);
  });

  it('a failed save exits 1 and appends no events', async (t) => {
    const h = makeHarness();
    writeState(h.paths, { apple: 7 });
    const file = h.paths.stateFile;

    const writeFileSync = fs.writeFileSync;
    const write = t.mock.method(fs, 'writeFileSync', (...args: Parameters<typeof fs.writeFileSync>) => {
      if (args[0] === file) throw eacces(file);
      writeFileSync(...args);
    });

    await runCmd(['add', 'apple', '1'], h);
    write.mock.restore();

    assert.deepEqual(h.warn, [`[save] Error saving data to ${file}: EACCES: permission denied, open '${file}'`]);
    assert.deepEqual(h.info, []);
    assert.deepEqual(h.exitCodes, [1]);
    assert.equal(fs.readFileSync(file, 'utf8'), '{"apple":7}');
    assert.equal(fs.existsSync(h.paths.logFile), false);
  });

  it('remove down to zero deletes the item', async () => {
    const h = makeHarness();
    writeState(h.paths, { apple: 7, pear: 1 });

    await runCmd(['remove', 'apple', '9'], h);

    assert.deepEqual(h.info, ['apple: 0']);
    assert.equal(fs.readFileSync(h.paths.stateFile, 'utf8'), '{\n    "pear": 1\n}\n');
  });
});

describe('cli queries', () => {
  it('get prints the quantity, 0 when absent', async () => {
    const h = makeHarness();
    writeState(h.paths, { apple: 7 });

    await runCmd(['get', 'apple'], h);
    await runCmd(['get', 'ghost'], h);

    assert.deepEqual(h.info, ['apple: 7', 'ghost: 0']);
  });

  it('low uses the profile threshold unless --threshold is given', async () => {
    const h = makeHarness();
    writeState(h.paths, { apple: 7, pear: 9, fig: 2 });
    writeConfig({
      configFile: h.paths.configFile,
      config: upsertProfile(ensureConfigDefaults(null), 'test', { lowStockThreshold: 8 }),
    });

    await runCmd(['low'], h);
    await runCmd(['low', '--threshold', '10'], h);
    await runCmd(['low', '--threshold', '0'], h);

    assert.deepEqual(h.info, ['Low items: apple, fig', 'Low items: apple, pear, fig', 'Low items: (none)']);
  });

  it('low defaults to 5 without a config', async () => {
    const h = makeHarness();
    writeState(h.paths, { apple: 7, fig: 2 });

    await runCmd(['low'], h);

    assert.deepEqual(h.info, ['Low items: fig']);
  });

  it('report lists every item', async () => {
    const h = makeHarness();
    writeState(h.paths, { apple: 7, pear: 9 });

    await runCmd(['report'], h);

    assert.deepEqual(h.info, ['', 'Items Report:', 'apple -> 7', 'pear -> 9']);
  });

  it('log prints add history; --all includes removals', async () => {
    const h = makeHarness();
    writeState(h.paths, {});

    await runCmd(['add', 'apple', '10'], h);
    await runCmd(['remove', 'apple', '4'], h);
    h.info.length = 0;

    await runCmd(['log'], h);
    assert.equal(h.info.length, 1);
    assert.match(h.info[0] ?? '', /^\d{4}-\d{2}-\d{2}T.*Z: Added 10 of apple$/);

    h.info.length = 0;
    await runCmd(['log', '--all'], h);
    assert.equal(h.info.length, 2);
    assert.match(h.info[1] ?? '', /Z: Removed 4 of apple \(6 left\)$/);
  });

  it('log with no history', async () => {
    const h = makeHarness();

    await runCmd(['log'], h);

    assert.deepEqual(h.info, ['(no events)']);
  });
});

describe('cli config', () => {
  it('set-threshold then show', async () => {
    const h = makeHarness();

    await runCmd(['config', 'set-threshold', '12'], h);
    await runCmd(['config', 'show'], h);

    assert.deepEqual(h.info, [
      'lowStockThreshold for "test" set to 12',
      `config:            ${h.paths.configFile} (exists)`,
      'currentProfile:    default',
      'profile:           test',
      'lowStockThreshold: 12',
    ]);
  });

  it('use sets currentProfile', async () => {
    const h = makeHarness();

    await runCmd(['config', 'use', 'shop'], h);

    const raw: unknown = JSON.parse(fs.readFileSync(h.paths.configFile, 'utf8'));
    assert.equal(ensureConfigDefaults(raw).currentProfile, 'shop');
    assert.deepEqual(h.info, ['currentProfile set to "shop"']);
  });
});

describe('cli status', () => {
  it('prints paths and whether they exist', async () => {
    const h = makeHarness();
    writeState(h.paths, { apple: 1 });

    await runCmd(['status'], h);

    assert.deepEqual(h.info, [
      'profile:           test',
      `store root:        ${h.paths.root.dir} (cwd)`,
      'currentProfile:    default',
      `config:            ${h.paths.configFile} (missing)`,
      `state file:        ${h.paths.stateFile} (exists)`,
      `events log:        ${h.paths.logFile} (missing)`,
      'lowStockThreshold: 5',
    ]);
  });
});

describe('malformed config', () => {
  it('status falls back to defaults and reports the config', async () => {
    const h = makeHarness();
    fs.mkdirSync(path.dirname(h.paths.configFile), { recursive: true });
    fs.writeFileSync(h.paths.configFile, 'not json', 'utf8');

    await runCmd(['status'], h);

    assert.deepEqual(h.exitCodes, []);
    assert.equal(h.warn.length, 1);
    assert.ok(h.warn[0]?.startsWith(`[config] Error decoding ${h.paths.configFile}: `));
    assert.equal(h.info[2], 'currentProfile:    default');
    assert.equal(h.info[6], 'lowStockThreshold: 5');
  });

  it('active profile resolution treats it as missing', () => {
    const root = fs.mkdtempSync(path.join(os.tmpdir(), 'stockctl-active-'));
    fs.mkdirSync(path.join(root, '.stockctl'));
    fs.writeFileSync(path.join(root, '.stockctl', 'config.json'), '{"currentProfile": "shop"', 'utf8');
    const warn: string[] = [];

    const p = resolveActivePaths({ cwd: root, env: {}, logger: { info: () => {}, warn: (m) => warn.push(m) } });

    assert.equal(p.profile, 'default');
    assert.equal(p.stateFile, path.join(root, '.stockctl', 'profiles', 'default', 'inventory.json'));
    assert.equal(warn.length, 1);
  });

  it('a valid config supplies currentProfile unless --profile is given', () => {
    const root = fs.mkdtempSync(path.join(os.tmpdir(), 'stockctl-active-'));
    writeConfig({
      configFile: path.join(root, '.stockctl', 'config.json'),
      config: { ...ensureConfigDefaults(null), currentProfile: 'shop' },
    });

    assert.equal(resolveActivePaths({ cwd: root, env: {} }).profile, 'shop');
    assert.equal(resolveActivePaths({ cwd: root, env: {}, profile: 'home' }).profile, 'home');
  });
});

describe('demo', () => {
  it('runs the walkthrough and reads back { apple: 7 }', () => {
    const h = makeHarness();
    const log: InventoryLogger = { info: (m) => h.info.push(m), warn: (m) => h.warn.push(m) };
    const filename = path.join(h.paths.profileDir, 'demo.json');

    const back = runDemo({ filename, log });

    assert.deepEqual(back, { apple: 7 });
    assert.deepEqual(h.warn, [
      '[inventory] Cannot add negative quantity (-2 of "banana").',
      '[inventory] Invalid input types. Item must be string, qty must be integer.',
      "[inventory] Item 'orange' not found in inventory.",
    ]);
    assert.deepEqual(h.info, ['Apple stock: 7', 'Low items: (none)', '', 'Items Report:', 'apple -> 7']);
  });

  it('demo command writes to the profile dir by default', async () => {
    const h = makeHarness();

    await runCmd(['demo'], h);

    const file = path.join(h.paths.profileDir, 'demo-inventory.json');
    assert.equal(fs.readFileSync(file, 'utf8'), '{\n    "apple": 7\n}\n');
    assert.equal(fs.existsSync(h.paths.stateFile), false);
  });

  it('demo --file resolves a relative path against the invocation cwd', async () => {
    const h = makeHarness();

    await runCmd(['demo', '--file', 'out/d.json'], h);

    assert.equal(fs.readFileSync(path.join(h.paths.cwd, 'out', 'd.json'), 'utf8'), '{\n    "apple": 7\n}\n');
  });
});
