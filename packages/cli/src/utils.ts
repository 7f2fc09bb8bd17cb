// packages/cli/src/utils.ts
import { InvalidArgumentError, type Command } from 'commander';

export function getOrCreateSubcommand(program: Command, name: string, description: string): Command {
  const existing = (program.commands ?? []).find((c) => c.name() === name);
  if (existing) return existing;
  return program.command(name).description(description);
}

/**
 * Strict integer parse for quantity operands. Anything else, including digit
 * strings past Number.MAX_SAFE_INTEGER, becomes NaN and is left for the store
 * to reject, so the rejection is reported the same way as every other invalid
 * input.
 */
export function parseQuantityArg(raw: string): number {
  const s = String(raw ?? '').trim();
  if (!/^-?\d+$/.test(s)) return Number.NaN;
  const n = Number(s);
  return Number.isSafeInteger(n) ? n : Number.NaN;
}

// commander option parser
export function parseIntOption(value: string): number {
  const n = parseQuantityArg(value);
  if (!Number.isInteger(n)) throw new InvalidArgumentError(`expected an integer, got "${value}"`);
  return n;
}
