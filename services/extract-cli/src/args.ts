/**
 * Command line argument parsing
 */

import { parseArgs } from 'node:util';
import { ConfigError, errorMessage } from '@formtable/shared';

export const USAGE =
  'Usage: npm run extract -- <input.pdf> [--out Output.xlsx] [--json] [--token-budget N] [--concurrency N]';

export interface CliArgs {
  input: string;
  out: string;
  json: boolean;
  help: boolean;
  tokenBudget?: number;
  concurrency?: number;
}

function positiveInteger(flag: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  if (!/^\d+$/.test(raw)) {
    throw new ConfigError(`--${flag} must be a positive integer, got "${raw}"`);
  }
  return parseInt(raw, 10);
}

function readArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      out: { type: 'string', short: 'o' },
      json: { type: 'boolean' },
      'token-budget': { type: 'string' },
      concurrency: { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
  });
}

export function parseCliArgs(argv: string[]): CliArgs {
  let parsed: ReturnType<typeof readArgs>;
  try {
    parsed = readArgs(argv);
  } catch (error) {
    throw new ConfigError(`${errorMessage(error)}\n${USAGE}`);
  }

  const { values, positionals } = parsed;
  const help = values.help ?? false;

  if (!help && positionals.length !== 1) {
    throw new ConfigError(`Expected exactly one input PDF\n${USAGE}`);
  }

  return {
    input: positionals[0] ?? '',
    out: values.out ?? 'Output.xlsx',
    json: values.json ?? false,
    help,
    tokenBudget: positiveInteger('token-budget', values['token-budget']),
    concurrency: positiveInteger('concurrency', values.concurrency),
  };
}
