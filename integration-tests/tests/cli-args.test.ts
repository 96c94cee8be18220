/**
 * CLI Argument Tests
 */

import { ConfigError } from '@formtable/shared';
import { parseCliArgs, USAGE } from '../../services/extract-cli/src/args';

describe('parseCliArgs', () => {
  it('defaults the output to Output.xlsx', () => {
    expect(parseCliArgs(['report.pdf'])).toEqual({
      input: 'report.pdf',
      out: 'Output.xlsx',
      json: false,
      help: false,
      tokenBudget: undefined,
      concurrency: undefined,
    });
  });

  it('reads output path, JSON mode and pipeline overrides', () => {
    const args = parseCliArgs(['-o', 'out/table.xlsx', '--json', '--token-budget', '2000', '--concurrency', '4', 'a.pdf']);

    expect(args).toMatchObject({
      input: 'a.pdf',
      out: 'out/table.xlsx',
      json: true,
      tokenBudget: 2000,
      concurrency: 4,
    });
  });

  it('accepts --help without an input file', () => {
    expect(parseCliArgs(['--help'])).toMatchObject({ help: true, input: '' });
  });

  it('requires exactly one input file', () => {
    expect(() => parseCliArgs([])).toThrow(ConfigError);
    expect(() => parseCliArgs(['a.pdf', 'b.pdf'])).toThrow('Expected exactly one input PDF');
  });

  it('points the usage line at the npm script', () => {
    expect(USAGE.startsWith('Usage: npm run extract -- <input.pdf>')).toBe(true);
    expect(() => parseCliArgs([])).toThrow(`Expected exactly one input PDF\n${USAGE}`);
  });

  it('rejects non-numeric budgets and unknown flags', () => {
    expect(() => parseCliArgs(['a.pdf', '--token-budget', 'lots'])).toThrow(
      '--token-budget must be a positive integer, got "lots"'
    );
    expect(() => parseCliArgs(['a.pdf', '--verbose'])).toThrow(ConfigError);
  });
});
