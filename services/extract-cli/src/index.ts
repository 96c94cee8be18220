/**
 * Extract CLI
 *
 * Reads a PDF, runs the extraction pipeline and writes Output.xlsx
 * (or the rows and run summary as JSON on stdout).
 */

import * as path from 'node:path';
import {
  logger,
  reserveStdout,
  extractPdfText,
  runExtraction,
  writeWorkbookFile,
  OpenAiTransport,
  errorMessage,
} from '@formtable/shared';
import { parseCliArgs, USAGE } from './args';

async function main(argv: string[]): Promise<number> {
  try {
    const args = parseCliArgs(argv);
    if (args.help) {
      process.stdout.write(`${USAGE}\n`);
      return 0;
    }
    if (args.json) reserveStdout();

    const text = await extractPdfText(args.input);
    const run = await runExtraction(
      { id: path.basename(args.input), text },
      {
        transport: new OpenAiTransport(),
        options: { tokenBudget: args.tokenBudget, concurrency: args.concurrency },
      }
    );

    if (args.json) {
      process.stdout.write(`${JSON.stringify({ rows: run.rows, summary: run.summary }, null, 2)}\n`);
    } else {
      await writeWorkbookFile(args.out, run.rows, run.summary);
    }

    logger.info('Extraction finished', {
      input: args.input,
      output: args.json ? 'stdout' : args.out,
      rows: run.summary.rowCount,
      failed_chunks: run.summary.failedChunks.length,
      skipped_chunks: run.summary.skippedChunks.length,
      parse_warnings: run.summary.parseWarnings.length,
      aborted: run.summary.aborted,
    });
    return 0;
  } catch (error) {
    logger.error('Extraction failed', error);
    process.stderr.write(`${errorMessage(error)}\n`);
    return 1;
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    logger.error('Unexpected failure', error);
    process.exitCode = 1;
  }
);
