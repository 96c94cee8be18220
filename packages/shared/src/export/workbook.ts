/**
 * Workbook Exporter
 *
 * Writes OutputRows to an .xlsx workbook: sheet "Output" with the columns
 * Sr No | Key | Value | Comments, plus an optional "Run Summary" sheet.
 */

import * as ExcelJS from 'exceljs';
import type { OutputRow, RunSummary } from '../types';
import { logger } from '../logger';
import { parseDateValue } from '../pipeline/value-normalization';

export const XLSX_MIME_TYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';
export const OUTPUT_SHEET_NAME = 'Output';
export const SUMMARY_SHEET_NAME = 'Run Summary';
export const OUTPUT_HEADERS = ['Sr No', 'Key', 'Value', 'Comments'] as const;
export const DATE_NUMBER_FORMAT = 'dd-mmm-yy';

const CONFLICT_FILL: ExcelJS.Fill = {
  type: 'pattern',
  pattern: 'solid',
  fgColor: { argb: 'FFFFEB9C' },
};

/**
 * Cell value for a row's value: a Date for recognized dates, the text as
 * written otherwise (numbers included).
 */
export function toCellValue(value: string): Date | string {
  const date = parseDateValue(value);
  return date ? new Date(Date.UTC(date.year, date.month - 1, date.day)) : value;
}

function addOutputSheet(workbook: ExcelJS.Workbook, rows: readonly OutputRow[]): void {
  const sheet = workbook.addWorksheet(OUTPUT_SHEET_NAME);
  sheet.columns = [
    { header: OUTPUT_HEADERS[0], key: 'srNo', width: 8 },
    { header: OUTPUT_HEADERS[1], key: 'key', width: 32 },
    { header: OUTPUT_HEADERS[2], key: 'value', width: 28 },
    { header: OUTPUT_HEADERS[3], key: 'comments', width: 80 },
  ];
  sheet.getRow(1).font = { bold: true };
  sheet.views = [{ state: 'frozen', ySplit: 1 }];

  for (const row of rows) {
    const added = sheet.addRow({
      srNo: row.srNo,
      key: row.key,
      value: toCellValue(row.value),
      comments: row.comments,
    });

    const valueCell = added.getCell(3);
    if (valueCell.value instanceof Date) {
      valueCell.numFmt = DATE_NUMBER_FORMAT;
    }
    added.getCell(4).alignment = { wrapText: true, vertical: 'top' };

    if (row.conflict) {
      added.eachCell((cell) => {
        cell.fill = CONFLICT_FILL;
      });
      valueCell.note = `Conflicts with earlier value: ${row.conflictsWith ?? ''}`;
    }
  }
}

function addSummarySheet(workbook: ExcelJS.Workbook, summary: RunSummary): void {
  const sheet = workbook.addWorksheet(SUMMARY_SHEET_NAME);
  sheet.columns = [
    { header: 'Item', key: 'item', width: 28 },
    { header: 'Detail', key: 'detail', width: 90 },
  ];
  sheet.getRow(1).font = { bold: true };

  sheet.addRow(['Run ID', summary.runId]);
  sheet.addRow(['Document', summary.documentId]);
  sheet.addRow(['Prompt Version', summary.promptVersion]);
  sheet.addRow(['Total Chunks', summary.totalChunks]);
  sheet.addRow(['Processed Chunks', summary.processedChunks]);
  sheet.addRow(['Failed Chunks', summary.failedChunks.length]);
  sheet.addRow(['Skipped Chunks', summary.skippedChunks.length]);
  sheet.addRow(['Extracted Records', summary.extractedRecordCount]);
  sheet.addRow(['Canonical Records', summary.canonicalRecordCount]);
  sheet.addRow(['Conflicts', summary.conflictCount]);
  sheet.addRow(['Rows', summary.rowCount]);
  sheet.addRow(['Aborted', summary.aborted ? `yes (${summary.abortReason ?? 'unknown'})` : 'no']);
  sheet.addRow(['Duration (ms)', summary.durationMs]);

  for (const failure of summary.failedChunks) {
    sheet.addRow([`Failed chunk ${failure.chunkIndex}`, `${failure.attempts} attempt(s): ${failure.error}`]);
  }
  if (summary.skippedChunks.length > 0) {
    sheet.addRow(['Skipped chunk indexes', summary.skippedChunks.join(', ')]);
  }
  for (const overflow of summary.overflows) {
    sheet.addRow([
      `Overflow at line ${overflow.lineNumber}`,
      `~${overflow.estimatedTokens} tokens (budget ${overflow.tokenBudget}): ${overflow.preview}`,
    ]);
  }
  for (const warning of summary.parseWarnings) {
    sheet.addRow([`Chunk ${warning.chunkIndex}: ${warning.code}`, warning.message]);
  }
}

export function buildWorkbook(rows: readonly OutputRow[], summary?: RunSummary): ExcelJS.Workbook {
  const workbook = new ExcelJS.Workbook();
  workbook.created = new Date();

  addOutputSheet(workbook, rows);
  if (summary) {
    addSummarySheet(workbook, summary);
  }
  return workbook;
}

export async function writeWorkbookBuffer(rows: readonly OutputRow[], summary?: RunSummary): Promise<Buffer> {
  const buffer = await buildWorkbook(rows, summary).xlsx.writeBuffer();
  return Buffer.from(buffer);
}

export async function writeWorkbookFile(
  filePath: string,
  rows: readonly OutputRow[],
  summary?: RunSummary
): Promise<void> {
  await buildWorkbook(rows, summary).xlsx.writeFile(filePath);
  logger.info('Workbook written', { path: filePath, rows: rows.length });
}
