/**
 * Workbook Exporter Tests
 */

import * as ExcelJS from 'exceljs';
import {
  buildWorkbook,
  toCellValue,
  writeWorkbookBuffer,
  OUTPUT_SHEET_NAME,
  SUMMARY_SHEET_NAME,
  type OutputRow,
  type RunSummary,
} from '@formtable/shared';

const rows: OutputRow[] = [
  { srNo: 1, key: 'Invoice Date', value: '01/05/2024', comments: 'Printed in header', conflict: false },
  { srNo: 2, key: 'Total', value: '1,200.50', comments: '', conflict: false },
  { srNo: 3, key: 'Agent Code', value: '007', comments: 'Assigned by branch', conflict: false },
  { srNo: 4, key: 'Total', value: '980', comments: 'after discount', conflict: true, conflictsWith: '1,200.50' },
];

const summary: RunSummary = {
  runId: 'run-1',
  documentId: 'invoice.pdf',
  promptVersion: 'record-extraction/v1',
  totalChunks: 3,
  processedChunks: 2,
  failedChunks: [{ chunkIndex: 2, attempts: 3, error: 'HTTP 503' }],
  skippedChunks: [],
  overflows: [],
  parseWarnings: [],
  extractedRecordCount: 5,
  canonicalRecordCount: 4,
  conflictCount: 1,
  rowCount: 4,
  aborted: false,
  durationMs: 1234,
};

function outputSheet(workbook: ExcelJS.Workbook): ExcelJS.Worksheet {
  const sheet = workbook.getWorksheet(OUTPUT_SHEET_NAME);
  if (!sheet) throw new Error('Output sheet missing');
  return sheet;
}

describe('toCellValue', () => {
  it('turns dates into UTC dates and keeps everything else as written', () => {
    expect(toCellValue('01/05/2024')).toEqual(new Date(Date.UTC(2024, 0, 5)));
    expect(toCellValue('1,200.50')).toBe('1,200.50');
    expect(toCellValue('007')).toBe('007');
    expect(toCellValue('92.5%')).toBe('92.5%');
  });

  it('keeps long numbers, signs and trailing zeros intact', () => {
    expect(['12345678901234567891', '+14155550123', '2.10'].map(toCellValue)).toEqual([
      '12345678901234567891',
      '+14155550123',
      '2.10',
    ]);
  });
});

describe('buildWorkbook', () => {
  it('writes the header row and one row per output row', () => {
    const sheet = outputSheet(buildWorkbook(rows));

    expect(sheet.getRow(1).values).toEqual([undefined, 'Sr No', 'Key', 'Value', 'Comments']);
    expect(sheet.rowCount).toBe(5);
    expect(sheet.getCell('A2').value).toBe(1);
    expect(sheet.getCell('B2').value).toBe('Invoice Date');
    expect(sheet.getCell('D2').value).toBe('Printed in header');
  });

  it('writes dates as formatted date cells and other values as text', () => {
    const sheet = outputSheet(buildWorkbook(rows));

    expect(sheet.getCell('C2').value).toEqual(new Date(Date.UTC(2024, 0, 5)));
    expect(sheet.getCell('C2').numFmt).toBe('dd-mmm-yy');
    expect(sheet.getCell('C3').value).toBe('1,200.50');
    expect(sheet.getCell('C4').value).toBe('007');
  });

  it('highlights conflict rows and notes the earlier value', () => {
    const sheet = outputSheet(buildWorkbook(rows));

    expect(sheet.getCell('A5').fill).toEqual({ type: 'pattern', pattern: 'solid', fgColor: { argb: 'FFFFEB9C' } });
    expect(sheet.getCell('C5').fill).toEqual({ type: 'pattern', pattern: 'solid', fgColor: { argb: 'FFFFEB9C' } });
    expect(sheet.getCell('C5').note).toBe('Conflicts with earlier value: 1,200.50');
    expect(sheet.getCell('C3').note).toBeUndefined();
  });

  it('adds a run summary sheet only when given a summary', () => {
    expect(buildWorkbook(rows).getWorksheet(SUMMARY_SHEET_NAME)).toBeUndefined();

    const sheet = buildWorkbook(rows, summary).getWorksheet(SUMMARY_SHEET_NAME);

    expect(sheet?.getCell('A2').value).toBe('Run ID');
    expect(sheet?.getCell('B2').value).toBe('run-1');
    expect(sheet?.getCell('B13').value).toBe('no');
    expect(sheet?.getCell('A15').value).toBe('Failed chunk 2');
    expect(sheet?.getCell('B15').value).toBe('3 attempt(s): HTTP 503');
  });

  it('writes an empty table with only the header', () => {
    const sheet = outputSheet(buildWorkbook([]));

    expect(sheet.rowCount).toBe(1);
  });
});

describe('writeWorkbookBuffer', () => {
  it('produces an xlsx archive that reads back', async () => {
    const buffer = await writeWorkbookBuffer(rows, summary);

    expect(buffer.subarray(0, 2).toString('latin1')).toBe('PK');

    const loaded = new ExcelJS.Workbook();
    await loaded.xlsx.load(buffer);

    expect(loaded.worksheets.map((s) => s.name)).toEqual([OUTPUT_SHEET_NAME, SUMMARY_SHEET_NAME]);
    const sheet = outputSheet(loaded);
    expect(sheet.getCell('B3').value).toBe('Total');
    expect(sheet.getCell('C3').value).toBe('1,200.50');
    expect(sheet.getCell('C4').value).toBe('007');
  });
});
