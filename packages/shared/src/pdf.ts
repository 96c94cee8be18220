/**
 * PDF text extraction (pdf-parse). Runs locally; scanned pages without a
 * text layer come back empty and are reported as PdfTextError.
 */

import { promises as fs } from 'node:fs';
import { PdfTextError, errorMessage } from './errors';
import { logger } from './logger';

export function normalizePdfText(text: string): string {
  return text
    .replace(/\r/g, '\n')
    .replace(/[ \t]+/g, ' ')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

export async function extractPdfTextFromBuffer(buffer: Buffer): Promise<string> {
  // Loaded on first use
  const { default: pdf } = await import('pdf-parse');

  let raw: string;
  let pageCount: number;
  try {
    const data = await pdf(buffer);
    raw = data.text || '';
    pageCount = data.numpages;
  } catch (error) {
    throw new PdfTextError(`Could not read PDF: ${errorMessage(error)}`, error);
  }

  const text = normalizePdfText(raw);
  if (!text) {
    throw new PdfTextError('PDF contains no extractable text (scanned images are not supported)');
  }

  logger.info('PDF text extracted', { pages: pageCount, text_length: text.length });
  return text;
}

export async function extractPdfText(filePath: string): Promise<string> {
  let buffer: Buffer;
  try {
    buffer = await fs.readFile(filePath);
  } catch (error) {
    throw new PdfTextError(`Could not open PDF ${filePath}: ${errorMessage(error)}`, error);
  }
  return extractPdfTextFromBuffer(buffer);
}
