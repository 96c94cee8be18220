/**
 * Extraction Templates
 */

import { RECORD_EXTRACTION_TEMPLATE } from './record-extraction.template';

export type { ExtractionTemplate } from './types';
export { RECORD_EXTRACTION_TEMPLATE };

/** Version of the default template, logged with each run */
export const PROMPT_VERSION = RECORD_EXTRACTION_TEMPLATE.version;
