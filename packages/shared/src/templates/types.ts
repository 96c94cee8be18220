/**
 * Extraction Template Types
 */

/**
 * Instructions sent to the model for one chunk of a document.
 */
export interface ExtractionTemplate {
  /** Bumped whenever the wording or the output convention changes */
  version: string;

  /**
   * Prompt template with placeholders:
   * - {{chunk_number}}: 1-based position of the chunk in the document
   * - {{chunk_count}}: Total number of chunks in the document
   * - {{chunk_text}}: The chunk text
   */
  promptTemplate: string;

  /** Human-readable description of what this template extracts */
  description: string;
}
