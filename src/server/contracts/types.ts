/**
 * Contract Types
 *
 * TypeScript types and interfaces shared by data sources, the document
 * builders and the index queue.
 */

/**
 * Document type enumeration
 *
 * - 'DOCUMENT': a top-level record (e.g. a Basecamp todo)
 * - 'COMMENT': a comment nested under a DOCUMENT
 */
export type DocumentType = 'DOCUMENT' | 'COMMENT';

export const DocumentType = {
  DOCUMENT: 'DOCUMENT',
  COMMENT: 'COMMENT',
} as const satisfies Record<DocumentType, DocumentType>;

/**
 * Normalized document handed to the index queue.
 *
 * Only DOCUMENT-type documents carry children; COMMENT documents always have
 * an empty `children` array.
 */
export interface NormalizedDocument {
  id: string;
  dataSourceId: string;
  type: DocumentType;
  title: string;
  /** Plain text, or null when the source had no content */
  content: string | null;
  author: string;
  authorImageUrl: string | null;
  /** Where the document lives in the source, e.g. the project name */
  location: string;
  url: string;
  timestamp: Date;
  children: NormalizedDocument[];
}

/**
 * Sink for normalized documents.
 *
 * One call per top-level document; the comment tree travels in
 * `document.children`. Implementations must accept concurrent calls and treat
 * `(dataSourceId, id)` as the idempotency key.
 */
export interface IndexQueue {
  enqueue(document: NormalizedDocument): Promise<void>;
}

/**
 * HTML input types a configuration form can render
 */
export type HtmlInputType = 'text' | 'password' | 'textarea';

/**
 * Describes one configuration field of a data source
 */
export interface ConfigField {
  label: string;
  name: string;
  inputType: HtmlInputType;
  placeholder?: string;
}

/**
 * Record skipped while building documents
 */
export interface SkippedRecord {
  projectId: string;
  recordId: string | null;
  code: string;
  message: string;
}

/**
 * Processing unit that failed as a whole
 */
export interface FailedUnit {
  projectId: string;
  projectName: string;
  code: string;
  message: string;
}

/**
 * Outcome of one `feedNewDocuments` run
 */
export interface IngestionRunSummary {
  dataSourceId: string;
  projectCount: number;
  enqueuedCount: number;
  skippedRecords: SkippedRecord[];
  failedUnits: FailedUnit[];
  durationMs: number;
}
