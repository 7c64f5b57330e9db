/**
 * Shared Type Definitions
 * Layer: Shared (cross-cutting, used by every layer)
 *
 * Result and document shapes that more than one layer touches. RunStatus is
 * the status document written after every ingestion run; IngestionResult is
 * what the ingestion service returns to both the HTTP endpoint and the CLI.
 */
export type RunOutcome = 'success' | 'failure';

export interface RunStatus {
  /** ISO 8601 time the run finished. */
  timestamp: string;
  outcome: RunOutcome;
  message: string;
}

export interface RejectedRecord {
  lineNumber: number;
  reason: string;
}

export interface IngestionResult {
  totalProcessed: number;
  totalAccepted: number;
  totalRejected: number;
  segmentsWritten: number;
  indexSize: number;
  durationMs: number;
  rejections: RejectedRecord[];
}

export interface MatchLookupResult {
  name: string;
  key: string;
  documentNumber: string;
}
