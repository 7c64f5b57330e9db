/**
 * Artifact Store Interface — Where a Run's Output Goes
 * Layer: Domain
 * Pattern: Repository Pattern
 *
 * The core hands back encoded segments and a finished MatchIndex; how those
 * are persisted is decided here, outside the core. The domain states what it
 * needs, FileArtifactStore (Infrastructure) writes plain files, and tests
 * swap in a jest.fn() double.
 */
import type { NameIndexDocument } from '@domain/matching/MatchIndex';
import type { RunStatus } from '@shared/types';

export interface IArtifactStore {
  /** Persist one encoded segment. Returns where it was written. */
  writeSegment(index: number, content: string): Promise<string>;

  /**
   * Remove segments numbered `keep` and above, left by an earlier run that
   * wrote more of them. Returns the paths removed.
   */
  pruneSegments(keep: number): Promise<string[]>;

  /** Persist the canonical-name → document-number document. */
  writeNameIndex(document: NameIndexDocument): Promise<void>;

  /** Load the last persisted name index, or null when none exists. */
  readNameIndex(): Promise<NameIndexDocument | null>;

  /** Record the outcome of a run. */
  writeStatus(status: RunStatus): Promise<void>;

  /** Outcome of the last run, or null before the first one. */
  readStatus(): Promise<RunStatus | null>;
}
