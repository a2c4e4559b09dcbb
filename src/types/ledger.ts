/**
 * Ledger type definitions.
 * Represents the persisted state document and store results.
 */

/**
 * Status recorded for a stage.
 */
export type StageStatus = "started" | "completed";

/**
 * Status of a stage as seen by callers. `unset` is never persisted.
 */
export type StageLookup = StageStatus | "unset";

/**
 * Persisted state document.
 */
export interface StateDocument {
  /** Schema version, always "v1" */
  version: "v1";
  /** Stage name to recorded status; absent means never touched */
  stages: Record<string, StageStatus>;
}

/**
 * Outcome of a set or read-only lookup.
 */
export interface StageResult {
  stage: string;
  /** Final status after the call */
  status: StageLookup;
  /** Whether the document was (or, in dry run, would be) rewritten */
  changed: boolean;
}

/**
 * Options for set operations.
 */
export interface SetStageOptions {
  /** Compute the result without writing */
  dryRun?: boolean;
}
