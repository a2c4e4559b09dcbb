/**
 * State Store
 *
 * Idempotency policy over a state backend. Records, per stage, whether it
 * was started or completed so that reruns can skip finished work.
 *
 * Rules:
 * - Initialization writes the empty document only when none exists.
 * - `completed` is terminal: a later set never reopens the stage.
 * - Setting a stage to its current status performs no write.
 * - Each call re-reads the document; nothing is cached between calls.
 */

import {
  createEmptyDocument,
  decodeDocument,
  encodeDocument,
  lookupStage,
} from "../ledger/document.js";
import { DocumentNotFoundError, InvalidStageNameError } from "../ledger/errors.js";
import { logger } from "../utils/index.js";

import type { StateBackend } from "../backends/backend.js";
import type {
  SetStageOptions,
  StageLookup,
  StageResult,
  StageStatus,
  StateDocument,
} from "../types/index.js";

/**
 * Reject empty stage names before touching the backend.
 *
 * @param stage - Stage name from the caller
 * @throws InvalidStageNameError if the name is empty
 */
export function assertStageName(stage: string): void {
  if (stage.length === 0) {
    throw new InvalidStageNameError(stage);
  }
}

/**
 * Load the state document.
 *
 * An absent location reads as an empty document.
 *
 * @param backend - State backend
 * @param location - Backend location
 * @returns Decoded document
 * @throws MalformedDocumentError if the stored document is corrupt
 * @throws BackendUnavailableError if the backend cannot be reached
 */
export async function loadDocument<L>(
  backend: StateBackend<L>,
  location: L,
): Promise<StateDocument> {
  let content: string;
  try {
    content = await backend.read(location);
  } catch (err) {
    if (err instanceof DocumentNotFoundError) {
      logger.debug(
        `No state document at ${backend.describe(location)}, treating as empty`,
      );
      return createEmptyDocument();
    }
    throw err;
  }

  return decodeDocument(content);
}

/**
 * Create the state document if it does not exist yet.
 *
 * Never overwrites an existing document, so it is safe to call on every
 * run.
 *
 * @param backend - State backend
 * @param location - Backend location
 * @returns True if a new document was written
 */
export async function ensureInitialized<L>(
  backend: StateBackend<L>,
  location: L,
): Promise<boolean> {
  if (await backend.exists(location)) {
    logger.debug(`State document present at ${backend.describe(location)}`);
    return false;
  }

  await backend.write(location, encodeDocument(createEmptyDocument()));
  logger.debug(`Initialized state document at ${backend.describe(location)}`);
  return true;
}

/**
 * Get the recorded status of a stage.
 *
 * @param backend - State backend
 * @param location - Backend location
 * @param stage - Stage name
 * @returns Recorded status, or "unset" if never touched
 */
export async function getStage<L>(
  backend: StateBackend<L>,
  location: L,
  stage: string,
): Promise<StageLookup> {
  assertStageName(stage);
  const doc = await loadDocument(backend, location);
  return lookupStage(doc, stage);
}

/**
 * Decide the outcome of moving a stage from `current` to `desired`.
 *
 * @param current - Recorded status
 * @param desired - Requested status
 * @returns Final status and whether it differs from the recorded one
 */
export function resolveTransition(
  current: StageLookup,
  desired: StageStatus,
): { status: StageLookup; changed: boolean } {
  if (current === "completed") {
    return { status: "completed", changed: false };
  }
  if (current === desired) {
    return { status: current, changed: false };
  }
  return { status: desired, changed: true };
}

/**
 * Record a stage status.
 *
 * Reads the document, updates the one stage and writes the full document
 * back. A completed stage stays completed whatever is requested.
 *
 * @param backend - State backend
 * @param location - Backend location
 * @param stage - Stage name
 * @param desired - Requested status
 * @param options - Set options
 * @returns Final status and whether the document changed
 */
export async function setStage<L>(
  backend: StateBackend<L>,
  location: L,
  stage: string,
  desired: StageStatus,
  options: SetStageOptions = {},
): Promise<StageResult> {
  assertStageName(stage);

  const doc = await loadDocument(backend, location);
  const current = lookupStage(doc, stage);
  const { status, changed } = resolveTransition(current, desired);

  if (!changed) {
    if (current === "completed" && desired !== "completed") {
      logger.debug(`Stage "${stage}" is completed; ignoring "${desired}"`);
    } else {
      logger.debug(`Stage "${stage}" already ${current}`);
    }
    return { stage, status, changed };
  }

  if (options.dryRun) {
    logger.debug(`Dry run: stage "${stage}" would move ${current} -> ${desired}`);
    return { stage, status, changed };
  }

  const updated: StateDocument = {
    ...doc,
    stages: { ...doc.stages, [stage]: desired },
  };
  await backend.write(location, encodeDocument(updated));
  logger.debug(`Stage "${stage}" ${current} -> ${desired}`);

  return { stage, status, changed };
}

/**
 * Look up a stage without ever writing.
 *
 * @param backend - State backend
 * @param location - Backend location
 * @param stage - Stage name
 * @param desired - Status the caller would have set; only logged
 * @returns Recorded status with changed=false
 */
export async function readOnlyGet<L>(
  backend: StateBackend<L>,
  location: L,
  stage: string,
  desired: StageStatus,
): Promise<StageResult> {
  const status = await getStage(backend, location, stage);
  logger.debug(`Read-only lookup of "${stage}" (requested ${desired}): ${status}`);
  return { stage, status, changed: false };
}

/**
 * A state store bound to one backend location.
 */
export interface StateStore {
  /** Human-readable location */
  readonly description: string;
  load(): Promise<StateDocument>;
  ensureInitialized(): Promise<boolean>;
  get(stage: string): Promise<StageLookup>;
  set(
    stage: string,
    desired: StageStatus,
    options?: SetStageOptions,
  ): Promise<StageResult>;
  readOnlyGet(stage: string, desired: StageStatus): Promise<StageResult>;
}

/**
 * Bind the store operations to a backend and location.
 *
 * @param backend - State backend
 * @param location - Backend location
 * @returns Bound state store
 */
export function createStateStore<L>(
  backend: StateBackend<L>,
  location: L,
): StateStore {
  return {
    description: backend.describe(location),
    load: async () => loadDocument(backend, location),
    ensureInitialized: async () => ensureInitialized(backend, location),
    get: async (stage) => getStage(backend, location, stage),
    set: async (stage, desired, options) =>
      setStage(backend, location, stage, desired, options),
    readOnlyGet: async (stage, desired) =>
      readOnlyGet(backend, location, stage, desired),
  };
}
