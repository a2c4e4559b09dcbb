/**
 * State document model.
 *
 * Pure encode/decode of the persisted JSON document:
 *
 *   { "version": "v1", "stages": { "<stage>": "started" | "completed" } }
 */

import { z } from "zod";

import { MalformedDocumentError, toError } from "./errors.js";

import type {
  StageLookup,
  StageStatus,
  StateDocument,
} from "../types/index.js";

/**
 * Current schema version.
 */
export const DOCUMENT_VERSION = "v1";

/**
 * Sentinel for a stage that has never been touched.
 */
export const UNSET = "unset";

/**
 * Stage status schema.
 */
export const StageStatusSchema = z.enum(["started", "completed"]);

/**
 * Raw document shape. The version is checked separately so that an
 * unknown version gets its own message.
 */
const RawDocumentSchema = z.object({
  version: z.string(),
  stages: z.record(
    z.string().min(1, "Stage name must not be empty"),
    StageStatusSchema,
  ),
});

/**
 * Check whether a value is a persistable stage status.
 *
 * @param value - Value to check
 * @returns True for "started" or "completed"
 */
export function isStageStatus(value: unknown): value is StageStatus {
  return StageStatusSchema.safeParse(value).success;
}

/**
 * Create an empty state document.
 *
 * @returns `{ version: "v1", stages: {} }`
 */
export function createEmptyDocument(): StateDocument {
  return { version: DOCUMENT_VERSION, stages: {} };
}

/**
 * Look up a stage, ignoring keys inherited from Object.prototype.
 *
 * @param doc - State document
 * @param stage - Stage name
 * @returns Recorded status, or "unset"
 */
export function lookupStage(doc: StateDocument, stage: string): StageLookup {
  if (!Object.hasOwn(doc.stages, stage)) {
    return UNSET;
  }
  return doc.stages[stage] ?? UNSET;
}

/**
 * Encode a document as canonical compact JSON.
 *
 * Stage keys are sorted so that equal documents encode identically.
 *
 * @param doc - Document to encode
 * @returns JSON text
 */
export function encodeDocument(doc: StateDocument): string {
  // fromEntries defines own keys, so a stage named "__proto__" is kept
  const stages = Object.fromEntries(
    Object.entries(doc.stages).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)),
  );

  return JSON.stringify({ version: doc.version, stages });
}

/**
 * Copy the own stage entries of a parsed document.
 *
 * zod's record parser omits a "__proto__" key from its output, so the
 * stages are taken from the validated input instead.
 *
 * @param raw - Parsed JSON that passed schema validation
 * @returns Stage map with every own key
 */
function ownStages(raw: unknown): Record<string, StageStatus> {
  const entries: [string, StageStatus][] = [];
  if (typeof raw === "object" && raw !== null && "stages" in raw) {
    const stages = raw.stages;
    if (typeof stages === "object" && stages !== null) {
      for (const [name, status] of Object.entries(stages)) {
        if (isStageStatus(status)) {
          entries.push([name, status]);
        }
      }
    }
  }
  return Object.fromEntries(entries);
}

/**
 * Decode persisted text into a document.
 *
 * @param text - Persisted JSON text
 * @returns Validated document
 * @throws MalformedDocumentError if the text is not a valid v1 document
 */
export function decodeDocument(text: string): StateDocument {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new MalformedDocumentError(
      "State document is not valid JSON",
      toError(err),
    );
  }

  const result = RawDocumentSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => {
        const field = issue.path.join(".");
        return `  - ${field || "(root)"}: ${issue.message}`;
      })
      .join("\n");
    throw new MalformedDocumentError(
      `State document has an unexpected shape:\n${issues}`,
      result.error,
    );
  }

  if (result.data.version !== DOCUMENT_VERSION) {
    throw new MalformedDocumentError(
      `Unsupported state document version "${result.data.version}" (expected "${DOCUMENT_VERSION}")`,
    );
  }

  return { version: DOCUMENT_VERSION, stages: ownStages(raw) };
}
