/**
 * State store module exports.
 */

export {
  // Store operations
  assertStageName,
  loadDocument,
  ensureInitialized,
  getStage,
  setStage,
  readOnlyGet,
  resolveTransition,

  // Bound store
  createStateStore,
  type StateStore,
} from "./state-store.js";

export {
  // Display
  formatStageResult,
  formatDocument,
  toResultRecord,
  type StageResultRecord,
} from "./format.js";
