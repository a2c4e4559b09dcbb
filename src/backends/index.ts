/**
 * State backend exports.
 */

export type { StateBackend } from "./backend.js";

export { LocalBackend } from "./local-backend.js";

export {
  ObjectStorageBackend,
  S3ObjectStorageClient,
  formatObjectLocation,
  isMissingObjectError,
  type ObjectLocation,
  type ObjectStorageClient,
} from "./object-storage-backend.js";

export {
  openStateStore,
  toS3ClientConfig,
  toObjectLocation,
  type OpenStoreOptions,
} from "./factory.js";
