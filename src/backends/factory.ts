/**
 * Backend factory.
 *
 * Builds the configured backend and binds it to its location.
 */

import { createStateStore, type StateStore } from "../state/index.js";

import { LocalBackend } from "./local-backend.js";
import {
  ObjectStorageBackend,
  S3ObjectStorageClient,
  type ObjectLocation,
  type ObjectStorageClient,
} from "./object-storage-backend.js";

import type { S3ClientConfig } from "@aws-sdk/client-s3";
import type { BackendConfig, S3BackendConfig } from "../types/index.js";

/**
 * Options for opening a store.
 */
export interface OpenStoreOptions {
  /** Object storage client to use instead of the AWS SDK one */
  objectClient?: ObjectStorageClient;
}

/**
 * Translate backend configuration into S3 client settings.
 *
 * Credentials are left to the SDK's default provider chain.
 *
 * @param config - S3 backend configuration
 * @returns S3 client configuration
 */
export function toS3ClientConfig(config: S3BackendConfig): S3ClientConfig {
  const clientConfig: S3ClientConfig = {};

  if (config.region) {
    clientConfig.region = config.region;
  }
  if (config.endpoint) {
    clientConfig.endpoint = config.endpoint;
  }
  if (config.force_path_style) {
    clientConfig.forcePathStyle = true;
  }

  return clientConfig;
}

/**
 * Resolve the object location for an S3 backend configuration.
 *
 * @param config - S3 backend configuration
 * @returns Bucket and key
 */
export function toObjectLocation(config: S3BackendConfig): ObjectLocation {
  return { bucket: config.bucket, key: config.state_file };
}

/**
 * Open a state store for the configured backend.
 *
 * @param config - Backend configuration
 * @param options - Factory options
 * @returns Bound state store
 */
export function openStateStore(
  config: BackendConfig,
  options: OpenStoreOptions = {},
): StateStore {
  switch (config.type) {
    case "local":
      return createStateStore(new LocalBackend(), config.state_file);
    case "s3": {
      const client =
        options.objectClient ??
        new S3ObjectStorageClient(toS3ClientConfig(config));
      return createStateStore(
        new ObjectStorageBackend(client),
        toObjectLocation(config),
      );
    }
  }
}
