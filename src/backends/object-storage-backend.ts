/**
 * Object storage backend.
 *
 * Stores the state document as a single object in an S3-compatible bucket.
 * Writes rely on the provider's atomic replace of a whole object; there is
 * no conditional write, so concurrent writers race and the last one wins.
 */

import {
  GetObjectCommand,
  NoSuchKey,
  NotFound,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
  type S3ClientConfig,
} from "@aws-sdk/client-s3";

import {
  BackendUnavailableError,
  DocumentNotFoundError,
  toError,
} from "../ledger/errors.js";
import { createLogger } from "../utils/index.js";

import type { StateBackend } from "./backend.js";

const log = createLogger("s3");

/**
 * Location of a document in object storage.
 */
export interface ObjectLocation {
  bucket: string;
  key: string;
}

/**
 * Minimal object storage operations used by the backend.
 *
 * Implementations let provider errors propagate unchanged; the backend
 * classifies them.
 */
export interface ObjectStorageClient {
  getObject(bucket: string, key: string): Promise<string>;
  putObject(bucket: string, key: string, body: string): Promise<void>;
}

/**
 * ObjectStorageClient backed by the AWS SDK v3 S3 client.
 */
export class S3ObjectStorageClient implements ObjectStorageClient {
  private readonly client: S3Client;

  constructor(config: S3ClientConfig = {}) {
    this.client = new S3Client(config);
  }

  async getObject(bucket: string, key: string): Promise<string> {
    const response = await this.client.send(
      new GetObjectCommand({ Bucket: bucket, Key: key }),
    );

    if (!response.Body) {
      return "";
    }
    return response.Body.transformToString("utf-8");
  }

  async putObject(bucket: string, key: string, body: string): Promise<void> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: bucket,
        Key: key,
        Body: body,
        ContentType: "application/json",
      }),
    );
  }
}

/**
 * Error names S3-compatible stores use when a 404 carries no error code.
 */
const UNNAMED_ERROR_NAMES = new Set(["UnknownError", "Unknown"]);

/**
 * Determine whether a provider error means "object does not exist".
 *
 * GetObject reports a missing key as NoSuchKey; HEAD-style calls answer
 * NotFound. A 404 with any other code (NoSuchBucket) is not a missing
 * document.
 *
 * @param error - Error thrown by the client
 * @returns True if the object is absent
 */
export function isMissingObjectError(error: unknown): boolean {
  if (error instanceof NoSuchKey || error instanceof NotFound) {
    return true;
  }

  if (error instanceof S3ServiceException) {
    if (error.name === "NoSuchKey" || error.name === "NotFound") {
      return true;
    }
    return (
      error.$metadata.httpStatusCode === 404 &&
      UNNAMED_ERROR_NAMES.has(error.name)
    );
  }

  return false;
}

/**
 * Format an object location as an s3:// URI.
 *
 * @param location - Bucket and key
 * @returns URI string
 */
export function formatObjectLocation(location: ObjectLocation): string {
  return `s3://${location.bucket}/${location.key}`;
}

/**
 * S3-compatible state backend.
 */
export class ObjectStorageBackend implements StateBackend<ObjectLocation> {
  readonly kind = "s3" as const;

  constructor(private readonly client: ObjectStorageClient) {}

  async exists(location: ObjectLocation): Promise<boolean> {
    try {
      await this.fetch(location);
      return true;
    } catch (err) {
      if (err instanceof DocumentNotFoundError) {
        return false;
      }
      throw err;
    }
  }

  async read(location: ObjectLocation): Promise<string> {
    const content = await this.fetch(location);
    log.debug(
      `Read ${String(content.length)} bytes from ${formatObjectLocation(location)}`,
    );
    return content;
  }

  async write(location: ObjectLocation, content: string): Promise<void> {
    try {
      await this.client.putObject(location.bucket, location.key, content);
    } catch (err) {
      const cause = toError(err);
      throw new BackendUnavailableError(
        `Failed to write ${formatObjectLocation(location)}: ${cause.message}`,
        cause,
      );
    }

    log.debug(
      `Wrote ${String(content.length)} bytes to ${formatObjectLocation(location)}`,
    );
  }

  describe(location: ObjectLocation): string {
    return formatObjectLocation(location);
  }

  private async fetch(location: ObjectLocation): Promise<string> {
    try {
      return await this.client.getObject(location.bucket, location.key);
    } catch (err) {
      const uri = formatObjectLocation(location);
      if (isMissingObjectError(err)) {
        throw new DocumentNotFoundError(uri, toError(err));
      }
      const cause = toError(err);
      throw new BackendUnavailableError(
        `Failed to read ${uri}: ${cause.message}`,
        cause,
      );
    }
  }
}
