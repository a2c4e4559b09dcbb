/**
 * Tests for the backend factory.
 */

import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import os from "node:os";
import path from "node:path";

import { NoSuchKey } from "@aws-sdk/client-s3";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  openStateStore,
  toObjectLocation,
  toS3ClientConfig,
} from "../../../src/backends/factory.js";

import type { ObjectStorageClient } from "../../../src/backends/object-storage-backend.js";
import type { S3BackendConfig } from "../../../src/types/index.js";

class RecordingObjectClient implements ObjectStorageClient {
  readonly objects = new Map<string, string>();

  async getObject(bucket: string, key: string): Promise<string> {
    const body = this.objects.get(`${bucket}/${key}`);
    if (body === undefined) {
      throw new NoSuchKey({
        message: "The specified key does not exist.",
        $metadata: { httpStatusCode: 404 },
      });
    }
    return body;
  }

  async putObject(bucket: string, key: string, body: string): Promise<void> {
    this.objects.set(`${bucket}/${key}`, body);
  }
}

const s3Config: S3BackendConfig = {
  type: "s3",
  bucket: "workflow-state",
  state_file: "env/prod/state.json",
  region: "eu-west-1",
  endpoint: "http://localhost:9000",
  force_path_style: true,
};

describe("toS3ClientConfig", () => {
  it("maps region, endpoint and path style", () => {
    expect(toS3ClientConfig(s3Config)).toEqual({
      region: "eu-west-1",
      endpoint: "http://localhost:9000",
      forcePathStyle: true,
    });
  });

  it("leaves unset values to the SDK defaults", () => {
    expect(
      toS3ClientConfig({
        type: "s3",
        bucket: "b",
        state_file: "k",
        force_path_style: false,
      }),
    ).toEqual({});
  });
});

describe("toObjectLocation", () => {
  it("uses the state file as the object key", () => {
    expect(toObjectLocation(s3Config)).toEqual({
      bucket: "workflow-state",
      key: "env/prod/state.json",
    });
  });
});

describe("openStateStore", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(path.join(os.tmpdir(), "factory-test-"));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it("opens a local store at the state file", async () => {
    const stateFile = path.join(tempDir, "state.json");
    const store = openStateStore({ type: "local", state_file: stateFile });

    expect(store.description).toBe(stateFile);
    await store.set("build", "started");

    expect(readFileSync(stateFile, "utf-8")).toBe(
      '{"version":"v1","stages":{"build":"started"}}',
    );
  });

  it("opens an s3 store with an injected client", async () => {
    const client = new RecordingObjectClient();
    const store = openStateStore(s3Config, { objectClient: client });

    expect(store.description).toBe("s3://workflow-state/env/prod/state.json");
    await expect(store.ensureInitialized()).resolves.toBe(true);
    await expect(store.get("build")).resolves.toBe("unset");

    expect(client.objects.get("workflow-state/env/prod/state.json")).toBe(
      '{"version":"v1","stages":{}}',
    );
  });
});
