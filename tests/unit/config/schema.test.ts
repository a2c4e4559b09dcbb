import { describe, expect, it } from "vitest";

import {
  BackendConfigSchema,
  LedgerConfigSchema,
  OutputConfigSchema,
  S3BackendConfigSchema,
} from "../../../src/config/schema.js";

describe("BackendConfigSchema", () => {
  it("accepts a local backend", () => {
    const result = BackendConfigSchema.parse({
      type: "local",
      state_file: "state.json",
    });

    expect(result).toEqual({ type: "local", state_file: "state.json" });
  });

  it("requires a non-empty state file", () => {
    expect(() =>
      BackendConfigSchema.parse({ type: "local", state_file: "" }),
    ).toThrow();
  });

  it("rejects an unknown type", () => {
    expect(() =>
      BackendConfigSchema.parse({ type: "ftp", state_file: "state.json" }),
    ).toThrow();
  });
});

describe("S3BackendConfigSchema", () => {
  it("applies default values", () => {
    const result = S3BackendConfigSchema.parse({
      type: "s3",
      bucket: "workflow-state",
      state_file: "state.json",
    });

    expect(result.force_path_style).toBe(false);
    expect(result.region).toBeUndefined();
    expect(result.endpoint).toBeUndefined();
  });

  it("requires a bucket", () => {
    expect(() =>
      S3BackendConfigSchema.parse({ type: "s3", state_file: "state.json" }),
    ).toThrow();
  });

  it("validates the endpoint URL", () => {
    expect(() =>
      S3BackendConfigSchema.parse({
        type: "s3",
        bucket: "workflow-state",
        state_file: "state.json",
        endpoint: "localhost",
      }),
    ).toThrow();

    const valid = S3BackendConfigSchema.parse({
      type: "s3",
      bucket: "workflow-state",
      state_file: "state.json",
      endpoint: "http://localhost:9000",
    });
    expect(valid.endpoint).toBe("http://localhost:9000");
  });
});

describe("OutputConfigSchema", () => {
  it("defaults to text", () => {
    expect(OutputConfigSchema.parse({}).format).toBe("text");
  });

  it("rejects unknown formats", () => {
    expect(() => OutputConfigSchema.parse({ format: "xml" })).toThrow();
  });
});

describe("LedgerConfigSchema", () => {
  it("applies default values", () => {
    const result = LedgerConfigSchema.parse({});

    expect(result.backend).toEqual({ type: "local", state_file: "state.json" });
    expect(result.output.format).toBe("text");
    expect(result.verbose).toBe(false);
    expect(result.debug).toBe(false);
  });

  it("rejects non-boolean flags", () => {
    expect(() => LedgerConfigSchema.parse({ verbose: "yes" })).toThrow();
  });
});
