import {
  afterEach,
  beforeEach,
  describe,
  expect,
  it,
  type MockInstance,
  vi,
} from "vitest";

import {
  configureLogger,
  createLogger,
  debug,
  error,
  failure,
  formatMessage,
  getLoggerConfig,
  info,
  logger,
  resetLogger,
  success,
  table,
  warn,
} from "../../../src/utils/logging.js";

describe("configureLogger", () => {
  afterEach(() => {
    resetLogger();
  });

  it("merges partial configuration", () => {
    configureLogger({ level: "debug" });

    expect(getLoggerConfig()).toEqual({
      level: "debug",
      timestamps: false,
      colors: true,
    });
  });

  it("resetLogger restores defaults", () => {
    configureLogger({ level: "silent", colors: false });
    resetLogger();

    expect(getLoggerConfig().level).toBe("info");
    expect(getLoggerConfig().colors).toBe(true);
  });
});

describe("formatMessage", () => {
  afterEach(() => {
    resetLogger();
  });

  it("formats without colors", () => {
    configureLogger({ colors: false });

    expect(formatMessage("warn", "disk almost full")).toBe(
      "[WARN] disk almost full",
    );
  });

  it("includes the scope", () => {
    configureLogger({ colors: false });

    expect(formatMessage("debug", "wrote 10 bytes", "s3")).toBe(
      "[DEBUG] (s3) wrote 10 bytes",
    );
  });

  it("prefixes a timestamp when enabled", () => {
    configureLogger({ colors: false, timestamps: true });

    expect(formatMessage("info", "hello")).toMatch(
      /^\[\d{4}-\d{2}-\d{2}T[^\]]+\] \[INFO\] hello$/,
    );
  });
});

describe("log output", () => {
  let errorSpy: MockInstance;
  let logSpy: MockInstance;

  beforeEach(() => {
    configureLogger({ colors: false });
    errorSpy = vi.spyOn(console, "error").mockImplementation(vi.fn());
    logSpy = vi.spyOn(console, "log").mockImplementation(vi.fn());
  });

  afterEach(() => {
    vi.restoreAllMocks();
    resetLogger();
  });

  it("writes every level to stderr", () => {
    configureLogger({ level: "debug" });

    debug("d");
    info("i");
    warn("w");
    error("e");

    expect(errorSpy.mock.calls).toEqual([
      ["[DEBUG] d"],
      ["[INFO] i"],
      ["[WARN] w"],
      ["[ERROR] e"],
    ]);
    expect(logSpy).not.toHaveBeenCalled();
  });

  it("filters messages below configured level", () => {
    configureLogger({ level: "warn" });

    debug("debug message");
    info("info message");
    warn("warn message");
    error("error message");

    expect(errorSpy).toHaveBeenCalledTimes(2);
    expect(errorSpy).toHaveBeenNthCalledWith(1, "[WARN] warn message");
    expect(errorSpy).toHaveBeenNthCalledWith(2, "[ERROR] error message");
  });

  it("silent suppresses everything", () => {
    configureLogger({ level: "silent" });

    error("boom");
    success("done");

    expect(errorSpy).not.toHaveBeenCalled();
  });

  it("passes extra arguments through", () => {
    info("details", { stage: "build" });

    expect(errorSpy).toHaveBeenCalledWith("[INFO] details", { stage: "build" });
  });

  it("prints success and failure markers", () => {
    success("initialized");
    failure("not initialized");

    expect(errorSpy).toHaveBeenNthCalledWith(1, "[SUCCESS] initialized");
    expect(errorSpy).toHaveBeenNthCalledWith(2, "[FAILURE] not initialized");
  });

  it("hides success below info", () => {
    configureLogger({ level: "warn" });

    success("initialized");

    expect(errorSpy).not.toHaveBeenCalled();
  });

  it("scoped loggers tag their lines", () => {
    configureLogger({ level: "debug" });
    const log = createLogger("local");

    log.debug("read 42 bytes");
    log.warn("slow disk");

    expect(errorSpy).toHaveBeenNthCalledWith(1, "[DEBUG] (local) read 42 bytes");
    expect(errorSpy).toHaveBeenNthCalledWith(2, "[WARN] (local) slow disk");
  });

  it("logger.child is createLogger", () => {
    logger.child("s3").info("hello");

    expect(errorSpy).toHaveBeenCalledWith("[INFO] (s3) hello");
  });
});

describe("table", () => {
  it("pads columns to the widest cell", () => {
    const output = table(
      ["Name", "Value"],
      [
        ["a", "1"],
        ["longer", "22"],
      ],
    );

    expect(output.split("\n")).toEqual([
      "Name   | Value",
      "-------+------",
      "a      | 1    ",
      "longer | 22   ",
    ]);
  });

  it("renders headers only for empty rows", () => {
    expect(table(["Stage", "Status"], [])).toBe(
      "Stage | Status\n------+-------",
    );
  });
});
