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
  debug,
  error,
  info,
  logger,
  progressBar,
  progressLine,
  resetLogger,
  sectionHeader,
  success,
  table,
  warn,
} from "../../../src/utils/logging.js";

describe("configureLogger", () => {
  afterEach(() => {
    resetLogger();
  });

  it("updates logger configuration", () => {
    configureLogger({ level: "debug" });

    const debugSpy = vi.spyOn(console, "debug").mockImplementation(vi.fn());
    debug("test");
    expect(debugSpy).toHaveBeenCalled();
    debugSpy.mockRestore();
  });

  it("merges partial configuration", () => {
    configureLogger({ timestamps: true, colors: false });

    const infoSpy = vi.spyOn(console, "info").mockImplementation(vi.fn());
    info("test");

    const call = String(infoSpy.mock.calls[0]?.[0]);
    expect(call).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] \[INFO\] test$/);
    infoSpy.mockRestore();
  });
});

describe("log level filtering", () => {
  let debugSpy: MockInstance;
  let infoSpy: MockInstance;
  let warnSpy: MockInstance;
  let errorSpy: MockInstance;

  beforeEach(() => {
    configureLogger({ colors: false });
    debugSpy = vi.spyOn(console, "debug").mockImplementation(vi.fn());
    infoSpy = vi.spyOn(console, "info").mockImplementation(vi.fn());
    warnSpy = vi.spyOn(console, "warn").mockImplementation(vi.fn());
    errorSpy = vi.spyOn(console, "error").mockImplementation(vi.fn());
  });

  afterEach(() => {
    vi.restoreAllMocks();
    resetLogger();
  });

  it("suppresses debug at the default info level", () => {
    debug("hidden");
    info("shown");

    expect(debugSpy).not.toHaveBeenCalled();
    expect(infoSpy).toHaveBeenCalledWith("[INFO] shown");
  });

  it("shows only errors at error level", () => {
    configureLogger({ level: "error" });

    info("hidden");
    warn("hidden");
    error("shown");

    expect(infoSpy).not.toHaveBeenCalled();
    expect(warnSpy).not.toHaveBeenCalled();
    expect(errorSpy).toHaveBeenCalledWith("[ERROR] shown");
  });

  it("passes extra arguments through", () => {
    const detail = { items: 3 };
    warn("with detail", detail);

    expect(warnSpy).toHaveBeenCalledWith("[WARN] with detail", detail);
  });

  it("routes through the logger object", () => {
    logger.configure({ level: "debug" });
    logger.debug("via object");

    expect(debugSpy).toHaveBeenCalledWith("[DEBUG] via object");
  });
});

describe("success", () => {
  afterEach(() => {
    vi.restoreAllMocks();
    resetLogger();
  });

  it("prints a plain success line without colors", () => {
    configureLogger({ colors: false });
    const logSpy = vi.spyOn(console, "log").mockImplementation(vi.fn());

    success("saved");

    expect(logSpy).toHaveBeenCalledWith("[SUCCESS] saved");
  });

  it("is suppressed above info level", () => {
    configureLogger({ level: "warn" });
    const logSpy = vi.spyOn(console, "log").mockImplementation(vi.fn());

    success("saved");

    expect(logSpy).not.toHaveBeenCalled();
  });
});

describe("sectionHeader", () => {
  afterEach(() => {
    vi.restoreAllMocks();
    resetLogger();
  });

  it("prints an uppercase heading between separators", () => {
    configureLogger({ colors: false });
    const logSpy = vi.spyOn(console, "log").mockImplementation(vi.fn());

    sectionHeader("Judge: strict", 12);

    expect(logSpy.mock.calls.map((call) => call[0])).toEqual([
      "=".repeat(60),
      "JUDGE: STRICT (12 items)",
      "=".repeat(60),
    ]);
  });

  it("omits the count when not given", () => {
    configureLogger({ colors: false });
    const logSpy = vi.spyOn(console, "log").mockImplementation(vi.fn());

    sectionHeader("summary");

    expect(logSpy.mock.calls[1]?.[0]).toBe("SUMMARY");
  });
});

describe("progressBar", () => {
  it("fills in proportion to progress", () => {
    expect(progressBar(1, 4, 8)).toBe("[██░░░░░░]");
    expect(progressBar(4, 4, 8)).toBe("[████████]");
  });

  it("renders an empty total as full", () => {
    expect(progressBar(0, 0, 4)).toBe("[████]");
  });

  it("never overflows", () => {
    expect(progressBar(9, 4, 4)).toBe("[████]");
  });
});

describe("progressLine", () => {
  it("combines counter, bar and percentage", () => {
    expect(progressLine(3, 4, 8)).toBe("[3/4] [██████░░] 75%");
  });
});

describe("table", () => {
  it("pads columns to the widest cell", () => {
    const output = table(["Name", "N"], [["strict", "10"], ["a", "7"]]);

    expect(output.split("\n")).toEqual([
      "Name   | N ",
      "-------+---",
      "strict | 10",
      "a      | 7 ",
    ]);
  });

  it("right-aligns columns on request", () => {
    const output = table(["Name", "N"], [["strict", "10"], ["a", "7"]], [
      "left",
      "right",
    ]);

    expect(output.split("\n")).toEqual([
      "Name   |  N",
      "-------+---",
      "strict | 10",
      "a      |  7",
    ]);
  });

  it("renders headers only when there are no rows", () => {
    expect(table(["A", "Bee"], [])).toBe("A | Bee\n--+----");
  });
});
