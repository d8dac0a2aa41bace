import { jest } from "@jest/globals";
import { createLogger, getLogLevel, isLogLevel, setLogLevel } from "../src";

describe("logger", () => {
  let logSpy: jest.SpiedFunction<typeof console.log>;
  let warnSpy: jest.SpiedFunction<typeof console.warn>;
  let errorSpy: jest.SpiedFunction<typeof console.error>;

  beforeEach(() => {
    setLogLevel("info");
    logSpy = jest.spyOn(console, "log").mockImplementation(() => {});
    warnSpy = jest.spyOn(console, "warn").mockImplementation(() => {});
    errorSpy = jest.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    setLogLevel("info");
    jest.restoreAllMocks();
  });

  test("drops messages below the current level", () => {
    setLogLevel("warn");
    const log = createLogger("scope");

    log.debug("debug message");
    log.info("info message");
    log.warn("warn message");
    log.error("error message");

    expect(logSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  test("prefixes messages with the scope", () => {
    const log = createLogger("materializer");
    log.info("cloned");

    expect(logSpy).toHaveBeenCalledTimes(1);
    const line = String(logSpy.mock.calls[0]?.[0]);
    expect(line).toContain("[materializer]");
    expect(line).toContain("cloned");
  });

  test("debug messages appear only at debug level", () => {
    const log = createLogger("scope");
    log.debug("hidden");
    expect(logSpy).not.toHaveBeenCalled();

    setLogLevel("DEBUG");
    log.debug("shown");
    expect(logSpy).toHaveBeenCalledTimes(1);
  });

  test("unknown level names fall back to info", () => {
    expect(setLogLevel("verbose")).toBe("info");
    expect(getLogLevel()).toBe("info");
  });

  test("isLogLevel", () => {
    expect(isLogLevel("warn")).toBe(true);
    expect(isLogLevel("trace")).toBe(false);
  });
});
