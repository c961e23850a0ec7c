import { createLogger, isLevelEnabled } from "../logger";

describe("Logger", () => {
  let log: jest.SpyInstance;
  let warn: jest.SpyInstance;
  let error: jest.SpyInstance;

  beforeEach(() => {
    log = jest.spyOn(console, "log").mockImplementation(() => undefined);
    warn = jest.spyOn(console, "warn").mockImplementation(() => undefined);
    error = jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("should order levels from debug to error", () => {
    expect(isLevelEnabled("debug", "info")).toBe(false);
    expect(isLevelEnabled("info", "info")).toBe(true);
    expect(isLevelEnabled("warn", "error")).toBe(false);
    expect(isLevelEnabled("error", "warn")).toBe(true);
  });

  it("should prefix lines with the tag", () => {
    createLogger("ingest", "debug").info("Parsed 2 rows", { source: "generic" });

    expect(log).toHaveBeenCalledWith("[ingest] Parsed 2 rows", { source: "generic" });
  });

  it("should only print errors at LOG_LEVEL=error", () => {
    const logger = createLogger("personas", "error");

    logger.debug("Persona counts:");
    logger.info("Scored batch");
    logger.warn("Skipped 1 of 2 records");
    logger.error("Error:", "boom");

    expect(log).not.toHaveBeenCalled();
    expect(warn).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledWith("[personas] Error:", "boom");
  });

  it("should drop debug lines at the default info level", () => {
    const logger = createLogger("personas", "info");

    logger.debug("Persona counts:");
    logger.warn("Skipped 1 of 2 records");

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith("[personas] Skipped 1 of 2 records");
  });
});
