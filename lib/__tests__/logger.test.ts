import { afterEach, describe, it, expect, jest } from "@jest/globals";

import { createLogger, getLogLevel, setLogLevel } from "../logger";

const initialLevel = getLogLevel();

afterEach(() => {
  setLogLevel(initialLevel);
  jest.restoreAllMocks();
});

describe("createLogger", () => {
  it("prefixes lines with the scope", () => {
    setLogLevel("info");
    const info = jest.spyOn(console, "log").mockImplementation(() => undefined);
    createLogger("runner").info("started", { runs: 2 });
    expect(info).toHaveBeenCalledWith("[runner] started", { runs: 2 });
  });

  it("drops messages below the threshold", () => {
    setLogLevel("warn");
    const info = jest.spyOn(console, "log").mockImplementation(() => undefined);
    const warn = jest.spyOn(console, "warn").mockImplementation(() => undefined);
    const log = createLogger("runner");
    log.info("quiet");
    log.warn("loud");
    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith("[runner] loud");
  });

  it("stays silent when silenced", () => {
    setLogLevel("silent");
    const error = jest.spyOn(console, "error").mockImplementation(() => undefined);
    createLogger("runner").error("nobody hears this");
    expect(error).not.toHaveBeenCalled();
  });
});
