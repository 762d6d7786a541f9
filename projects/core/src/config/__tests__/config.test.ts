import { resolve } from "node:path";
import { describe, it, expect } from "vitest";

import { ConfigError } from "../../errors/UdpipeError.js";
import { loadConfig } from "../config.js";

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      libraryPath: null,
      modelDir: resolve("models"),
      logLevel: "warnings",
    });
  });

  it("reads and resolves every variable", () => {
    const config = loadConfig({
      UDPIPE_LIBRARY_PATH: "/opt/udpipe/libudpipe_wrapper.so",
      UDPIPE_MODEL_DIR: "/var/lib/udpipe",
      UDPIPE_LOG_LEVEL: "debug",
    });
    expect(config).toEqual({
      libraryPath: "/opt/udpipe/libudpipe_wrapper.so",
      modelDir: "/var/lib/udpipe",
      logLevel: "debug",
    });
  });

  it("trims values and treats blank ones as unset", () => {
    const config = loadConfig({
      UDPIPE_LIBRARY_PATH: "   ",
      UDPIPE_MODEL_DIR: "  /srv/models  ",
    });
    expect(config.libraryPath).toBeNull();
    expect(config.modelDir).toBe("/srv/models");
  });

  it("accepts log levels in any case", () => {
    expect(loadConfig({ UDPIPE_LOG_LEVEL: "INFO" }).logLevel).toBe("info");
  });

  it("rejects an unknown log level", () => {
    expect(() => loadConfig({ UDPIPE_LOG_LEVEL: "verbose" })).toThrow(ConfigError);
    expect(() => loadConfig({ UDPIPE_LOG_LEVEL: "verbose" })).toThrow(
      "Invalid configuration for UDPIPE_LOG_LEVEL: expected one of silent, errors, warnings, info, debug"
    );
  });
});
