import { resolve } from "node:path";

import { ConfigError } from "../errors/UdpipeError.js";
import { isLogLevel, LOG_LEVELS, type LogLevel } from "../logging/Logger.js";

const DEFAULT_MODEL_DIR = "models";
const DEFAULT_LOG_LEVEL: LogLevel = "warnings";

export interface UdpipeConfig {
  /** Path of the udpipe_wrapper shared library, if configured */
  readonly libraryPath: string | null;
  /** Directory searched for downloaded `.udpipe` model files */
  readonly modelDir: string;
  readonly logLevel: LogLevel;
}

/**
 * Reads configuration from environment variables.
 *
 * - `UDPIPE_LIBRARY_PATH`: shared library for the native binding
 * - `UDPIPE_MODEL_DIR`: model directory (default `./models`)
 * - `UDPIPE_LOG_LEVEL`: one of silent, errors, warnings, info, debug
 *
 * @throws {ConfigError} When a value is present but unusable
 */
export function loadConfig(
  env: Readonly<Record<string, string | undefined>> = process.env
): UdpipeConfig {
  const libraryPath = nonEmpty(env.UDPIPE_LIBRARY_PATH);
  const modelDir = nonEmpty(env.UDPIPE_MODEL_DIR) ?? DEFAULT_MODEL_DIR;

  const rawLevel = nonEmpty(env.UDPIPE_LOG_LEVEL);
  let logLevel = DEFAULT_LOG_LEVEL;
  if (rawLevel !== null) {
    const normalized = rawLevel.toLowerCase();
    if (!isLogLevel(normalized)) {
      throw new ConfigError(
        "UDPIPE_LOG_LEVEL",
        rawLevel,
        `expected one of ${LOG_LEVELS.join(", ")}`
      );
    }
    logLevel = normalized;
  }

  return {
    libraryPath: libraryPath === null ? null : resolve(libraryPath),
    modelDir: resolve(modelDir),
    logLevel,
  };
}

function nonEmpty(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}
