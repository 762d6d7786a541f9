import type { NativeBinding } from "../../interfaces/INativeBinding.js";
import { loadConfig } from "../../config/config.js";
import { createLogger, type Logger } from "../../logging/Logger.js";
import { createBinding } from "../../native/koffi/KoffiBinding.js";

let defaultBinding: NativeBinding | null = null;
let defaultLogger: Logger | null = null;

/**
 * Binding used when a Model is loaded without one. Falls back to the shared
 * library named by `UDPIPE_LIBRARY_PATH`.
 *
 * @throws {BindingUnavailableError} When no binding is set and the library cannot be loaded
 */
export function getDefaultBinding(): NativeBinding {
  if (!defaultBinding) {
    defaultBinding = createBinding();
  }
  return defaultBinding;
}

export function setDefaultBinding(binding: NativeBinding | null): void {
  defaultBinding = binding;
}

export function getDefaultLogger(): Logger {
  if (!defaultLogger) {
    defaultLogger = createLogger(loadConfig().logLevel);
  }
  return defaultLogger;
}

export function setDefaultLogger(logger: Logger | null): void {
  defaultLogger = logger;
}
