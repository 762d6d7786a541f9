/**
 * Parser worker thread entry point.
 *
 * Owns one Model for its whole life. The model is loaded here, from bytes
 * moved in by the parent or from a path, and never leaves this thread.
 */
import { parentPort, workerData } from "node:worker_threads";

import type {
  NativeBinding,
  NativeBindingModule,
} from "../../interfaces/INativeBinding.js";
import type { SentenceRecord } from "../../interfaces/ISentenceRecord.js";
import { isLogLevel, createLogger, type LogLevel } from "../../logging/Logger.js";
import { Model } from "../parser/Model.js";

/**
 * Worker initialization data passed via workerData.
 */
export interface ParserWorkerInitData {
  /** Module specifier exporting `createBinding()` */
  readonly bindingModule: string;
  readonly logLevel: LogLevel;
}

export type ParserWorkerMessage =
  | LoadMessage
  | ParseMessage
  | ShutdownMessage;

export interface LoadMessage {
  readonly type: "load";
  readonly id: string;
  readonly path?: string;
  readonly bytes?: Uint8Array;
}

export interface ParseMessage {
  readonly type: "parse";
  readonly id: string;
  readonly text: string;
}

export interface ShutdownMessage {
  readonly type: "shutdown";
  readonly id: string;
}

export type ParserWorkerResponse =
  | LoadedResponse
  | ParsedResponse
  | ErrorResponse
  | ShutdownResponse;

export interface LoadedResponse {
  readonly type: "loaded";
  readonly id: string;
  readonly source: string;
}

export interface ParsedResponse {
  readonly type: "parsed";
  readonly id: string;
  readonly sentences: readonly SentenceRecord[];
}

export interface ErrorResponse {
  readonly type: "error";
  readonly id: string;
  readonly error: string;
  readonly code?: string;
}

export interface ShutdownResponse {
  readonly type: "shutdown";
  readonly id: string;
}

function isInitData(value: unknown): value is ParserWorkerInitData {
  return (
    typeof value === "object" &&
    value !== null &&
    "bindingModule" in value &&
    typeof value.bindingModule === "string" &&
    "logLevel" in value &&
    typeof value.logLevel === "string" &&
    isLogLevel(value.logLevel)
  );
}

function isBindingModule(value: unknown): value is NativeBindingModule {
  return (
    typeof value === "object" &&
    value !== null &&
    "createBinding" in value &&
    typeof value.createBinding === "function"
  );
}

/**
 * Worker state.
 */
let model: Model | null = null;
let binding: NativeBinding | null = null;

async function getBinding(init: ParserWorkerInitData): Promise<NativeBinding> {
  if (!binding) {
    const imported: unknown = await import(init.bindingModule);
    if (!isBindingModule(imported)) {
      throw new Error(
        `${init.bindingModule} does not export createBinding()`
      );
    }
    binding = imported.createBinding();
  }
  return binding;
}

function toErrorResponse(id: string, error: unknown): ErrorResponse {
  const message = error instanceof Error ? error.message : String(error);
  const code =
    error instanceof Error && "code" in error && typeof error.code === "string"
      ? error.code
      : null;
  return code
    ? { type: "error", id, error: message, code }
    : { type: "error", id, error: message };
}

async function handleMessage(message: ParserWorkerMessage): Promise<void> {
  const port = parentPort;
  if (!port) {
    return;
  }

  try {
    switch (message.type) {
      case "load": {
        if (!isInitData(workerData)) {
          throw new Error("Worker started without valid init data");
        }
        const options = {
          binding: await getBinding(workerData),
          logger: createLogger(workerData.logLevel),
        };
        model?.dispose();
        model = message.bytes
          ? Model.loadFromBytes(message.bytes, options)
          : Model.load(message.path ?? "", options);

        const response: LoadedResponse = {
          type: "loaded",
          id: message.id,
          source: model.source,
        };
        port.postMessage(response);
        break;
      }
      case "parse": {
        if (!model) {
          const response: ErrorResponse = {
            type: "error",
            id: message.id,
            error: "Worker has no model loaded",
          };
          port.postMessage(response);
          return;
        }
        const sentences = model
          .parseSentences(message.text)
          .map((sentence) => sentence.toRecord());
        const response: ParsedResponse = {
          type: "parsed",
          id: message.id,
          sentences,
        };
        port.postMessage(response);
        break;
      }
      case "shutdown": {
        model?.dispose();
        model = null;
        const response: ShutdownResponse = { type: "shutdown", id: message.id };
        port.postMessage(response);
        break;
      }
    }
  } catch (error) {
    port.postMessage(toErrorResponse(message.id, error));
  }
}

// Set up message handler
if (parentPort) {
  parentPort.on("message", (message: ParserWorkerMessage) => {
    void handleMessage(message);
  });
}
