/**
 * Runs a Model on its own worker thread.
 *
 * Model bytes are moved to the worker (the caller's ArrayBuffer is
 * transferred and detached), the worker loads and owns the model, and parsed
 * sentences come back as plain records. Requests are answered in order.
 */
import { Worker, type TransferListItem } from "node:worker_threads";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";

import { WorkerError } from "../../errors/UdpipeError.js";
import type { LogLevel } from "../../logging/Logger.js";
import { loadConfig } from "../../config/config.js";
import { Sentence } from "../parser/Sentence.js";
import type {
  ParserWorkerInitData,
  ParserWorkerMessage,
  ParserWorkerResponse,
} from "./parser.worker.js";

export type WorkerModelSource =
  | { readonly path: string }
  | {
      readonly bytes: Uint8Array;
      /**
       * Transfer the underlying ArrayBuffer instead of copying it. Only
       * applies when `bytes` spans its whole buffer. Default: true
       */
      readonly transfer?: boolean;
    };

export interface ParserWorkerOptions {
  readonly model: WorkerModelSource;
  /**
   * Module the worker imports to build its binding. Must export
   * `createBinding()`. Defaults to the shared library binding.
   */
  readonly bindingModule?: string;
  readonly logLevel?: LogLevel;
}

interface PendingRequest {
  readonly resolve: (response: ParserWorkerResponse) => void;
  readonly reject: (error: Error) => void;
}

const DEFAULT_BINDING_MODULE = new URL(
  "../../native/koffi/KoffiBinding.js",
  import.meta.url
).href;

export class ParserWorker {
  private readonly source: WorkerModelSource;
  private readonly bindingModule: string;
  private readonly logLevel: LogLevel | undefined;
  private readonly pending = new Map<string, PendingRequest>();
  private worker: Worker | null = null;
  private requestIdCounter = 0;
  private isInitialized = false;

  constructor(options: Readonly<ParserWorkerOptions>) {
    this.source = options.model;
    this.bindingModule = options.bindingModule ?? DEFAULT_BINDING_MODULE;
    this.logLevel = options.logLevel;
  }

  get isReady(): boolean {
    return this.isInitialized;
  }

  /**
   * Starts the thread and loads the model on it.
   *
   * @throws {WorkerError} When the worker cannot start or load the model
   */
  async initialize(): Promise<void> {
    if (this.isInitialized) {
      return;
    }

    const initData: ParserWorkerInitData = {
      bindingModule: this.bindingModule,
      logLevel: this.logLevel ?? loadConfig().logLevel,
    };

    const worker = new Worker(this.getWorkerPath(), {
      workerData: initData,
    });
    this.worker = worker;

    worker.on("message", (response: ParserWorkerResponse) => {
      this.handleResponse(response);
    });
    worker.on("error", (error: Error) => {
      this.failAll(new WorkerError(error.message));
    });
    worker.on("exit", (code: number) => {
      this.worker = null;
      this.isInitialized = false;
      if (code !== 0) {
        this.failAll(new WorkerError(`Worker exited with code ${code}`));
      }
    });

    try {
      const response = await this.request(this.createLoadMessage());
      if (response.type !== "loaded") {
        throw new WorkerError(`Unexpected response to load: ${response.type}`);
      }
    } catch (error) {
      await this.shutdown();
      throw error;
    }
    this.isInitialized = true;
  }

  /**
   * Parses `text` on the worker thread.
   *
   * @throws {WorkerError} When the worker is not running or annotation fails
   */
  async parse(text: string): Promise<Sentence[]> {
    if (!this.isInitialized) {
      throw new WorkerError("Parser worker is not initialized");
    }

    const response = await this.request({
      type: "parse",
      id: this.generateRequestId(),
      text,
    });
    if (response.type !== "parsed") {
      throw new WorkerError(`Unexpected response to parse: ${response.type}`);
    }
    return response.sentences.map((record, index) =>
      Sentence.fromRecord(record, index)
    );
  }

  /**
   * Disposes the model on the worker and stops the thread.
   */
  async shutdown(): Promise<void> {
    const worker = this.worker;
    if (!worker) {
      return;
    }

    try {
      await this.request({ type: "shutdown", id: this.generateRequestId() });
    } finally {
      this.isInitialized = false;
      this.worker = null;
      await worker.terminate();
    }
  }

  protected getWorkerPath(): string {
    const thisDir = dirname(fileURLToPath(import.meta.url));
    // Use .js extension as TypeScript compiles to JS
    return join(thisDir, "parser.worker.js");
  }

  private createLoadMessage(): {
    message: ParserWorkerMessage;
    transferList: TransferListItem[];
  } {
    const id = this.generateRequestId();
    if ("path" in this.source) {
      return { message: { type: "load", id, path: this.source.path }, transferList: [] };
    }

    const { bytes, transfer = true } = this.source;
    const buffer = bytes.buffer;
    const ownsWholeBuffer =
      buffer instanceof ArrayBuffer &&
      bytes.byteOffset === 0 &&
      bytes.byteLength === buffer.byteLength;

    if (transfer && ownsWholeBuffer) {
      return { message: { type: "load", id, bytes }, transferList: [buffer] };
    }
    // A view into a larger buffer is copied so the rest of it stays with the caller
    const copied = new ArrayBuffer(bytes.byteLength);
    const copy = new Uint8Array(copied);
    copy.set(bytes);
    return { message: { type: "load", id, bytes: copy }, transferList: [copied] };
  }

  private request(
    input:
      | ParserWorkerMessage
      | { message: ParserWorkerMessage; transferList: TransferListItem[] }
  ): Promise<ParserWorkerResponse> {
    const worker = this.worker;
    if (!worker) {
      return Promise.reject(new WorkerError("Parser worker is not running"));
    }

    const { message, transferList } =
      "message" in input ? input : { message: input, transferList: [] };

    return new Promise((resolve, reject) => {
      this.pending.set(message.id, { resolve, reject });
      worker.postMessage(message, transferList);
    });
  }

  private handleResponse(response: ParserWorkerResponse): void {
    const request = this.pending.get(response.id);
    if (!request) {
      return;
    }
    this.pending.delete(response.id);

    if (response.type === "error") {
      request.reject(
        new WorkerError(
          response.code ? `${response.error} (${response.code})` : response.error
        )
      );
      return;
    }
    request.resolve(response);
  }

  private failAll(error: Error): void {
    for (const request of this.pending.values()) {
      request.reject(error);
    }
    this.pending.clear();
  }

  private generateRequestId(): string {
    return `parse-${++this.requestIdCounter}`;
  }
}

export function createParserWorker(
  options: Readonly<ParserWorkerOptions>
): ParserWorker {
  return new ParserWorker(options);
}
