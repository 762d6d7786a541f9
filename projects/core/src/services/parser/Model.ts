import type {
  NativeBinding,
  NativeModel,
} from "../../interfaces/INativeBinding.js";
import {
  InvalidArgumentError,
  ResourceReleasedError,
  UdpipeErrorCode,
} from "../../errors/UdpipeError.js";
import type { Logger } from "../../logging/Logger.js";
import { errorFromChannel } from "./channelErrors.js";
import { getDefaultBinding, getDefaultLogger } from "./defaults.js";
import { Parser, type NativeParserLease } from "./Parser.js";
import type { Sentence } from "./Sentence.js";
import type { Word } from "./Word.js";

export interface ModelOptions {
  /** Boundary to load through. Defaults to the shared library binding */
  readonly binding?: NativeBinding;
  readonly logger?: Logger;
}

interface ModelResources {
  readonly native: NativeModel;
  /** Native parsers still open on this model */
  readonly parsers: Set<NativeParserLease>;
  readonly logger: Logger;
  readonly source: string;
}

/**
 * Frees models that are garbage collected without `dispose()`. Open parsers
 * go first because they borrow the model.
 */
const modelFinalizer = new FinalizationRegistry<ModelResources>((held) => {
  held.logger.warn("Model was garbage collected without dispose()", {
    source: held.source,
  });
  releaseResources(held);
});

function releaseResources(resources: ModelResources): void {
  for (const lease of resources.parsers) {
    if (!lease.released) {
      lease.released = true;
      lease.native.free();
    }
  }
  resources.parsers.clear();
  resources.native.free();
}

/**
 * A loaded annotation model.
 *
 * Sole owner of its native model. `dispose()` frees it exactly once, after
 * freeing every parser still open on it. Not safe to drive from two threads
 * at once; move it to a worker with `ParserWorker` instead.
 *
 * @example
 * ```typescript
 * const model = Model.load("english-ewt-ud-2.5-191206.udpipe");
 * try {
 *   for (const sentence of model.parser("Hello world. Goodbye world.")) {
 *     console.log(sentence.words.map((w) => `${w.form}/${w.upostag}`));
 *   }
 * } finally {
 *   model.dispose();
 * }
 * ```
 */
export class Model {
  private resources: ModelResources | null;
  private readonly logger: Logger;

  private constructor(resources: ModelResources) {
    this.resources = resources;
    this.logger = resources.logger;
    modelFinalizer.register(this, resources, this);
  }

  /**
   * Loads a model file.
   *
   * @throws {InvalidArgumentError} When the path is empty or contains a NUL byte
   * @throws {LoadFailedError} When the file is missing, unreadable or malformed
   */
  static load(path: string, options?: Readonly<ModelOptions>): Model {
    if (typeof path !== "string" || path.length === 0) {
      throw new InvalidArgumentError("Model path must be a non-empty string", "path");
    }
    if (path.includes("\0")) {
      throw new InvalidArgumentError("Invalid path (contains null byte)", "path");
    }

    const binding = options?.binding ?? getDefaultBinding();
    const logger = options?.logger ?? getDefaultLogger();

    const native = binding.loadModel(path);
    if (!native) {
      throw errorFromChannel(
        UdpipeErrorCode.LOAD_FAILED,
        `Failed to load model from: ${path}`,
        { source: path }
      );
    }

    logger.debug("Model loaded", { source: path, binding: binding.name });
    return new Model({ native, parsers: new Set(), logger, source: path });
  }

  /**
   * Loads a model from memory. The bytes are read in place during the call
   * and not retained afterwards.
   *
   * @throws {InvalidArgumentError} When the buffer is empty
   * @throws {LoadFailedError} When the bytes are not a valid model
   */
  static loadFromBytes(
    bytes: Uint8Array,
    options?: Readonly<ModelOptions>
  ): Model {
    if (!(bytes instanceof Uint8Array) || bytes.byteLength === 0) {
      throw new InvalidArgumentError("Model bytes must be a non-empty Uint8Array", "bytes");
    }

    const binding = options?.binding ?? getDefaultBinding();
    const logger = options?.logger ?? getDefaultLogger();

    const native = binding.loadModelFromMemory(bytes);
    if (!native) {
      throw errorFromChannel(
        UdpipeErrorCode.LOAD_FAILED,
        "Failed to load model from memory",
        { source: "memory" }
      );
    }

    logger.debug("Model loaded", {
      source: "memory",
      byteLength: bytes.byteLength,
      binding: binding.name,
    });
    return new Model({ native, parsers: new Set(), logger, source: "memory" });
  }

  get isReleased(): boolean {
    return this.resources === null;
  }

  /** Path the model was loaded from, or `memory` */
  get source(): string {
    return this.resources?.source ?? "released";
  }

  /** Number of parsers currently open on this model */
  get openParserCount(): number {
    return this.resources?.parsers.size ?? 0;
  }

  /**
   * Opens a lazy sentence stream over `text`. The text is copied, so the
   * caller's string may be dropped right away.
   *
   * @throws {ResourceReleasedError} When the model has been disposed
   * @throws {InvalidArgumentError} When text is not a string or contains a NUL byte
   * @throws {SessionInitFailedError} When the model has no usable tokenizer
   */
  parser(text: string): Parser {
    const resources = this.requireResources();
    if (typeof text !== "string") {
      throw new InvalidArgumentError("Text must be a string", "text");
    }
    if (text.includes("\0")) {
      throw new InvalidArgumentError("Invalid text (contains null byte)", "text");
    }

    const native = resources.native.newParser(text);
    if (!native) {
      throw errorFromChannel(
        UdpipeErrorCode.SESSION_INIT_FAILED,
        "Failed to create tokenizer"
      );
    }

    const lease: NativeParserLease = { native, released: false };
    const parsers = resources.parsers;
    parsers.add(lease);

    return new Parser({
      model: this,
      lease,
      logger: this.logger,
      onRelease: (released) => {
        parsers.delete(released);
      },
    });
  }

  /**
   * Parses the whole text eagerly.
   *
   * @throws {AnnotationFailedError} When a sentence cannot be annotated
   */
  parseSentences(text: string): Sentence[] {
    return this.parser(text).collect();
  }

  /**
   * Parses the whole text and returns every word of every sentence, each
   * tagged with the 0-based `sentenceId` it came from.
   *
   * @throws {AnnotationFailedError} When a sentence cannot be annotated
   */
  parse(text: string): Word[] {
    return this.parseSentences(text).flatMap((sentence) => [...sentence.words]);
  }

  /**
   * Frees open parsers, then the native model. Later calls are no-ops.
   */
  dispose(): void {
    const resources = this.resources;
    if (!resources) {
      return;
    }
    this.resources = null;
    modelFinalizer.unregister(this);

    const openParsers = resources.parsers.size;
    releaseResources(resources);
    this.logger.debug("Model released", {
      source: resources.source,
      closedParsers: openParsers,
    });
  }

  private requireResources(): ModelResources {
    if (!this.resources) {
      throw new ResourceReleasedError("Model");
    }
    return this.resources;
  }
}
