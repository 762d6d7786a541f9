import type { NativeParser } from "../../interfaces/INativeBinding.js";
import {
  UdpipeErrorCode,
  type UdpipeError,
} from "../../errors/UdpipeError.js";
import type { Logger } from "../../logging/Logger.js";
import { clearError } from "../../native/ErrorChannel.js";
import { errorFromChannel } from "./channelErrors.js";
import type { Model } from "./Model.js";
import { Sentence } from "./Sentence.js";

export type ParserState = "created" | "active" | "finished" | "errored";

/**
 * A native parser shared by its Parser and the Model that opened it. Whichever
 * frees it first sets `released`.
 */
export interface NativeParserLease {
  readonly native: NativeParser;
  released: boolean;
}

export interface ParserInit {
  readonly model: Model;
  readonly lease: NativeParserLease;
  readonly logger: Logger;
  /** Called once when the Parser lets go of its lease */
  readonly onRelease: (lease: NativeParserLease) => void;
}

export interface LeakedParser {
  readonly lease: NativeParserLease;
  readonly logger: Logger;
  readonly onRelease: (lease: NativeParserLease) => void;
}

/**
 * Cleanup for a Parser collected without `dispose()`. Leases the model
 * already freed are left alone.
 */
export function releaseLeakedParser(held: LeakedParser): void {
  if (held.lease.released) {
    return;
  }
  held.logger.warn("Parser was garbage collected without dispose()");
  held.lease.released = true;
  held.lease.native.free();
  held.onRelease(held.lease);
}

const parserFinalizer = new FinalizationRegistry<LeakedParser>(
  releaseLeakedParser
);

/**
 * Lazy stream of sentences over one text.
 *
 * Each pull tokenizes, tags and parses exactly one sentence. Two ways to pull:
 *
 * - `nextSentence()` returns null both at end of text and on failure; tell
 *   them apart with `hasError` / `error`.
 * - The iterator protocol (`next()`, `for..of`) throws the failure once and
 *   then reports done. Leaving a `for..of` early disposes the parser.
 *
 * Created by `Model.parser()` only. Holds its model, and disposing the model
 * disposes the parser first.
 */
export class Parser implements IterableIterator<Sentence> {
  private lease: NativeParserLease | null;
  private state: ParserState = "created";
  private produced = 0;
  private failure: UdpipeError | null = null;
  private readonly model: Model;
  private readonly logger: Logger;
  private readonly onRelease: (lease: NativeParserLease) => void;

  constructor(init: ParserInit) {
    this.model = init.model;
    this.lease = init.lease;
    this.logger = init.logger;
    this.onRelease = init.onRelease;
    parserFinalizer.register(
      this,
      { lease: init.lease, logger: init.logger, onRelease: init.onRelease },
      this
    );
  }

  get currentState(): ParserState {
    return this.state;
  }

  get isFinished(): boolean {
    return this.state === "finished" || this.state === "errored";
  }

  get hasError(): boolean {
    return this.state === "errored";
  }

  /** The failure that ended this parser, if any */
  get error(): UdpipeError | null {
    return this.failure;
  }

  /** Number of sentences produced so far */
  get sentenceCount(): number {
    return this.produced;
  }

  /**
   * Pulls the next sentence, or null at end of text or after a failure.
   */
  nextSentence(): Sentence | null {
    const lease = this.lease;
    if (!lease || lease.released || this.isFinished || this.model.isReleased) {
      this.finishIfOpen();
      this.release();
      clearError();
      return null;
    }
    this.state = "active";

    const native = lease.native;
    const nativeSentence = native.next();
    if (!nativeSentence) {
      if (native.hasError()) {
        this.state = "errored";
        this.failure = errorFromChannel(
          UdpipeErrorCode.ANNOTATION_FAILED,
          "Failed to annotate sentence",
          { sentenceIndex: this.produced }
        );
        this.logger.warn("Parser stopped on annotation failure", {
          sentenceIndex: this.produced,
          error: this.failure.message,
        });
      } else {
        this.state = "finished";
        this.logger.debug("Parser reached end of text", {
          sentences: this.produced,
        });
      }
      this.release();
      return null;
    }

    try {
      return Sentence.fromNative(nativeSentence, this.produced++);
    } finally {
      nativeSentence.free();
    }
  }

  next(): IteratorResult<Sentence> {
    const wasFinished = this.isFinished;
    const sentence = this.nextSentence();
    if (sentence) {
      return { done: false, value: sentence };
    }
    if (!wasFinished && this.failure) {
      throw this.failure;
    }
    return { done: true, value: undefined };
  }

  return(): IteratorResult<Sentence> {
    this.dispose();
    return { done: true, value: undefined };
  }

  [Symbol.iterator](): IterableIterator<Sentence> {
    return this;
  }

  /**
   * Collects the remaining sentences and disposes the parser.
   *
   * @throws {AnnotationFailedError} When a sentence cannot be annotated
   */
  collect(): Sentence[] {
    try {
      return Array.from(this);
    } finally {
      this.dispose();
    }
  }

  /**
   * Frees the native session. Safe to call more than once; does not affect
   * the model.
   */
  dispose(): void {
    this.finishIfOpen();
    this.release();
  }

  private finishIfOpen(): void {
    if (!this.isFinished) {
      this.state = "finished";
    }
  }

  private release(): void {
    const lease = this.lease;
    if (!lease) {
      return;
    }
    this.lease = null;
    parserFinalizer.unregister(this);
    if (!lease.released) {
      lease.released = true;
      lease.native.free();
    }
    this.onRelease(lease);
  }
}
