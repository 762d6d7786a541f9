/**
 * Boundary implementation over an in-process annotation engine.
 *
 * Model, session and sentence handles follow the same contract as the shared
 * library binding: no throws, `null` plus an error-channel entry on failure.
 */
import type {
  AnnotationEngine,
  EngineModel,
  EngineTokenizer,
} from "../../interfaces/IAnnotationEngine.js";
import type {
  NativeBinding,
  NativeModel,
  NativeMultiwordToken,
  NativeParser,
  NativeSentence,
  NativeWord,
} from "../../interfaces/INativeBinding.js";
import type { SentenceRecord } from "../../interfaces/ISentenceRecord.js";
import { UdpipeErrorCode } from "../../errors/UdpipeError.js";
import { clearError, recordError } from "../ErrorChannel.js";
import { ReadonlyByteView } from "../ReadonlyByteView.js";
import { buildSentenceRecord } from "./SentenceBuilder.js";

export type SessionState = "created" | "active" | "finished" | "errored";

/**
 * Owns one engine model. Freed at most once; later calls see a dead handle.
 */
export class ModelHandle implements NativeModel {
  private model: EngineModel | null;

  constructor(model: EngineModel) {
    this.model = model;
  }

  get isLive(): boolean {
    return this.model !== null;
  }

  newParser(text: string): NativeParser | null {
    const model = this.model;
    if (!model) {
      recordError(
        UdpipeErrorCode.INVALID_ARGUMENT,
        "Invalid arguments to parser: model and text are required"
      );
      return null;
    }
    return ParserSession.open(model, text);
  }

  free(): void {
    const model = this.model;
    this.model = null;
    model?.release();
  }
}

/**
 * Streams sentences out of one text.
 *
 * `created -> active -> finished | errored`. Terminal states absorb: `next`
 * returns null with a cleared error channel, however often it is called.
 */
export class ParserSession implements NativeParser {
  private tokenizer: EngineTokenizer | null;
  private state: SessionState = "created";

  private constructor(
    private readonly model: EngineModel,
    tokenizer: EngineTokenizer
  ) {
    this.tokenizer = tokenizer;
  }

  static open(model: EngineModel | null, text: string | null): ParserSession | null {
    if (model === null || text === null) {
      recordError(
        UdpipeErrorCode.INVALID_ARGUMENT,
        "Invalid arguments to parser: model and text are required"
      );
      return null;
    }

    clearError();

    const tokenizer = model.newTokenizer();
    if (!tokenizer) {
      recordError(
        UdpipeErrorCode.SESSION_INIT_FAILED,
        "Failed to create tokenizer"
      );
      return null;
    }

    // Strings are immutable, but the engine contract still takes its own copy
    tokenizer.setText(text);
    return new ParserSession(model, tokenizer);
  }

  get currentState(): SessionState {
    return this.state;
  }

  get finished(): boolean {
    return this.state === "finished" || this.state === "errored";
  }

  hasError(): boolean {
    return this.state === "errored";
  }

  next(): NativeSentence | null {
    const tokenizer = this.tokenizer;
    if (!tokenizer || this.finished) {
      clearError();
      return null;
    }
    this.state = "active";

    const tokenized = tokenizer.nextSentence();
    if (tokenized.kind === "end") {
      this.state = "finished";
      clearError();
      return null;
    }
    if (tokenized.kind === "error") {
      return this.fail(UdpipeErrorCode.TOKENIZE_FAILED, tokenized.error);
    }

    const sentence = tokenized.sentence;

    const tagged = this.model.tag(sentence);
    if (!tagged.ok) {
      return this.fail(UdpipeErrorCode.TAG_FAILED, tagged.error);
    }

    const parsed = this.model.parse(sentence);
    if (!parsed.ok) {
      return this.fail(UdpipeErrorCode.PARSE_FAILED, parsed.error);
    }

    clearError();
    return new RecordSentence(buildSentenceRecord(sentence));
  }

  free(): void {
    const tokenizer = this.tokenizer;
    this.tokenizer = null;
    if (!this.finished) {
      this.state = "finished";
    }
    tokenizer?.release();
  }

  private fail(
    code:
      | typeof UdpipeErrorCode.TOKENIZE_FAILED
      | typeof UdpipeErrorCode.TAG_FAILED
      | typeof UdpipeErrorCode.PARSE_FAILED,
    message: string
  ): null {
    this.state = "errored";
    recordError(code, message);
    return null;
  }
}

/**
 * Sentence handle over a flattened record. Accessors return nothing once freed.
 */
export class RecordSentence implements NativeSentence {
  private record: SentenceRecord | null;

  constructor(record: SentenceRecord) {
    this.record = record;
  }

  wordCount(): number {
    return this.record?.forms.length ?? 0;
  }

  getWord(index: number): NativeWord | null {
    const record = this.record;
    if (!record || !isIndexIn(index, record.forms.length)) {
      return null;
    }

    const offset = record.childrenOffsets[index] ?? 0;
    const count = record.childrenCounts[index] ?? 0;

    return {
      form: record.forms[index] ?? "",
      lemma: record.lemmas[index] ?? "",
      upostag: record.upostags[index] ?? "",
      xpostag: record.xpostags[index] ?? "",
      feats: record.feats[index] ?? "",
      deprel: record.deprels[index] ?? "",
      deps: record.deps[index] ?? "",
      misc: record.miscs[index] ?? "",
      id: record.ids[index] ?? 0,
      head: record.heads[index] ?? 0,
      children: record.childrenFlat.slice(offset, offset + count),
    };
  }

  multiwordTokenCount(): number {
    return this.record?.multiwordTokens.length ?? 0;
  }

  getMultiwordToken(index: number): NativeMultiwordToken | null {
    return this.record?.multiwordTokens[index] ?? null;
  }

  commentCount(): number {
    return this.record?.comments.length ?? 0;
  }

  getComment(index: number): string | null {
    return this.record?.comments[index] ?? null;
  }

  free(): void {
    this.record = null;
  }
}

function isIndexIn(index: number, length: number): boolean {
  return Number.isInteger(index) && index >= 0 && index < length;
}

/**
 * Binding that drives an in-process engine through the handle protocol.
 */
export class EngineBinding implements NativeBinding {
  readonly name: string;

  constructor(
    private readonly engine: AnnotationEngine,
    name = "engine"
  ) {
    this.name = name;
  }

  loadModel(path: string): NativeModel | null {
    clearError();

    const model = this.engine.loadModel(path);
    if (!model) {
      recordError(
        UdpipeErrorCode.LOAD_FAILED,
        `Failed to load model from: ${path}`
      );
      return null;
    }
    return new ModelHandle(model);
  }

  loadModelFromMemory(bytes: Uint8Array): NativeModel | null {
    clearError();

    const view = new ReadonlyByteView(bytes);
    let model: EngineModel | null;
    try {
      model = this.engine.loadModelFromSource(view);
    } finally {
      view.detach();
    }

    if (!model) {
      recordError(
        UdpipeErrorCode.LOAD_FAILED,
        "Failed to load model from memory"
      );
      return null;
    }
    return new ModelHandle(model);
  }
}

export function createEngineBinding(
  engine: AnnotationEngine,
  name?: string
): EngineBinding {
  return new EngineBinding(engine, name);
}
