/**
 * Binding to the compiled `udpipe_wrapper` shared library through koffi.
 *
 * The library flattens sentences on its side; this module only declares the
 * C entry points, wraps each opaque pointer in a handle object and copies
 * strings out before the owning native object is freed.
 */
import koffi from "koffi";

import type {
  NativeBinding,
  NativeModel,
  NativeMultiwordToken,
  NativeParser,
  NativeSentence,
  NativeWord,
} from "../../interfaces/INativeBinding.js";
import {
  BindingUnavailableError,
  UdpipeErrorCode,
  type UdpipeErrorCodeType,
} from "../../errors/UdpipeError.js";
import { loadConfig } from "../../config/config.js";
import { clearError, recordError } from "../ErrorChannel.js";

type KoffiLib = ReturnType<typeof koffi.load>;
type NativeFunction = (...args: unknown[]) => unknown;

/**
 * The wrapper's C entry points, as bound by `lib.func`.
 */
export interface WrapperSymbols {
  readonly modelLoad: NativeFunction;
  readonly modelLoadFromMemory: NativeFunction;
  readonly modelFree: NativeFunction;
  readonly parserNew: NativeFunction;
  readonly parserNext: NativeFunction;
  readonly parserHasError: NativeFunction;
  readonly parserFree: NativeFunction;
  readonly sentenceFree: NativeFunction;
  readonly sentenceWordCount: NativeFunction;
  readonly sentenceGetWord: NativeFunction;
  readonly sentenceMultiwordTokenCount: NativeFunction;
  readonly sentenceGetMultiwordToken: NativeFunction;
  readonly sentenceCommentCount: NativeFunction;
  readonly sentenceGetComment: NativeFunction;
}

let typesDeclared = false;

function declareTypes(): void {
  if (typesDeclared) {
    return;
  }
  koffi.opaque("UdpipeModel");
  koffi.opaque("UdpipeParser");
  koffi.opaque("UdpipeSentence");
  koffi.struct("UdpipeWord", {
    form: "const char *",
    lemma: "const char *",
    upostag: "const char *",
    xpostag: "const char *",
    feats: "const char *",
    deprel: "const char *",
    deps: "const char *",
    misc: "const char *",
    children: "const int32_t *",
    id: "int32_t",
    head: "int32_t",
    children_count: "int32_t",
  });
  koffi.struct("UdpipeMultiwordToken", {
    form: "const char *",
    misc: "const char *",
    id_first: "int32_t",
    id_last: "int32_t",
  });
  typesDeclared = true;
}

function bindSymbols(lib: KoffiLib): WrapperSymbols {
  return {
    modelLoad: lib.func(
      "UdpipeModel *udpipe_model_load(const char *model_path, _Out_ const char **out_error)"
    ),
    modelLoadFromMemory: lib.func(
      "UdpipeModel *udpipe_model_load_from_memory(const uint8_t *data, size_t len, _Out_ const char **out_error)"
    ),
    modelFree: lib.func("void udpipe_model_free(UdpipeModel *model)"),
    parserNew: lib.func(
      "UdpipeParser *udpipe_parser_new(UdpipeModel *model, const char *text, size_t text_len, _Out_ const char **out_error)"
    ),
    parserNext: lib.func(
      "UdpipeSentence *udpipe_parser_next(UdpipeParser *parser, _Out_ const char **out_error)"
    ),
    parserHasError: lib.func("bool udpipe_parser_has_error(UdpipeParser *parser)"),
    parserFree: lib.func("void udpipe_parser_free(UdpipeParser *parser)"),
    sentenceFree: lib.func("void udpipe_sentence_free(UdpipeSentence *sentence)"),
    sentenceWordCount: lib.func(
      "int32_t udpipe_sentence_word_count(UdpipeSentence *sentence)"
    ),
    sentenceGetWord: lib.func(
      "UdpipeWord udpipe_sentence_get_word(UdpipeSentence *sentence, int32_t index)"
    ),
    sentenceMultiwordTokenCount: lib.func(
      "int32_t udpipe_sentence_multiword_token_count(UdpipeSentence *sentence)"
    ),
    sentenceGetMultiwordToken: lib.func(
      "UdpipeMultiwordToken udpipe_sentence_get_multiword_token(UdpipeSentence *sentence, int32_t index)"
    ),
    sentenceCommentCount: lib.func(
      "int32_t udpipe_sentence_comment_count(UdpipeSentence *sentence)"
    ),
    sentenceGetComment: lib.func(
      "const char *udpipe_sentence_get_comment(UdpipeSentence *sentence, int32_t index)"
    ),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function readString(record: Record<string, unknown>, key: string): string {
  const value = record[key];
  return typeof value === "string" ? value : "";
}

function readInt(record: Record<string, unknown>, key: string): number {
  const value = record[key];
  return typeof value === "number" ? value : 0;
}

function readCount(value: unknown): number {
  return typeof value === "number" && value > 0 ? value : 0;
}

/**
 * Records the out-parameter message, or `fallback` when the library left it
 * empty.
 */
function recordOutError(
  code: UdpipeErrorCodeType,
  out: unknown[],
  fallback: string
): void {
  const message = out[0];
  recordError(
    code,
    typeof message === "string" && message.length > 0 ? message : fallback
  );
}

class KoffiSentence implements NativeSentence {
  private ptr: unknown;

  constructor(
    private readonly symbols: WrapperSymbols,
    ptr: unknown
  ) {
    this.ptr = ptr;
  }

  wordCount(): number {
    return this.ptr === null ? 0 : readCount(this.symbols.sentenceWordCount(this.ptr));
  }

  getWord(index: number): NativeWord | null {
    if (this.ptr === null) {
      return null;
    }
    const raw: unknown = this.symbols.sentenceGetWord(this.ptr, index);
    if (!isRecord(raw)) {
      return null;
    }

    const childrenCount = readCount(raw["children_count"]);
    const childrenPtr = raw["children"];
    const decoded: unknown =
      childrenCount > 0 && childrenPtr !== null
        ? koffi.decode(childrenPtr, "int32_t", childrenCount)
        : [];
    const children = Array.isArray(decoded)
      ? decoded.filter((id): id is number => typeof id === "number")
      : [];

    return {
      form: readString(raw, "form"),
      lemma: readString(raw, "lemma"),
      upostag: readString(raw, "upostag"),
      xpostag: readString(raw, "xpostag"),
      feats: readString(raw, "feats"),
      deprel: readString(raw, "deprel"),
      deps: readString(raw, "deps"),
      misc: readString(raw, "misc"),
      id: readInt(raw, "id"),
      head: readInt(raw, "head"),
      children,
    };
  }

  multiwordTokenCount(): number {
    return this.ptr === null
      ? 0
      : readCount(this.symbols.sentenceMultiwordTokenCount(this.ptr));
  }

  getMultiwordToken(index: number): NativeMultiwordToken | null {
    if (this.ptr === null) {
      return null;
    }
    const raw: unknown = this.symbols.sentenceGetMultiwordToken(this.ptr, index);
    if (!isRecord(raw)) {
      return null;
    }
    return {
      form: readString(raw, "form"),
      misc: readString(raw, "misc"),
      idFirst: readInt(raw, "id_first"),
      idLast: readInt(raw, "id_last"),
    };
  }

  commentCount(): number {
    return this.ptr === null
      ? 0
      : readCount(this.symbols.sentenceCommentCount(this.ptr));
  }

  getComment(index: number): string | null {
    if (this.ptr === null) {
      return null;
    }
    const raw: unknown = this.symbols.sentenceGetComment(this.ptr, index);
    return typeof raw === "string" ? raw : null;
  }

  free(): void {
    const ptr = this.ptr;
    this.ptr = null;
    if (ptr !== null) {
      this.symbols.sentenceFree(ptr);
    }
  }
}

class KoffiParser implements NativeParser {
  private ptr: unknown;

  constructor(
    private readonly symbols: WrapperSymbols,
    ptr: unknown
  ) {
    this.ptr = ptr;
  }

  next(): NativeSentence | null {
    if (this.ptr === null) {
      clearError();
      return null;
    }

    const out: unknown[] = [null];
    const sentence: unknown = this.symbols.parserNext(this.ptr, out);
    if (sentence === null || sentence === undefined) {
      if (this.hasError()) {
        // The library does not say which annotation step failed
        recordOutError(
          UdpipeErrorCode.ANNOTATION_FAILED,
          out,
          "Failed to annotate sentence"
        );
      } else {
        clearError();
      }
      return null;
    }

    clearError();
    return new KoffiSentence(this.symbols, sentence);
  }

  hasError(): boolean {
    return this.ptr !== null && this.symbols.parserHasError(this.ptr) === true;
  }

  free(): void {
    const ptr = this.ptr;
    this.ptr = null;
    if (ptr !== null) {
      this.symbols.parserFree(ptr);
    }
  }
}

class KoffiModel implements NativeModel {
  private ptr: unknown;

  constructor(
    private readonly symbols: WrapperSymbols,
    ptr: unknown
  ) {
    this.ptr = ptr;
  }

  newParser(text: string): NativeParser | null {
    if (this.ptr === null) {
      recordError(
        UdpipeErrorCode.INVALID_ARGUMENT,
        "Invalid arguments to parser: model and text are required"
      );
      return null;
    }

    const out: unknown[] = [null];
    const parser: unknown = this.symbols.parserNew(
      this.ptr,
      text,
      Buffer.byteLength(text, "utf8"),
      out
    );
    if (parser === null || parser === undefined) {
      recordOutError(
        UdpipeErrorCode.SESSION_INIT_FAILED,
        out,
        "Failed to create tokenizer"
      );
      return null;
    }

    clearError();
    return new KoffiParser(this.symbols, parser);
  }

  free(): void {
    const ptr = this.ptr;
    this.ptr = null;
    if (ptr !== null) {
      this.symbols.modelFree(ptr);
    }
  }
}

export class KoffiBinding implements NativeBinding {
  readonly name = "koffi";

  constructor(private readonly symbols: WrapperSymbols) {}

  loadModel(path: string): NativeModel | null {
    const out: unknown[] = [null];
    const model: unknown = this.symbols.modelLoad(path, out);
    if (model === null || model === undefined) {
      recordOutError(
        UdpipeErrorCode.LOAD_FAILED,
        out,
        `Failed to load model from: ${path}`
      );
      return null;
    }
    clearError();
    return new KoffiModel(this.symbols, model);
  }

  loadModelFromMemory(bytes: Uint8Array): NativeModel | null {
    const out: unknown[] = [null];
    // Typed arrays are passed by pointer, the library reads them in place
    const model: unknown = this.symbols.modelLoadFromMemory(
      bytes,
      bytes.byteLength,
      out
    );
    if (model === null || model === undefined) {
      recordOutError(
        UdpipeErrorCode.LOAD_FAILED,
        out,
        "Failed to load model from memory"
      );
      return null;
    }
    clearError();
    return new KoffiModel(this.symbols, model);
  }
}

const bindings = new Map<string, KoffiBinding>();

/**
 * Loads the wrapper library once per path and thread.
 *
 * @throws {BindingUnavailableError} When the library cannot be loaded
 */
export function createKoffiBinding(libraryPath: string): KoffiBinding {
  const cached = bindings.get(libraryPath);
  if (cached) {
    return cached;
  }

  let symbols: WrapperSymbols;
  try {
    declareTypes();
    symbols = bindSymbols(koffi.load(libraryPath));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new BindingUnavailableError(message, libraryPath);
  }

  const binding = new KoffiBinding(symbols);
  bindings.set(libraryPath, binding);
  return binding;
}

/**
 * Binding module entry point, used by worker threads and the default binding.
 */
export function createBinding(): NativeBinding {
  const { libraryPath } = loadConfig();
  if (!libraryPath) {
    throw new BindingUnavailableError(
      "UDPIPE_LIBRARY_PATH is not set; point it at the udpipe_wrapper shared library"
    );
  }
  return createKoffiBinding(libraryPath);
}
