/**
 * Contract of the external annotation engine.
 *
 * The engine owns tokenization, tagging and parsing. This layer only drives it
 * and copies results out of its annotation tree. Every sentence tree carries a
 * virtual root at `words[0]` (id 0) that never reaches callers.
 */

export interface EngineWord {
  readonly id: number;
  form: string;
  lemma: string;
  upostag: string;
  xpostag: string;
  feats: string;
  head: number;
  deprel: string;
  deps: string;
  misc: string;
  /** Ids of dependents, filled in by `parse` */
  children: number[];
}

export interface EngineMultiwordToken {
  readonly form: string;
  readonly misc: string;
  readonly idFirst: number;
  readonly idLast: number;
}

export interface EngineSentence {
  readonly words: EngineWord[];
  readonly multiwordTokens: EngineMultiwordToken[];
  readonly comments: string[];
}

/**
 * Outcome of a tag or parse step. Engines report failure by message, never by
 * throwing.
 */
export type EngineOutcome =
  | { readonly ok: true }
  | { readonly ok: false; readonly error: string };

export type TokenizeResult =
  | { readonly kind: "sentence"; readonly sentence: EngineSentence }
  | { readonly kind: "end" }
  | { readonly kind: "error"; readonly error: string };

export interface EngineTokenizer {
  /**
   * Binds the tokenizer to a text. The tokenizer keeps its own copy.
   */
  setText(text: string): void;
  nextSentence(): TokenizeResult;
  release(): void;
}

export interface EngineModel {
  /** Returns null when the model carries no tokenizer */
  newTokenizer(): EngineTokenizer | null;
  tag(sentence: EngineSentence): EngineOutcome;
  parse(sentence: EngineSentence): EngineOutcome;
  release(): void;
}

/**
 * Read-only access to a byte region the engine loads a model from.
 */
export interface ModelByteSource {
  readonly byteLength: number;
  byteAt(offset: number): number;
  /** A view over `[start, end)`; valid only during the load call */
  subarray(start: number, end?: number): Uint8Array;
}

export interface AnnotationEngine {
  /** Returns null when the file is missing or malformed */
  loadModel(path: string): EngineModel | null;
  /** Returns null when the bytes do not form a valid model */
  loadModelFromSource(source: ModelByteSource): EngineModel | null;
}
