/**
 * Handle-based boundary to a native annotation library.
 *
 * No operation throws. A failing call returns `null` and records a message in
 * the calling thread's error channel (see `native/ErrorChannel.ts`); a
 * successful call clears it.
 */

export interface NativeWord {
  readonly form: string;
  readonly lemma: string;
  readonly upostag: string;
  readonly xpostag: string;
  readonly feats: string;
  readonly deprel: string;
  readonly deps: string;
  readonly misc: string;
  readonly id: number;
  readonly head: number;
  readonly children: readonly number[];
}

export interface NativeMultiwordToken {
  readonly form: string;
  readonly misc: string;
  readonly idFirst: number;
  readonly idLast: number;
}

/**
 * A sentence owned by the caller until `free()`. Values read from it must be
 * copied before it is freed.
 */
export interface NativeSentence {
  wordCount(): number;
  getWord(index: number): NativeWord | null;
  multiwordTokenCount(): number;
  getMultiwordToken(index: number): NativeMultiwordToken | null;
  commentCount(): number;
  getComment(index: number): string | null;
  free(): void;
}

export interface NativeParser {
  /**
   * Null with a cleared channel at end of text, null with an error on failure.
   */
  next(): NativeSentence | null;
  hasError(): boolean;
  free(): void;
}

export interface NativeModel {
  /** The parser borrows this model and must be freed before it */
  newParser(text: string): NativeParser | null;
  free(): void;
}

export interface NativeBinding {
  readonly name: string;
  loadModel(path: string): NativeModel | null;
  loadModelFromMemory(bytes: Uint8Array): NativeModel | null;
}

/**
 * Shape of a module a worker thread can import to build its own binding.
 */
export interface NativeBindingModule {
  createBinding(): NativeBinding;
}
