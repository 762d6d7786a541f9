/**
 * Flat, owned representation of one annotated sentence.
 *
 * Word fields are parallel arrays indexed by `id - 1`. The children of word
 * `i` are `childrenFlat[childrenOffsets[i] .. childrenOffsets[i] + childrenCounts[i])`.
 * Records contain only strings and numbers, so they survive structured clone
 * and can be posted between threads.
 */
export interface MultiwordToken {
  readonly form: string;
  readonly misc: string;
  /** First word id of the range (inclusive) */
  readonly idFirst: number;
  /** Last word id of the range (inclusive) */
  readonly idLast: number;
}

export interface SentenceRecord {
  readonly forms: readonly string[];
  readonly lemmas: readonly string[];
  readonly upostags: readonly string[];
  readonly xpostags: readonly string[];
  readonly feats: readonly string[];
  readonly deprels: readonly string[];
  readonly deps: readonly string[];
  readonly miscs: readonly string[];
  readonly ids: readonly number[];
  readonly heads: readonly number[];
  readonly childrenFlat: readonly number[];
  readonly childrenOffsets: readonly number[];
  readonly childrenCounts: readonly number[];
  readonly multiwordTokens: readonly MultiwordToken[];
  readonly comments: readonly string[];
}
