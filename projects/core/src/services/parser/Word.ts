import type { SentenceRecord } from "../../interfaces/ISentenceRecord.js";

/**
 * One annotated word, read through its sentence's flat storage.
 */
export class Word {
  constructor(
    private readonly record: SentenceRecord,
    private readonly index: number,
    /** 0-based index of the sentence within its parse stream */
    readonly sentenceId: number
  ) {}

  /** Surface form */
  get form(): string {
    return this.record.forms[this.index] ?? "";
  }

  get lemma(): string {
    return this.record.lemmas[this.index] ?? "";
  }

  /** Universal POS tag (NOUN, VERB, ADJ, ...) */
  get upostag(): string {
    return this.record.upostags[this.index] ?? "";
  }

  /** Language-specific POS tag */
  get xpostag(): string {
    return this.record.xpostags[this.index] ?? "";
  }

  /** Morphological features, e.g. `Mood=Ind|Tense=Pres` */
  get feats(): string {
    return this.record.feats[this.index] ?? "";
  }

  get deprel(): string {
    return this.record.deprels[this.index] ?? "";
  }

  /** Enhanced dependencies */
  get deps(): string {
    return this.record.deps[this.index] ?? "";
  }

  get misc(): string {
    return this.record.miscs[this.index] ?? "";
  }

  /** 1-based position within the sentence */
  get id(): number {
    return this.record.ids[this.index] ?? 0;
  }

  /** Id of the governing word, 0 for the sentence root */
  get head(): number {
    return this.record.heads[this.index] ?? 0;
  }

  get children(): readonly number[] {
    const offset = this.record.childrenOffsets[this.index] ?? 0;
    const count = this.record.childrenCounts[this.index] ?? 0;
    return this.record.childrenFlat.slice(offset, offset + count);
  }

  hasFeature(key: string, value: string): boolean {
    return this.getFeature(key) === value;
  }

  getFeature(key: string): string | undefined {
    for (const feature of this.feats.split("|")) {
      const separator = feature.indexOf("=");
      if (separator !== -1 && feature.slice(0, separator) === key) {
        return feature.slice(separator + 1);
      }
    }
    return undefined;
  }

  isVerb(): boolean {
    return this.upostag === "VERB" || this.upostag === "AUX";
  }

  isNoun(): boolean {
    return this.upostag === "NOUN" || this.upostag === "PROPN";
  }

  isAdjective(): boolean {
    return this.upostag === "ADJ";
  }

  isPunct(): boolean {
    return this.upostag === "PUNCT";
  }

  isRoot(): boolean {
    return this.deprel === "root";
  }

  /**
   * `SpaceAfter=No` is only present when no space follows, so absence means
   * there is one.
   */
  hasSpaceAfter(): boolean {
    return !this.misc.split("|").includes("SpaceAfter=No");
  }

  toJSON(): Record<string, unknown> {
    return {
      id: this.id,
      form: this.form,
      lemma: this.lemma,
      upostag: this.upostag,
      xpostag: this.xpostag,
      feats: this.feats,
      head: this.head,
      deprel: this.deprel,
      deps: this.deps,
      misc: this.misc,
      children: this.children,
      sentenceId: this.sentenceId,
    };
  }
}
