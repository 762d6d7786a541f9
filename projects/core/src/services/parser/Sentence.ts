import type { NativeSentence } from "../../interfaces/INativeBinding.js";
import type {
  MultiwordToken,
  SentenceRecord,
} from "../../interfaces/ISentenceRecord.js";
import { Word } from "./Word.js";

/**
 * Copies everything out of a native sentence into a frozen record.
 *
 * Strings read from the native side are only valid until the sentence is
 * freed, so the caller frees it right after this returns.
 */
export function readSentenceRecord(native: NativeSentence): SentenceRecord {
  const forms: string[] = [];
  const lemmas: string[] = [];
  const upostags: string[] = [];
  const xpostags: string[] = [];
  const feats: string[] = [];
  const deprels: string[] = [];
  const deps: string[] = [];
  const miscs: string[] = [];
  const ids: number[] = [];
  const heads: number[] = [];
  const childrenFlat: number[] = [];
  const childrenOffsets: number[] = [];
  const childrenCounts: number[] = [];

  const wordCount = native.wordCount();
  for (let i = 0; i < wordCount; i++) {
    const word = native.getWord(i);
    if (!word) {
      break;
    }
    forms.push(word.form);
    lemmas.push(word.lemma);
    upostags.push(word.upostag);
    xpostags.push(word.xpostag);
    feats.push(word.feats);
    deprels.push(word.deprel);
    deps.push(word.deps);
    miscs.push(word.misc);
    ids.push(word.id);
    heads.push(word.head);
    childrenOffsets.push(childrenFlat.length);
    childrenCounts.push(word.children.length);
    childrenFlat.push(...word.children);
  }

  const multiwordTokens: MultiwordToken[] = [];
  const tokenCount = native.multiwordTokenCount();
  for (let i = 0; i < tokenCount; i++) {
    const token = native.getMultiwordToken(i);
    if (token) {
      multiwordTokens.push({
        form: token.form,
        misc: token.misc,
        idFirst: token.idFirst,
        idLast: token.idLast,
      });
    }
  }

  const comments: string[] = [];
  const commentCount = native.commentCount();
  for (let i = 0; i < commentCount; i++) {
    const comment = native.getComment(i);
    if (comment !== null) {
      comments.push(comment);
    }
  }

  return freezeRecord({
    forms,
    lemmas,
    upostags,
    xpostags,
    feats,
    deprels,
    deps,
    miscs,
    ids,
    heads,
    childrenFlat,
    childrenOffsets,
    childrenCounts,
    multiwordTokens,
    comments,
  });
}

function freezeRecord(record: SentenceRecord): SentenceRecord {
  return Object.freeze({
    forms: Object.freeze([...record.forms]),
    lemmas: Object.freeze([...record.lemmas]),
    upostags: Object.freeze([...record.upostags]),
    xpostags: Object.freeze([...record.xpostags]),
    feats: Object.freeze([...record.feats]),
    deprels: Object.freeze([...record.deprels]),
    deps: Object.freeze([...record.deps]),
    miscs: Object.freeze([...record.miscs]),
    ids: Object.freeze([...record.ids]),
    heads: Object.freeze([...record.heads]),
    childrenFlat: Object.freeze([...record.childrenFlat]),
    childrenOffsets: Object.freeze([...record.childrenOffsets]),
    childrenCounts: Object.freeze([...record.childrenCounts]),
    multiwordTokens: Object.freeze(
      record.multiwordTokens.map((token) => Object.freeze({ ...token }))
    ),
    comments: Object.freeze([...record.comments]),
  });
}

/**
 * One parsed sentence.
 *
 * Owns frozen copies of all of its data and holds no reference to the parser
 * or model that produced it, so it stays valid after both are disposed.
 */
export class Sentence {
  private wordViews: readonly Word[] | null = null;

  private constructor(
    private readonly record: SentenceRecord,
    /** 0-based position in the parse stream that produced it */
    readonly index: number
  ) {}

  /**
   * Copies a native sentence. Does not free it.
   */
  static fromNative(native: NativeSentence, index: number): Sentence {
    return new Sentence(readSentenceRecord(native), index);
  }

  /**
   * Rebuilds a sentence from a plain record, e.g. one posted by a worker.
   */
  static fromRecord(record: SentenceRecord, index = 0): Sentence {
    return new Sentence(freezeRecord(record), index);
  }

  get words(): readonly Word[] {
    if (!this.wordViews) {
      this.wordViews = Object.freeze(
        this.record.forms.map((_form, i) => new Word(this.record, i, this.index))
      );
    }
    return this.wordViews;
  }

  get length(): number {
    return this.record.forms.length;
  }

  get multiwordTokens(): readonly MultiwordToken[] {
    return this.record.multiwordTokens;
  }

  get comments(): readonly string[] {
    return this.record.comments;
  }

  /**
   * Word by 1-based id.
   */
  word(id: number): Word | undefined {
    return this.words[id - 1];
  }

  /**
   * First word attached to the virtual root.
   */
  get root(): Word | undefined {
    return this.words.find((word) => word.head === 0);
  }

  /**
   * Surface text rebuilt from word forms. A multiword token contributes its
   * own form once in place of its words.
   */
  get text(): string {
    let text = "";
    const words = this.words;
    for (let i = 0; i < words.length; i++) {
      const word = words[i];
      if (!word) {
        break;
      }
      const token = this.record.multiwordTokens.find(
        (candidate) => candidate.idFirst === word.id
      );
      if (token) {
        text += token.form;
        if (!token.misc.split("|").includes("SpaceAfter=No")) {
          text += " ";
        }
        i += token.idLast - token.idFirst;
        continue;
      }
      text += word.form;
      if (word.hasSpaceAfter()) {
        text += " ";
      }
    }
    return text.trimEnd();
  }

  toRecord(): SentenceRecord {
    return this.record;
  }
}
