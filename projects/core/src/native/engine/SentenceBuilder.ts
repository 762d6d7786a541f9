import type { EngineSentence } from "../../interfaces/IAnnotationEngine.js";
import type {
  MultiwordToken,
  SentenceRecord,
} from "../../interfaces/ISentenceRecord.js";

/**
 * Flattens one engine annotation tree into an owned record.
 *
 * The virtual root at position 0 is skipped. Each word's children are appended
 * to one shared array and addressed by `(offset, count)`. Nothing in the
 * result references the engine tree, which the engine may reuse afterwards.
 */
export function buildSentenceRecord(tree: EngineSentence): SentenceRecord {
  const wordCount = tree.words.length > 0 ? tree.words.length - 1 : 0;

  const forms = new Array<string>(wordCount);
  const lemmas = new Array<string>(wordCount);
  const upostags = new Array<string>(wordCount);
  const xpostags = new Array<string>(wordCount);
  const feats = new Array<string>(wordCount);
  const deprels = new Array<string>(wordCount);
  const deps = new Array<string>(wordCount);
  const miscs = new Array<string>(wordCount);
  const ids = new Array<number>(wordCount);
  const heads = new Array<number>(wordCount);
  const childrenOffsets = new Array<number>(wordCount);
  const childrenCounts = new Array<number>(wordCount);
  const childrenFlat: number[] = [];

  for (let idx = 1; idx < tree.words.length; idx++) {
    const word = tree.words[idx];
    if (!word) {
      continue;
    }
    const out = idx - 1;

    forms[out] = word.form;
    lemmas[out] = word.lemma;
    upostags[out] = word.upostag;
    xpostags[out] = word.xpostag;
    feats[out] = word.feats;
    deprels[out] = word.deprel;
    deps[out] = word.deps;
    miscs[out] = word.misc;
    ids[out] = word.id;
    heads[out] = word.head;

    childrenOffsets[out] = childrenFlat.length;
    childrenCounts[out] = word.children.length;
    for (const childId of word.children) {
      childrenFlat.push(childId);
    }
  }

  const multiwordTokens: MultiwordToken[] = tree.multiwordTokens.map(
    (token) => ({
      form: token.form,
      misc: token.misc,
      idFirst: token.idFirst,
      idLast: token.idLast,
    })
  );

  return {
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
    comments: [...tree.comments],
  };
}
