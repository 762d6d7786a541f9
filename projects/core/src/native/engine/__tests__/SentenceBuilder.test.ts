import { describe, it, expect } from "vitest";

import type {
  EngineSentence,
  EngineWord,
} from "../../../interfaces/IAnnotationEngine.js";
import { buildSentenceRecord } from "../SentenceBuilder.js";

function word(
  id: number,
  form: string,
  head: number,
  deprel: string,
  children: number[] = []
): EngineWord {
  return {
    id,
    form,
    lemma: form.toLowerCase(),
    upostag: "X",
    xpostag: "",
    feats: "",
    head,
    deprel,
    deps: "",
    misc: "",
    children,
  };
}

function dogsBark(): EngineSentence {
  return {
    words: [
      word(0, "<root>", -1, "", [2]),
      word(1, "Dogs", 2, "nsubj"),
      word(2, "bark", 0, "root", [1, 3]),
      word(3, ".", 2, "punct"),
    ],
    multiwordTokens: [],
    comments: ["# newpar"],
  };
}

describe("buildSentenceRecord", () => {
  it("skips the virtual root", () => {
    const record = buildSentenceRecord(dogsBark());
    expect(record.forms).toEqual(["Dogs", "bark", "."]);
    expect(record.ids).toEqual([1, 2, 3]);
    expect(record.heads).toEqual([2, 0, 2]);
    expect(record.deprels).toEqual(["nsubj", "root", "punct"]);
  });

  it("flattens children into offset and count pairs", () => {
    const record = buildSentenceRecord(dogsBark());
    expect(record.childrenFlat).toEqual([1, 3]);
    expect(record.childrenOffsets).toEqual([0, 0, 2]);
    expect(record.childrenCounts).toEqual([0, 2, 0]);
  });

  it("copies comments and multiword tokens", () => {
    const tree = dogsBark();
    tree.multiwordTokens.push({ form: "Dogsbark", misc: "", idFirst: 1, idLast: 2 });
    const record = buildSentenceRecord(tree);
    expect(record.comments).toEqual(["# newpar"]);
    expect(record.multiwordTokens).toEqual([
      { form: "Dogsbark", misc: "", idFirst: 1, idLast: 2 },
    ]);
  });

  it("keeps no reference to the engine tree", () => {
    const tree = dogsBark();
    const record = buildSentenceRecord(tree);

    const bark = tree.words[2];
    if (bark) {
      bark.form = "howl";
      bark.children.push(9);
    }
    tree.comments.push("# later");

    expect(record.forms[1]).toBe("bark");
    expect(record.childrenFlat).toEqual([1, 3]);
    expect(record.comments).toEqual(["# newpar"]);
  });

  it.each([
    { label: "empty", words: [] },
    { label: "root-only", words: [word(0, "<root>", -1, "")] },
  ])("returns no words for a $label tree", ({ words }) => {
    const record = buildSentenceRecord({ words, multiwordTokens: [], comments: [] });
    expect(record.forms).toEqual([]);
    expect(record.childrenFlat).toEqual([]);
  });

  it("passes self-cycles through unvalidated", () => {
    const record = buildSentenceRecord({
      words: [word(0, "<root>", -1, ""), word(1, "loop", 1, "dep", [1])],
      multiwordTokens: [],
      comments: [],
    });
    expect(record.heads).toEqual([1]);
    expect(record.childrenFlat).toEqual([1]);
  });
});
