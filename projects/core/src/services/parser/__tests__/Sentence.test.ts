import { describe, it, expect, beforeAll, afterAll } from "vitest";

import type { Model } from "../Model.js";
import { Sentence } from "../Sentence.js";
import { loadFixtureModel } from "./helpers.js";

const FOX = "The quick brown fox jumps over the lazy dog.";

describe("Sentence", () => {
  let model: Model;

  beforeAll(() => {
    model = loadFixtureModel().model;
  });

  afterAll(() => {
    model.dispose();
  });

  function parseOne(text: string): Sentence {
    const [sentence] = model.parseSentences(text);
    if (!sentence) {
      throw new Error(`no sentence parsed from ${text}`);
    }
    return sentence;
  }

  describe("a parsed tree", () => {
    let sentence: Sentence;

    beforeAll(() => {
      sentence = parseOne(FOX);
    });

    it("has ten words with 1-based ids", () => {
      expect(sentence.length).toBe(10);
      expect(sentence.words.map((word) => word.id)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
    });

    it("has the expected heads and relations", () => {
      expect(sentence.words.map((word) => word.head)).toEqual([2, 4, 4, 5, 0, 9, 9, 9, 5, 5]);
      expect(sentence.words.map((word) => word.deprel)).toEqual([
        "det", "amod", "amod", "nsubj", "root", "case", "det", "amod", "obl", "punct",
      ]);
    });

    it("attaches the leading determiner to word 2", () => {
      expect(sentence.word(1)?.form).toBe("The");
      expect(sentence.word(1)?.head).toBe(2);
      expect(sentence.word(1)?.deprel).toBe("det");
    });

    it("has exactly one root, the main verb", () => {
      const roots = sentence.words.filter((word) => word.head === 0);
      expect(roots).toHaveLength(1);
      expect(sentence.root?.form).toBe("jumps");
      expect(sentence.root?.lemma).toBe("jump");
    });

    it("lists each word's dependents", () => {
      expect(sentence.word(5)?.children).toEqual([4, 9, 10]);
      expect(sentence.word(4)?.children).toEqual([2, 3]);
      expect(sentence.word(2)?.children).toEqual([1]);
      expect(sentence.word(9)?.children).toEqual([6, 7, 8]);
      expect(sentence.word(1)?.children).toEqual([]);
    });

    it("keeps children consistent with heads", () => {
      for (const word of sentence.words) {
        for (const child of word.children) {
          expect(sentence.word(child)?.head).toBe(word.id);
        }
      }
    });

    it("rebuilds the surface text", () => {
      expect(sentence.text).toBe(FOX);
    });

    it("carries document comments on the first sentence", () => {
      expect(sentence.comments).toEqual(["# newdoc", "# newpar"]);
    });

    it("returns undefined for ids out of range", () => {
      expect(sentence.word(0)).toBeUndefined();
      expect(sentence.word(11)).toBeUndefined();
    });
  });

  describe("multiword tokens", () => {
    let sentence: Sentence;

    beforeAll(() => {
      sentence = parseOne("I don't like cats.");
    });

    it("splits the contraction into words", () => {
      expect(sentence.words.map((word) => word.form)).toEqual([
        "I", "do", "n't", "like", "cats", ".",
      ]);
    });

    it("records the token span", () => {
      expect(sentence.multiwordTokens).toEqual([
        { form: "don't", misc: "", idFirst: 2, idLast: 3 },
      ]);
    });

    it("uses the token form in the surface text", () => {
      expect(sentence.text).toBe("I don't like cats.");
    });

    it("attaches the contraction's words to the verb", () => {
      expect(sentence.word(2)?.deprel).toBe("aux");
      expect(sentence.word(3)?.lemma).toBe("not");
      expect(sentence.root?.form).toBe("like");
    });
  });

  it("falls back to attaching everything to the first verb", () => {
    const sentence = parseOne("Dogs bark!");
    expect(sentence.words.map((word) => [word.form, word.head, word.deprel])).toEqual([
      ["Dogs", 2, "dep"],
      ["bark", 0, "root"],
      ["!", 2, "punct"],
    ]);
  });

  it("keeps non-ASCII forms intact", () => {
    const sentence = parseOne("Žluťoučký kůň.");
    expect(sentence.words.map((word) => word.form)).toEqual(["Žluťoučký", "kůň", "."]);
    expect(sentence.word(1)?.lemma).toBe("žluťoučký");
    expect(sentence.text).toBe("Žluťoučký kůň.");
  });

  it("has no comments after the first sentence", () => {
    const [, second] = model.parseSentences("Hello world. Goodbye world.");
    expect(second?.comments).toEqual([]);
  });

  describe("records", () => {
    it("round-trips through a plain record", () => {
      const original = parseOne(FOX);
      const copy = Sentence.fromRecord(structuredClone(original.toRecord()), 4);

      expect(copy.index).toBe(4);
      expect(copy.text).toBe(FOX);
      expect(copy.words.map((word) => word.sentenceId)).toEqual(Array.from({ length: 10 }, () => 4));
      expect(copy.word(5)?.children).toEqual([4, 9, 10]);
    });

    it("is frozen", () => {
      const record = parseOne("Dogs bark.").toRecord();
      expect(Object.isFrozen(record)).toBe(true);
      expect(Object.isFrozen(record.forms)).toBe(true);
    });
  });
});
