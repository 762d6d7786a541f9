import { describe, it, expect } from "vitest";

import {
  getModelInfo,
  getModelsByLanguage,
  isModelRegistered,
  listModels,
  modelFilename,
} from "../ModelRegistry.js";

describe("ModelRegistry", () => {
  describe("isModelRegistered", () => {
    it.each([
      { modelId: "english-ewt", expected: true },
      { modelId: "german-gsd", expected: true },
      { modelId: "ancient_greek-proiel", expected: true },
      { modelId: "english", expected: false },
      { modelId: "klingon-tlh", expected: false },
    ])("returns $expected for $modelId", ({ modelId, expected }) => {
      expect(isModelRegistered(modelId)).toBe(expected);
    });
  });

  describe("getModelInfo", () => {
    it("splits the identifier into language and treebank", () => {
      expect(getModelInfo("ancient_greek-perseus")).toEqual({
        id: "ancient_greek-perseus",
        language: "ancient_greek",
        treebank: "perseus",
        filename: "ancient_greek-perseus-ud-2.5-191206.udpipe",
      });
    });

    it("returns undefined for unknown model", () => {
      expect(getModelInfo("klingon-tlh")).toBeUndefined();
    });
  });

  it("builds published file names", () => {
    expect(modelFilename("english-ewt")).toBe("english-ewt-ud-2.5-191206.udpipe");
  });

  it("lists every published model in order", () => {
    const ids = listModels().map((model) => model.id);
    expect(ids).toHaveLength(101);
    expect(ids[0]).toBe("afrikaans-afribooms");
    expect([...ids].sort()).toEqual(ids);
  });

  it("finds all treebanks of a language", () => {
    expect(getModelsByLanguage("english").map((model) => model.treebank)).toEqual([
      "ewt",
      "gum",
      "lines",
      "partut",
    ]);
  });
});
