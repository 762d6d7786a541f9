import { describe, it, expect } from "vitest";

import * as udpipe from "../index.js";
import { MockEngine } from "./__mocks__/MockEngine.js";
import { FIXTURES_DIR, RecordingLogger } from "./testConfig.js";

describe("package entry point", () => {
  it("exposes the parsing surface", () => {
    expect(typeof udpipe.Model.load).toBe("function");
    expect(typeof udpipe.ParserWorker).toBe("function");
    expect(typeof udpipe.createModelStore).toBe("function");
    expect(udpipe.UdpipeErrorCode.LOAD_FAILED).toBe("UDPIPE_002");
  });

  it("parses end to end through a custom engine binding", () => {
    const model = udpipe.Model.load(`${FIXTURES_DIR}/models/english-test.json`, {
      binding: udpipe.createEngineBinding(new MockEngine()),
      logger: new RecordingLogger(),
    });
    try {
      const forms = model.parse("Dogs bark.").map((word) => `${word.form}/${word.upostag}`);
      expect(forms).toEqual(["Dogs/NOUN", "bark/VERB", "./PUNCT"]);
    } finally {
      model.dispose();
    }
  });
});
