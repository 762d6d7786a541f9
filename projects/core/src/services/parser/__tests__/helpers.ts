import { fileURLToPath } from "node:url";

import { createEngineBinding } from "../../../native/engine/EngineBinding.js";
import type { NativeBinding } from "../../../interfaces/INativeBinding.js";
import { Model } from "../Model.js";
import {
  FIXTURE_MODEL_PATH,
  MockEngine,
} from "../../../__tests__/__mocks__/MockEngine.js";
import { RecordingLogger } from "../../../__tests__/testConfig.js";

export const FIXTURE_PATH = fileURLToPath(FIXTURE_MODEL_PATH);

export interface ModelHarness {
  readonly engine: MockEngine;
  readonly binding: NativeBinding;
  readonly logger: RecordingLogger;
  readonly model: Model;
}

/**
 * Loads the fixture model through a fresh mock engine.
 */
export function loadFixtureModel(): ModelHarness {
  const engine = new MockEngine();
  const binding = createEngineBinding(engine, "mock");
  const logger = new RecordingLogger();
  const model = Model.load(FIXTURE_PATH, { binding, logger });
  return { engine, binding, logger, model };
}
