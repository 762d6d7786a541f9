import { readdir, rm, stat } from "node:fs/promises";
import { join } from "node:path";

import type { IModelStore, ModelInfo } from "../../interfaces/IModelStore.js";
import { ModelNotFoundError } from "../../errors/UdpipeError.js";
import { loadConfig } from "../../config/config.js";
import { Model, type ModelOptions } from "../parser/Model.js";
import {
  getModelInfo,
  listModels,
  modelFilename,
} from "./ModelRegistry.js";

export interface ModelStoreOptions {
  readonly modelDir: string;
}

/**
 * Finds published model files in a local directory.
 *
 * Files are expected under their published names (see `modelFilename`).
 * Fetching them is left to the caller.
 */
export class ModelStore implements IModelStore {
  readonly modelDir: string;

  constructor(options: ModelStoreOptions) {
    this.modelDir = options.modelDir;
  }

  async isModelCached(modelId: string): Promise<boolean> {
    const modelPath = await this.getModelPath(modelId);
    return modelPath !== undefined;
  }

  async getModelPath(modelId: string): Promise<string | undefined> {
    if (!getModelInfo(modelId)) {
      return undefined;
    }

    const modelPath = join(this.modelDir, modelFilename(modelId));
    const stats = await stat(modelPath).catch(() => null);
    return stats?.isFile() && stats.size > 0 ? modelPath : undefined;
  }

  /**
   * @throws {ModelNotFoundError} When the model is unknown or not present
   * @throws {LoadFailedError} When the file is present but not a valid model
   */
  async loadModel(
    modelId: string,
    options?: Readonly<ModelOptions>
  ): Promise<Model> {
    if (!getModelInfo(modelId)) {
      throw new ModelNotFoundError(modelId, "unknown model identifier");
    }

    const modelPath = await this.getModelPath(modelId);
    if (!modelPath) {
      throw new ModelNotFoundError(
        modelId,
        `${modelFilename(modelId)} not found in ${this.modelDir}`
      );
    }
    return Model.load(modelPath, options);
  }

  async deleteModel(modelId: string): Promise<void> {
    if (!getModelInfo(modelId)) {
      return;
    }
    await rm(join(this.modelDir, modelFilename(modelId)), { force: true });
  }

  getModelInfo(modelId: string): ModelInfo | undefined {
    return getModelInfo(modelId);
  }

  listModels(): readonly ModelInfo[] {
    return listModels();
  }

  async listCachedModels(): Promise<readonly string[]> {
    const entries = await readdir(this.modelDir, { withFileTypes: true }).catch(
      () => []
    );
    const cached: string[] = [];

    for (const entry of entries) {
      if (!entry.isFile()) {
        continue;
      }
      const modelId = listModels().find(
        (model) => model.filename === entry.name
      )?.id;
      if (modelId && (await this.isModelCached(modelId))) {
        cached.push(modelId);
      }
    }

    return cached.sort();
  }
}

export function createModelStore(
  modelDir: string = loadConfig().modelDir
): ModelStore {
  return new ModelStore({ modelDir });
}
