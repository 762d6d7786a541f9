import type { Model, ModelOptions } from "../services/parser/Model.js";

export interface ModelInfo {
  /** Identifier such as `english-ewt` */
  readonly id: string;
  readonly language: string;
  readonly treebank: string;
  readonly filename: string;
}

export interface IModelStore {
  readonly modelDir: string;
  isModelCached(modelId: string): Promise<boolean>;
  getModelPath(modelId: string): Promise<string | undefined>;
  loadModel(modelId: string, options?: Readonly<ModelOptions>): Promise<Model>;
  deleteModel(modelId: string): Promise<void>;
  getModelInfo(modelId: string): ModelInfo | undefined;
  listModels(): readonly ModelInfo[];
  listCachedModels(): Promise<readonly string[]>;
}
