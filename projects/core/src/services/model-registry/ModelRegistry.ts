import { readFileSync } from "node:fs";

import type { ModelInfo } from "../../interfaces/IModelStore.js";

interface RegistryFile {
  readonly udVersion: string;
  readonly release: string;
  readonly models: readonly string[];
}

function isRegistryFile(value: unknown): value is RegistryFile {
  return (
    typeof value === "object" &&
    value !== null &&
    "udVersion" in value &&
    typeof value.udVersion === "string" &&
    "release" in value &&
    typeof value.release === "string" &&
    "models" in value &&
    Array.isArray(value.models) &&
    value.models.every((model: unknown) => typeof model === "string")
  );
}

function readRegistry(): RegistryFile {
  const url = new URL("../../../data/models.json", import.meta.url);
  const parsed: unknown = JSON.parse(readFileSync(url, "utf8"));
  if (!isRegistryFile(parsed)) {
    throw new Error(`Malformed model registry at ${url.pathname}`);
  }
  return parsed;
}

const REGISTRY = readRegistry();

/**
 * File name of a published model, e.g. `english-ewt-ud-2.5-191206.udpipe`.
 */
export function modelFilename(modelId: string): string {
  return `${modelId}-ud-${REGISTRY.udVersion}-${REGISTRY.release}.udpipe`;
}

function toModelInfo(modelId: string): ModelInfo {
  const separator = modelId.lastIndexOf("-");
  return {
    id: modelId,
    language: separator === -1 ? modelId : modelId.slice(0, separator),
    treebank: separator === -1 ? "" : modelId.slice(separator + 1),
    filename: modelFilename(modelId),
  };
}

const MODEL_REGISTRY: ReadonlyMap<string, ModelInfo> = new Map(
  REGISTRY.models.map((modelId) => [modelId, toModelInfo(modelId)])
);

export function getModelInfo(modelId: string): ModelInfo | undefined {
  return MODEL_REGISTRY.get(modelId);
}

/**
 * All published models, sorted by identifier.
 */
export function listModels(): readonly ModelInfo[] {
  return [...MODEL_REGISTRY.values()];
}

export function getModelsByLanguage(language: string): readonly ModelInfo[] {
  return listModels().filter((model) => model.language === language);
}

export function isModelRegistered(modelId: string): boolean {
  return MODEL_REGISTRY.has(modelId);
}
