/**
 * Dependency parsing and morphological tagging of raw text with UDPipe
 * models, exposed as lazily iterated sentences.
 */

// Models and sentence streams
export { Model, type ModelOptions } from "./services/parser/Model.js";
export { Parser, type ParserState } from "./services/parser/Parser.js";
export { Sentence } from "./services/parser/Sentence.js";
export { Word } from "./services/parser/Word.js";
export {
  setDefaultBinding,
  setDefaultLogger,
} from "./services/parser/defaults.js";

// Cross-thread parsing
export {
  ParserWorker,
  createParserWorker,
  type ParserWorkerOptions,
  type WorkerModelSource,
} from "./services/worker/ParserWorker.js";

// Published models
export {
  getModelInfo,
  getModelsByLanguage,
  isModelRegistered,
  listModels,
  modelFilename,
} from "./services/model-registry/ModelRegistry.js";
export {
  ModelStore,
  createModelStore,
  type ModelStoreOptions,
} from "./services/model-registry/ModelStore.js";
export type { IModelStore, ModelInfo } from "./interfaces/IModelStore.js";

// Native boundary
export { createBinding, createKoffiBinding } from "./native/koffi/KoffiBinding.js";
export {
  EngineBinding,
  createEngineBinding,
} from "./native/engine/EngineBinding.js";
export type {
  AnnotationEngine,
  EngineModel,
  EngineSentence,
  EngineTokenizer,
  EngineWord,
  ModelByteSource,
} from "./interfaces/IAnnotationEngine.js";
export type {
  NativeBinding,
  NativeBindingModule,
  NativeModel,
  NativeParser,
  NativeSentence,
} from "./interfaces/INativeBinding.js";
export type {
  MultiwordToken,
  SentenceRecord,
} from "./interfaces/ISentenceRecord.js";

// Errors
export {
  UdpipeError,
  UdpipeErrorCode,
  type UdpipeErrorCodeType,
  InvalidArgumentError,
  LoadFailedError,
  SessionInitFailedError,
  AnnotationFailedError,
  TokenizeFailedError,
  TagFailedError,
  ParseFailedError,
  ResourceReleasedError,
  BindingUnavailableError,
  ModelNotFoundError,
  ConfigError,
  WorkerError,
} from "./errors/UdpipeError.js";

// Ambient
export { loadConfig, type UdpipeConfig } from "./config/config.js";
export {
  ConsoleLogger,
  createLogger,
  type LogLevel,
  type Logger,
} from "./logging/Logger.js";
