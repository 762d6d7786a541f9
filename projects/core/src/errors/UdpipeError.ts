/**
 * Error codes for the annotation layer.
 * Using unique string codes for programmatic identification.
 */
export const UdpipeErrorCode = {
  INVALID_ARGUMENT: "UDPIPE_001",
  LOAD_FAILED: "UDPIPE_002",
  SESSION_INIT_FAILED: "UDPIPE_003",
  TOKENIZE_FAILED: "UDPIPE_004",
  TAG_FAILED: "UDPIPE_005",
  PARSE_FAILED: "UDPIPE_006",
  ANNOTATION_FAILED: "UDPIPE_007",
  RESOURCE_RELEASED: "UDPIPE_008",
  BINDING_UNAVAILABLE: "UDPIPE_009",
  MODEL_NOT_FOUND: "UDPIPE_010",
  CONFIG_INVALID: "UDPIPE_011",
  WORKER_ERROR: "UDPIPE_012",
} as const;

export type UdpipeErrorCodeType =
  (typeof UdpipeErrorCode)[keyof typeof UdpipeErrorCode];

/**
 * Base error class for the annotation layer.
 * Provides typed error codes for programmatic identification.
 */
export class UdpipeError extends Error {
  readonly code: UdpipeErrorCodeType;

  constructor(
    code: UdpipeErrorCodeType,
    message: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.code = code;
    this.name = "UdpipeError";
  }
}

/**
 * Error thrown when a required input is missing or malformed.
 */
export class InvalidArgumentError extends UdpipeError {
  constructor(reason: string, argument?: string) {
    super(UdpipeErrorCode.INVALID_ARGUMENT, reason, { reason, argument });
    this.name = "InvalidArgumentError";
  }
}

/**
 * Error thrown when a model resource is missing, unreadable or malformed.
 */
export class LoadFailedError extends UdpipeError {
  constructor(reason: string, source?: string) {
    super(UdpipeErrorCode.LOAD_FAILED, reason, { reason, source });
    this.name = "LoadFailedError";
  }
}

/**
 * Error thrown when a tokenizer cannot be constructed for a loaded model.
 */
export class SessionInitFailedError extends UdpipeError {
  constructor(reason: string) {
    super(UdpipeErrorCode.SESSION_INIT_FAILED, reason, { reason });
    this.name = "SessionInitFailedError";
  }
}

/**
 * Error thrown when the engine rejects a sentence during annotation.
 * Subclasses name the step that failed when the binding can tell.
 */
export class AnnotationFailedError extends UdpipeError {
  constructor(
    reason: string,
    public readonly sentenceIndex: number,
    code: UdpipeErrorCodeType = UdpipeErrorCode.ANNOTATION_FAILED
  ) {
    super(code, reason, { reason, sentenceIndex });
    this.name = "AnnotationFailedError";
  }
}

export class TokenizeFailedError extends AnnotationFailedError {
  constructor(reason: string, sentenceIndex: number) {
    super(reason, sentenceIndex, UdpipeErrorCode.TOKENIZE_FAILED);
    this.name = "TokenizeFailedError";
  }
}

export class TagFailedError extends AnnotationFailedError {
  constructor(reason: string, sentenceIndex: number) {
    super(reason, sentenceIndex, UdpipeErrorCode.TAG_FAILED);
    this.name = "TagFailedError";
  }
}

export class ParseFailedError extends AnnotationFailedError {
  constructor(reason: string, sentenceIndex: number) {
    super(reason, sentenceIndex, UdpipeErrorCode.PARSE_FAILED);
    this.name = "ParseFailedError";
  }
}

/**
 * Error thrown when a disposed Model or Parser is used again.
 */
export class ResourceReleasedError extends UdpipeError {
  constructor(resource: string) {
    super(
      UdpipeErrorCode.RESOURCE_RELEASED,
      `${resource} has already been released`,
      { resource }
    );
    this.name = "ResourceReleasedError";
  }
}

/**
 * Error thrown when the native library cannot be located or bound.
 */
export class BindingUnavailableError extends UdpipeError {
  constructor(reason: string, libraryPath?: string) {
    super(
      UdpipeErrorCode.BINDING_UNAVAILABLE,
      `Native binding unavailable: ${reason}`,
      { reason, libraryPath }
    );
    this.name = "BindingUnavailableError";
  }
}

/**
 * Error thrown when a model identifier is unknown or its file is absent.
 */
export class ModelNotFoundError extends UdpipeError {
  constructor(language: string, reason: string) {
    super(UdpipeErrorCode.MODEL_NOT_FOUND, `Model ${language}: ${reason}`, {
      language,
      reason,
    });
    this.name = "ModelNotFoundError";
  }
}

/**
 * Error thrown when configuration values cannot be used.
 */
export class ConfigError extends UdpipeError {
  constructor(key: string, value: string, reason: string) {
    super(
      UdpipeErrorCode.CONFIG_INVALID,
      `Invalid configuration for ${key}: ${reason}`,
      { key, value }
    );
    this.name = "ConfigError";
  }
}

/**
 * Error thrown when a parser worker thread fails.
 */
export class WorkerError extends UdpipeError {
  constructor(reason: string) {
    super(UdpipeErrorCode.WORKER_ERROR, `Worker error: ${reason}`, { reason });
    this.name = "WorkerError";
  }
}
