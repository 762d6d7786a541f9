import { describe, it, expect } from "vitest";

import {
  AnnotationFailedError,
  BindingUnavailableError,
  ConfigError,
  InvalidArgumentError,
  LoadFailedError,
  ModelNotFoundError,
  ParseFailedError,
  ResourceReleasedError,
  SessionInitFailedError,
  TagFailedError,
  TokenizeFailedError,
  UdpipeError,
  UdpipeErrorCode,
  WorkerError,
} from "../UdpipeError.js";

describe("UdpipeError", () => {
  it("carries code, message and context", () => {
    const error = new UdpipeError(UdpipeErrorCode.LOAD_FAILED, "boom", {
      source: "a.udpipe",
    });
    expect(error.code).toBe("UDPIPE_002");
    expect(error.message).toBe("boom");
    expect(error.context).toEqual({ source: "a.udpipe" });
    expect(error.name).toBe("UdpipeError");
    expect(error).toBeInstanceOf(Error);
  });

  it("uses unique codes", () => {
    const codes = Object.values(UdpipeErrorCode);
    expect(new Set(codes).size).toBe(codes.length);
  });

  it.each([
    { error: new InvalidArgumentError("bad"), name: "InvalidArgumentError", code: UdpipeErrorCode.INVALID_ARGUMENT, message: "bad" },
    { error: new LoadFailedError("missing", "x.udpipe"), name: "LoadFailedError", code: UdpipeErrorCode.LOAD_FAILED, message: "missing" },
    { error: new SessionInitFailedError("no tokenizer"), name: "SessionInitFailedError", code: UdpipeErrorCode.SESSION_INIT_FAILED, message: "no tokenizer" },
    { error: new ResourceReleasedError("Model"), name: "ResourceReleasedError", code: UdpipeErrorCode.RESOURCE_RELEASED, message: "Model has already been released" },
    { error: new BindingUnavailableError("not configured"), name: "BindingUnavailableError", code: UdpipeErrorCode.BINDING_UNAVAILABLE, message: "Native binding unavailable: not configured" },
    { error: new ModelNotFoundError("english-ewt", "file missing"), name: "ModelNotFoundError", code: UdpipeErrorCode.MODEL_NOT_FOUND, message: "Model english-ewt: file missing" },
    { error: new ConfigError("UDPIPE_LOG_LEVEL", "loud", "unknown level"), name: "ConfigError", code: UdpipeErrorCode.CONFIG_INVALID, message: "Invalid configuration for UDPIPE_LOG_LEVEL: unknown level" },
    { error: new WorkerError("crashed"), name: "WorkerError", code: UdpipeErrorCode.WORKER_ERROR, message: "Worker error: crashed" },
  ])("$name has code $code", ({ error, name, code, message }) => {
    expect(error.name).toBe(name);
    expect(error.code).toBe(code);
    expect(error.message).toBe(message);
    expect(error).toBeInstanceOf(UdpipeError);
  });

  describe("annotation failures", () => {
    it.each([
      { error: new TokenizeFailedError("t", 2), code: UdpipeErrorCode.TOKENIZE_FAILED },
      { error: new TagFailedError("t", 2), code: UdpipeErrorCode.TAG_FAILED },
      { error: new ParseFailedError("t", 2), code: UdpipeErrorCode.PARSE_FAILED },
      { error: new AnnotationFailedError("t", 2), code: UdpipeErrorCode.ANNOTATION_FAILED },
    ])("$code is an AnnotationFailedError for sentence 2", ({ error, code }) => {
      expect(error).toBeInstanceOf(AnnotationFailedError);
      expect(error.code).toBe(code);
      expect(error.sentenceIndex).toBe(2);
      expect(error.context).toEqual({ reason: "t", sentenceIndex: 2 });
    });
  });
});
