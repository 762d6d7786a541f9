import {
  AnnotationFailedError,
  InvalidArgumentError,
  LoadFailedError,
  ParseFailedError,
  SessionInitFailedError,
  TagFailedError,
  TokenizeFailedError,
  UdpipeError,
  UdpipeErrorCode,
  type UdpipeErrorCodeType,
} from "../../errors/UdpipeError.js";
import { lastError } from "../../native/ErrorChannel.js";

/**
 * Turns the calling thread's last boundary error into a typed error.
 *
 * Must run right after the failing call, before anything else on this thread
 * touches the channel.
 */
export function errorFromChannel(
  fallbackCode: UdpipeErrorCodeType,
  fallbackMessage: string,
  details: { readonly source?: string; readonly sentenceIndex?: number } = {}
): UdpipeError {
  const entry = lastError();
  const code = entry?.code ?? fallbackCode;
  const message = entry?.message ?? fallbackMessage;
  const sentenceIndex = details.sentenceIndex ?? 0;

  switch (code) {
    case UdpipeErrorCode.INVALID_ARGUMENT:
      return new InvalidArgumentError(message);
    case UdpipeErrorCode.LOAD_FAILED:
      return new LoadFailedError(message, details.source);
    case UdpipeErrorCode.SESSION_INIT_FAILED:
      return new SessionInitFailedError(message);
    case UdpipeErrorCode.TOKENIZE_FAILED:
      return new TokenizeFailedError(message, sentenceIndex);
    case UdpipeErrorCode.TAG_FAILED:
      return new TagFailedError(message, sentenceIndex);
    case UdpipeErrorCode.PARSE_FAILED:
      return new ParseFailedError(message, sentenceIndex);
    case UdpipeErrorCode.ANNOTATION_FAILED:
      return new AnnotationFailedError(message, sentenceIndex);
    default:
      return new UdpipeError(code, message);
  }
}
