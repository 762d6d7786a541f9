/**
 * Most-recent-error slot of the calling thread.
 *
 * Module state is per isolate, and every worker thread runs its own isolate,
 * so each thread sees only its own slot. Read it immediately after a failing
 * boundary call; the next call on the same thread overwrites or clears it.
 */
import type { UdpipeErrorCodeType } from "../errors/UdpipeError.js";

export interface ChannelError {
  readonly code: UdpipeErrorCodeType;
  readonly message: string;
}

let slot: ChannelError | null = null;

export function recordError(code: UdpipeErrorCodeType, message: string): void {
  slot = { code, message };
}

export function clearError(): void {
  slot = null;
}

export function lastError(): ChannelError | null {
  return slot;
}

/**
 * Message of the last error, or `fallback` when the slot is empty.
 */
export function lastErrorMessage(fallback: string): string {
  return slot?.message ?? fallback;
}
