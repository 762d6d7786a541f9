import type { ModelByteSource } from "../interfaces/IAnnotationEngine.js";

/**
 * Non-owning, read-only view over caller bytes.
 *
 * Wraps the caller's region without copying it. The view is handed to the
 * engine for the duration of one load call and detached afterwards, so the
 * caller may reuse or drop its buffer as soon as the call returns.
 */
export class ReadonlyByteView implements ModelByteSource {
  private bytes: Uint8Array | null;

  constructor(bytes: Uint8Array) {
    this.bytes = bytes;
  }

  get byteLength(): number {
    return this.bytes?.byteLength ?? 0;
  }

  byteAt(offset: number): number {
    const bytes = this.requireBytes();
    if (offset < 0 || offset >= bytes.byteLength) {
      throw new RangeError(
        `Offset ${offset} outside view of ${bytes.byteLength} bytes`
      );
    }
    return bytes[offset] ?? 0;
  }

  /**
   * Returns an alias of the caller's bytes, not a copy. Readers must not
   * write through it or keep it past the load call: the alias stays valid
   * after {@link detach}, which only drops this view's own reference.
   */
  subarray(start: number, end?: number): Uint8Array {
    return this.requireBytes().subarray(start, end);
  }

  /**
   * Drops the reference to the caller's bytes.
   */
  detach(): void {
    this.bytes = null;
  }

  private requireBytes(): Uint8Array {
    if (!this.bytes) {
      throw new RangeError("Byte view used after its load call returned");
    }
    return this.bytes;
  }
}
