/**
 * Owner of the confirmed resume offset and the sent-object counter of one
 * invocation.
 *
 * Only the producer mutates it, after a dispatch round has fully completed, so
 * the offset never moves past an object whose batch has not been accounted for.
 */
export class ProgressTracker {
  private offset: number;
  private sent = 0;

  constructor(
    startOffset: number,
    readonly totalBytes: number,
  ) {
    if (!Number.isInteger(startOffset) || startOffset < 0) {
      throw new Error(`Start offset must be a non-negative integer, got ${String(startOffset)}`);
    }
    this.offset = startOffset;
  }

  get confirmedOffset(): number {
    return this.offset;
  }

  get objectsSent(): number {
    return this.sent;
  }

  /** Move the resume offset forward by bytes the extractor has confirmed. */
  advance(confirmedBytes: number): void {
    if (confirmedBytes < 0) {
      throw new Error(`Cannot move the resume offset backwards (${String(confirmedBytes)} bytes)`);
    }
    this.offset += confirmedBytes;
  }

  recordSent(count: number): void {
    this.sent += count;
  }

  /**
   * Whether the chain of invocations ends here.
   *
   * An invocation that sent nothing also counts as finished, even when the
   * offset is short of the end; `isStalled()` reports that case.
   */
  isFinished(): boolean {
    return this.sent === 0 || this.offset === 0 || this.offset >= this.totalBytes;
  }

  /** Finished without having reached the end of the source. */
  isStalled(): boolean {
    return this.isFinished() && this.offset < this.totalBytes;
  }
}
