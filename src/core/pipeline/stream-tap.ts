/**
 * Side-channel capture of response bodies. The caller keeps the body it would have had;
 * the recorder collects at most maxBytes of it and settles when the body ends, fails, or
 * reaches the cap.
 */

export interface CapturedBody {
  /** Collected bytes (capped at maxBytes). */
  body: Buffer;
  /** True when the body was longer than maxBytes. */
  truncated: boolean;
  /** Set when the body stream failed before it ended. */
  error?: unknown;
}

export class BodyCollector {
  private readonly chunks: Buffer[] = [];
  private length = 0;
  private truncated = false;
  private settled: CapturedBody | undefined;
  private resolveCaptured: (value: CapturedBody) => void = () => undefined;
  private readonly captured = new Promise<CapturedBody>((resolve) => {
    this.resolveCaptured = resolve;
  });

  constructor(readonly maxBytes: number) {}

  /** Keeps what fits under the cap. Returns false once the cap has been passed. */
  push(chunk: Uint8Array): boolean {
    if (this.settled || this.truncated) return false;
    const take = Math.min(chunk.byteLength, this.maxBytes - this.length);
    if (take > 0) {
      this.chunks.push(Buffer.from(chunk.subarray(0, take)));
      this.length += take;
    }
    if (chunk.byteLength > take) this.truncated = true;
    return !this.truncated;
  }

  finish(error?: unknown): void {
    if (this.settled) return;
    this.settled = { body: Buffer.concat(this.chunks), truncated: this.truncated };
    if (error !== undefined) this.settled.error = error;
    this.resolveCaptured(this.settled);
  }

  /** Settles once finish() runs; never rejects. */
  result(): Promise<CapturedBody> {
    return this.captured;
  }
}

/**
 * Drains a web stream the caller never sees (one branch of response.clone()) until it ends
 * or passes maxBytes, then cancels it so the caller's branch is no longer held back.
 */
export async function captureWebStream(stream: ReadableStream<Uint8Array>, maxBytes: number): Promise<CapturedBody> {
  const collector = new BodyCollector(maxBytes);
  const reader = stream.getReader();
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      if (!collector.push(value)) {
        await reader.cancel();
        break;
      }
    }
    collector.finish();
  } catch (err: unknown) {
    collector.finish(err);
  }
  return collector.result();
}
