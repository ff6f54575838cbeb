import type { Readable } from "node:stream";

import { TransferCanceledError } from "../transfer/errors.js";

const NEWLINE = 0x0a;

/**
 * Buffered reader over the peer's output stream. Every call checks the
 * abort signal first, and a pull that is already waiting on the stream
 * rejects as soon as the signal fires, so cancellation latency is bounded
 * by one read call rather than one message.
 */
export class CancellableReader {
  private readonly chunks: AsyncIterator<unknown>;
  private buffered: Buffer = Buffer.alloc(0);
  private ended = false;

  constructor(
    source: Readable,
    private readonly signal: AbortSignal
  ) {
    this.chunks = source[Symbol.asyncIterator]();
  }

  get canceled(): boolean {
    return this.signal.aborted;
  }

  async read(maxBytes: number): Promise<Buffer | null> {
    this.throwIfCanceled();
    if (this.buffered.length === 0 && !(await this.pull())) {
      return null;
    }
    const size = Math.min(maxBytes, this.buffered.length);
    const chunk = this.buffered.subarray(0, size);
    this.buffered = this.buffered.subarray(size);
    return chunk;
  }

  async readByte(): Promise<number | null> {
    const chunk = await this.read(1);
    return chunk === null ? null : chunk[0];
  }

  async readLine(): Promise<string | null> {
    this.throwIfCanceled();
    let scanned = 0;
    for (;;) {
      const newline = this.buffered.indexOf(NEWLINE, scanned);
      if (newline !== -1) {
        const line = this.buffered.subarray(0, newline).toString("utf-8");
        this.buffered = this.buffered.subarray(newline + 1);
        return line;
      }
      scanned = this.buffered.length;
      if (!(await this.pull())) {
        this.buffered = Buffer.alloc(0);
        return null;
      }
    }
  }

  /**
   * Consumes whatever the peer still sends until its stream ends, ignoring
   * the abort signal. Some transports only report the remote exit after
   * their output has been read to the end. Resolves with the number of
   * bytes thrown away.
   */
  async discard(): Promise<number> {
    let discarded = this.buffered.length;
    this.buffered = Buffer.alloc(0);
    while (!this.ended) {
      const next = await this.chunks.next();
      if (next.done) {
        this.ended = true;
        break;
      }
      discarded += toBuffer(next.value).length;
    }
    return discarded;
  }

  private async pull(): Promise<boolean> {
    this.throwIfCanceled();
    if (this.ended) {
      return false;
    }

    const next = await this.raceAbort(this.chunks.next());
    if (next.done) {
      this.ended = true;
      return false;
    }
    const chunk = toBuffer(next.value);
    this.buffered = this.buffered.length === 0 ? chunk : Buffer.concat([this.buffered, chunk]);
    return true;
  }

  private raceAbort<T>(pending: Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const onAbort = () => {
        reject(new TransferCanceledError());
      };
      this.signal.addEventListener("abort", onAbort, { once: true });
      pending.then(
        (value) => {
          this.signal.removeEventListener("abort", onAbort);
          resolve(value);
        },
        (error: unknown) => {
          this.signal.removeEventListener("abort", onAbort);
          reject(error);
        }
      );
    });
  }

  private throwIfCanceled(): void {
    if (this.signal.aborted) {
      throw new TransferCanceledError();
    }
  }
}

function toBuffer(value: unknown): Buffer {
  if (Buffer.isBuffer(value)) {
    return value;
  }
  if (value instanceof Uint8Array) {
    return Buffer.from(value);
  }
  return Buffer.from(String(value), "utf-8");
}
