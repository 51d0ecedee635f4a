import { StringDecoder } from 'string_decoder';
import type { LogStream } from '../cluster/client-interface.js';

export class LogReadTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`no log output received for ${timeoutMs}ms`);
    this.name = 'LogReadTimeoutError';
  }
}

export interface LineScannerOptions {
  // Reject a pull that produces no data for this long. 0 disables the limit.
  idleTimeoutMs?: number;
}

/**
 * Reads lines from a log stream one at a time. Chunks are pulled only when a
 * line is requested, so a caller can stop early without draining the stream.
 * Like the stream it wraps, a scanner is single-use and must be closed.
 *
 *   const scanner = new LineScanner(log);
 *   try {
 *     while (await scanner.scan()) handle(scanner.text());
 *   } finally {
 *     await scanner.close();
 *   }
 */
export class LineScanner {
  private iterator: AsyncIterator<unknown>;
  private decoder = new StringDecoder('utf8');
  private pending: string[] = [];
  private partial = '';
  private current = '';
  private ended = false;
  private closed = false;
  private idleTimeoutMs: number;

  constructor(private log: LogStream, options: LineScannerOptions = {}) {
    this.iterator = log.stream[Symbol.asyncIterator]();
    this.idleTimeoutMs = options.idleTimeoutMs ?? 0;
  }

  /** Advance to the next line. Resolves false once the stream is exhausted. */
  async scan(): Promise<boolean> {
    while (this.pending.length === 0) {
      if (this.ended || this.closed) {
        return false;
      }
      await this.fill();
    }

    this.current = this.pending.shift() ?? '';
    return true;
  }

  /** The line produced by the most recent successful scan, without its newline. */
  text(): string {
    return this.current;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.log.close();
  }

  private async fill(): Promise<void> {
    const result = await this.pull();

    if (result.done) {
      this.ended = true;
      const rest = this.partial + this.decoder.end();
      this.partial = '';
      if (rest.length > 0) {
        this.pending.push(stripCarriageReturn(rest));
      }
      return;
    }

    const text = this.partial + this.decode(result.value);
    const lines = text.split('\n');
    this.partial = lines.pop() ?? '';
    for (const line of lines) {
      this.pending.push(stripCarriageReturn(line));
    }
  }

  private async pull(): Promise<IteratorResult<unknown>> {
    const next = this.iterator.next();
    if (this.idleTimeoutMs <= 0) {
      return next;
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new LogReadTimeoutError(this.idleTimeoutMs)), this.idleTimeoutMs);
    });

    // A read that loses the race settles once close() tears the stream down
    try {
      return await Promise.race([next, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private decode(chunk: unknown): string {
    if (typeof chunk === 'string') {
      return chunk;
    }
    if (chunk instanceof Uint8Array) {
      return this.decoder.write(Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength));
    }
    return String(chunk);
  }
}

function stripCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}
