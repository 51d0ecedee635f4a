import { PassThrough, Readable } from 'stream';
import { describe, it, expect } from 'vitest';
import { LineScanner, LogReadTimeoutError } from '../../src/lib/line-scanner.js';
import type { LogStream } from '../../src/cluster/client-interface.js';

function logOf(stream: Readable): LogStream & { closes: number } {
  const log = {
    stream,
    closes: 0,
    async close() {
      log.closes++;
      stream.destroy();
    },
  };
  return log;
}

async function readAll(scanner: LineScanner): Promise<string[]> {
  const lines: string[] = [];
  while (await scanner.scan()) {
    lines.push(scanner.text());
  }
  return lines;
}

describe('LineScanner', () => {
  it('splits chunks into lines regardless of chunk boundaries', async () => {
    const log = logOf(Readable.from(['first li', 'ne\nsecond\n', 'third\nla', 'st']));
    const scanner = new LineScanner(log);

    expect(await readAll(scanner)).toEqual(['first line', 'second', 'third', 'last']);
    await scanner.close();
  });

  it('strips carriage returns and keeps empty lines', async () => {
    const log = logOf(Readable.from(['a\r\n\r\nb\n']));
    expect(await readAll(new LineScanner(log))).toEqual(['a', '', 'b']);
  });

  it('decodes multi-byte characters split across chunks', async () => {
    const bytes = Buffer.from('héllo\n', 'utf8');
    const log = logOf(Readable.from([bytes.subarray(0, 2), bytes.subarray(2)]));
    expect(await readAll(new LineScanner(log))).toEqual(['héllo']);
  });

  it('returns false on an empty stream', async () => {
    const scanner = new LineScanner(logOf(Readable.from([])));
    expect(await scanner.scan()).toBe(false);
    expect(await scanner.scan()).toBe(false);
  });

  it('pulls only what the caller asks for', async () => {
    let pulled = 0;
    function* chunks(): Generator<string> {
      for (let i = 0; i < 100; i++) {
        pulled++;
        yield `line ${i}\n`;
      }
    }
    const scanner = new LineScanner(logOf(Readable.from(chunks(), { highWaterMark: 1 })));

    expect(await scanner.scan()).toBe(true);
    expect(scanner.text()).toBe('line 0');
    await scanner.close();
    expect(pulled).toBeLessThan(10);
  });

  it('closes the underlying stream exactly once', async () => {
    const log = logOf(Readable.from(['a\n']));
    const scanner = new LineScanner(log);
    await scanner.close();
    await scanner.close();

    expect(log.closes).toBe(1);
    expect(await scanner.scan()).toBe(false);
  });

  it('passes read errors to the caller', async () => {
    function* failing(): Generator<string> {
      yield 'ok\n';
      throw new Error('stream reset');
    }
    const scanner = new LineScanner(logOf(Readable.from(failing())));

    await expect(readAll(scanner)).rejects.toThrow('stream reset');
    await scanner.close();
  });

  it('times out when the stream goes quiet', async () => {
    const stream = new PassThrough();
    const log = logOf(stream);
    const scanner = new LineScanner(log, { idleTimeoutMs: 15 });
    stream.write('one\n');

    expect(await scanner.scan()).toBe(true);
    expect(scanner.text()).toBe('one');
    await expect(scanner.scan()).rejects.toBeInstanceOf(LogReadTimeoutError);
    await scanner.close();
    expect(log.closes).toBe(1);
  });
});
