// ═══════════════════════════════════════════════════════════════════════════════
// CLI I/O — Opening Input and Output Streams
// ═══════════════════════════════════════════════════════════════════════════════
//
// "-" selects stdin / stdout. Files are opened eagerly so a bad path fails
// before any work is dispatched.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { once } from 'node:events';
import { createReadStream, createWriteStream } from 'node:fs';
import { createInterface, type Interface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';

import { createStreamSink, type Sink } from '../pipeline/index.js';
import { mapErr, ok, tryCatchAsync } from '../types/result.js';
import { SieveErrorCode, sieveError, type AsyncSieveResult } from '../types/errors.js';

export const STDIO = '-';

/**
 * Input lines plus the handle that detaches them from their stream.
 */
export interface InputSource {
  readonly lines: AsyncIterable<string>;

  /** Stop reading; destroys the stream when the source owns it. Idempotent. */
  close(): void;
}

/**
 * CRLF-tolerant line reader over a stream. The reader attaches on the first
 * pull, so nothing consumes the stream before the pipeline starts.
 */
function createInputSource(stream: Readable, owned: boolean): InputSource {
  let reader: Interface | undefined;
  let closed = false;

  async function* read(): AsyncGenerator<string> {
    if (closed) return;
    reader = createInterface({ input: stream, crlfDelay: Infinity });
    yield* reader;
  }

  return {
    lines: read(),
    close(): void {
      if (closed) return;
      closed = true;
      reader?.close();
      if (owned) {
        stream.destroy();
      }
    },
  };
}

export async function openInput(target: string, stdin: Readable): AsyncSieveResult<InputSource> {
  if (target === STDIO) {
    return ok(createInputSource(stdin, false));
  }

  const opened = await tryCatchAsync(async () => {
    const stream = createReadStream(target);
    await once(stream, 'open');
    return createInputSource(stream, true);
  });

  return mapErr(opened, cause => sieveError(
    SieveErrorCode.INPUT_OPEN_FAILED,
    'openInput',
    `Cannot open input ${target}: ${cause.message}`,
    cause
  ));
}

export async function openOutput(target: string, stdout: Writable): AsyncSieveResult<Sink> {
  if (target === STDIO) {
    return ok(createStreamSink(stdout, { end: false }));
  }

  const opened = await tryCatchAsync(async () => {
    const stream = createWriteStream(target);
    await once(stream, 'open');
    return createStreamSink(stream, { end: true });
  });

  return mapErr(opened, cause => sieveError(
    SieveErrorCode.OUTPUT_OPEN_FAILED,
    'openOutput',
    `Cannot open output ${target}: ${cause.message}`,
    cause
  ));
}
