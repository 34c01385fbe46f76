// ═══════════════════════════════════════════════════════════════════════════════
// SINK — Line-Oriented Output
// ═══════════════════════════════════════════════════════════════════════════════
//
// Stream errors arrive asynchronously, after `write()` has already returned.
// The sink keeps an `error` listener for its whole life and fails the next
// write, a pending `drain` wait, or `close()` with the recorded error.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { Writable } from 'node:stream';
import { finished } from 'node:stream/promises';

export interface Sink {
  /** Write one line; a newline is appended */
  writeLine(line: string): Promise<void>;

  /** Flush, and end the destination when the sink owns it */
  close(): Promise<void>;
}

export interface StreamSinkOptions {
  /** End the stream on close (files yes, stdout no) */
  readonly end: boolean;
}

export class SinkClosedError extends Error {
  readonly name = 'SinkClosedError';

  constructor() {
    super('Output stream closed before all lines were written');
  }
}

/**
 * Sink over a writable stream. Waits for `drain` when the stream buffer is full.
 */
export function createStreamSink(stream: Writable, options: StreamSinkOptions): Sink {
  let failure: Error | null = null;

  stream.on('error', (error: Error) => {
    failure ??= error;
  });

  const assertWritable = (): void => {
    const error = failure ?? stream.errored;
    if (error) {
      throw error;
    }
    if (stream.destroyed || stream.writableEnded) {
      throw new SinkClosedError();
    }
  };

  const drain = (): Promise<void> =>
    new Promise((resolve, reject) => {
      const cleanup = (): void => {
        stream.off('drain', onDrain);
        stream.off('error', onError);
        stream.off('close', onClose);
      };
      const onDrain = (): void => {
        cleanup();
        resolve();
      };
      const onError = (error: Error): void => {
        cleanup();
        reject(error);
      };
      const onClose = (): void => {
        cleanup();
        reject(failure ?? stream.errored ?? new SinkClosedError());
      };

      stream.on('drain', onDrain);
      stream.on('error', onError);
      stream.on('close', onClose);
    });

  return {
    async writeLine(line: string): Promise<void> {
      assertWritable();
      if (!stream.write(line + '\n')) {
        assertWritable();
        await drain();
      }
    },

    async close(): Promise<void> {
      const error = failure ?? stream.errored;
      if (error) {
        throw error;
      }
      if (!options.end) {
        return;
      }
      stream.end();
      await finished(stream);
    },
  };
}
