// ═══════════════════════════════════════════════════════════════════════════════
// CLI RUN TESTS — End-to-End over Injected Streams
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import { mkdtemp, readFile, rm, stat, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { PassThrough, Readable, Writable } from 'node:stream';

import type { SieveConfig } from '../../config/index.js';
import { resetLogger } from '../../observability/logging/index.js';
import { err, ok } from '../../types/result.js';
import { SieveErrorCode, sieveError, type AsyncSieveResult } from '../../types/errors.js';
import { openInput } from '../io.js';
import { USAGE } from '../options.js';
import { ExitCode, run, type RunIO } from '../run.js';

// ─────────────────────────────────────────────────────────────────────────────────
// HELPERS
// ─────────────────────────────────────────────────────────────────────────────────

let dir: string;

function createCollector(): { stream: Writable; text: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString('utf8'));
      callback();
    },
  });
  return { stream, text: () => chunks.join('') };
}

interface Harness {
  io: RunIO;
  stdout: () => string;
  stderr: () => string;
  acquire: Mock<[], AsyncSieveResult<string[]>>;
}

function createHarness(input: string, acquired: string[] = ['203.0.113.0/24']): Harness {
  const stdout = createCollector();
  const stderrChunks: string[] = [];
  const config: SieveConfig = {
    cache: { path: path.join(dir, 'ranges.cache') },
    fetch: { timeoutMs: 1000, retries: 0, userAgent: 'cdn-sieve-test' },
    pipeline: { queueFactor: 1 },
    logging: { level: 'warn', pretty: false },
  };
  const acquire = vi.fn<[], AsyncSieveResult<string[]>>(async () => ok(acquired));

  return {
    io: {
      stdin: Readable.from([input]),
      stdout: stdout.stream,
      stderr: {
        write: (chunk: string) => {
          stderrChunks.push(chunk);
          return true;
        },
      },
      config,
      acquire,
    },
    stdout: stdout.text,
    stderr: () => stderrChunks.join(''),
    acquire,
  };
}

function sortedLines(text: string): string[] {
  return text.split('\n').filter(line => line !== '').sort();
}

beforeEach(async () => {
  dir = await mkdtemp(path.join(os.tmpdir(), 'cdn-sieve-cli-'));
});

afterEach(async () => {
  resetLogger();
  await rm(dir, { recursive: true, force: true });
});

// ─────────────────────────────────────────────────────────────────────────────────
// SUCCESSFUL RUNS
// ─────────────────────────────────────────────────────────────────────────────────

describe('run', () => {
  it('should print addresses outside the CDN ranges', async () => {
    const harness = createHarness('198.51.100.1\n203.0.113.5\n192.168.0.0/31\nexample.com\n');

    const code = await run(['-t', '4'], harness.io);

    expect(code).toBe(ExitCode.SUCCESS);
    expect(sortedLines(harness.stdout())).toEqual(['192.168.0.0', '192.168.0.1', '198.51.100.1']);
  });

  it('should print raw lines with -r', async () => {
    const harness = createHarness('192.168.0.0/31\nhttp://198.51.100.1/\n');

    await run(['-r'], harness.io);

    expect(harness.stdout()).toBe('192.168.0.0/31\n192.168.0.0/31\nhttp://198.51.100.1/\n');
  });

  it('should write to an output file', async () => {
    const harness = createHarness('198.51.100.1\n203.0.113.5\n');
    const output = path.join(dir, 'out.txt');

    const code = await run(['-o', output], harness.io);

    expect(code).toBe(ExitCode.SUCCESS);
    expect(await readFile(output, 'utf8')).toBe('198.51.100.1\n');
    expect(harness.stdout()).toBe('');
  });

  it('should read from an input file', async () => {
    const harness = createHarness('');
    const input = path.join(dir, 'in.txt');
    await writeFile(input, '198.51.100.7\r\n203.0.113.7\r\n');

    await run(['-i', input], harness.io);

    expect(harness.stdout()).toBe('198.51.100.7\n');
  });

  it('should fetch once and then use the cache', async () => {
    const first = createHarness('198.51.100.1\n');
    await run([], first.io);
    expect(first.acquire).toHaveBeenCalledTimes(1);
    expect(await readFile(path.join(dir, 'ranges.cache'), 'utf8')).toBe('203.0.113.0/24');

    const second = createHarness('198.51.100.1\n');
    await run([], second.io);
    expect(second.acquire).not.toHaveBeenCalled();
  });

  it('should refetch with -s', async () => {
    await writeFile(path.join(dir, 'ranges.cache'), '198.51.100.0/24');
    const harness = createHarness('198.51.100.1\n');

    await run(['-s'], harness.io);

    expect(harness.acquire).toHaveBeenCalledTimes(1);
    expect(harness.stdout()).toBe('198.51.100.1\n');
  });

  it('should print usage for -h', async () => {
    const harness = createHarness('');

    expect(await run(['-h'], harness.io)).toBe(ExitCode.SUCCESS);
    expect(harness.stdout()).toBe(USAGE);
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// FAILURES
// ─────────────────────────────────────────────────────────────────────────────────

describe('run failures', () => {
  it('should exit 2 with usage on invalid options', async () => {
    const harness = createHarness('198.51.100.1\n');

    const code = await run(['-t', '0'], harness.io);

    expect(code).toBe(ExitCode.USAGE);
    expect(harness.stderr()).toContain(USAGE);
    expect(harness.stdout()).toBe('');
    expect(harness.acquire).not.toHaveBeenCalled();
  });

  it('should exit 1 and write nothing when ranges cannot be acquired', async () => {
    const harness = createHarness('198.51.100.1\n');
    harness.acquire.mockResolvedValue(
      err(sieveError(SieveErrorCode.RANGE_ACQUISITION_FAILED, 'acquireRanges', 'fastly: HTTP 503'))
    );
    const output = path.join(dir, 'out.txt');

    const code = await run(['-o', output], harness.io);

    expect(code).toBe(ExitCode.FATAL);
    expect(harness.stderr()).toContain('[ACQUIRERANGES] fastly: HTTP 503');
    await expect(stat(output)).rejects.toThrow();
  });

  it('should exit 1 when the input file is missing', async () => {
    const harness = createHarness('');

    const code = await run(['-i', path.join(dir, 'absent.txt')], harness.io);

    expect(code).toBe(ExitCode.FATAL);
    expect(harness.stderr()).toContain('[OPENINPUT] Cannot open input');
    expect(harness.stdout()).toBe('');
  });

  it('should exit 1 when the output cannot be opened', async () => {
    const harness = createHarness('198.51.100.1\n');

    const code = await run(['-o', path.join(dir, 'missing-dir', 'out.txt')], harness.io);

    expect(code).toBe(ExitCode.FATAL);
    expect(harness.stderr()).toContain('[OPENOUTPUT] Cannot open output');
  });

  it('should leave an open stdin untouched when the output cannot be opened', async () => {
    const harness = createHarness('');
    const stdin = new PassThrough();
    stdin.write('198.51.100.1\n');

    const code = await run(['-o', path.join(dir, 'missing-dir', 'out.txt')], { ...harness.io, stdin });

    expect(code).toBe(ExitCode.FATAL);
    expect(stdin.listenerCount('data')).toBe(0);
    expect(stdin.readableFlowing).not.toBe(true);
  });

  it('should exit 1 when the output fails mid-run', async () => {
    const harness = createHarness('198.51.100.1\n198.51.100.2\n198.51.100.3\n');
    const stdout = new Writable({
      write(_chunk: Buffer, _encoding, callback) {
        callback(new Error('EPIPE: broken pipe'));
      },
    });

    const code = await run(['-t', '1'], { ...harness.io, stdout });

    expect(code).toBe(ExitCode.FATAL);
    expect(harness.stderr()).toContain('[RUNPIPELINE] EPIPE: broken pipe');
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// INPUT SOURCES
// ─────────────────────────────────────────────────────────────────────────────────

describe('openInput', () => {
  it('should not read stdin before the lines are pulled', async () => {
    const stdin = new PassThrough();

    const source = await openInput('-', stdin);

    expect(source.ok).toBe(true);
    expect(stdin.listenerCount('data')).toBe(0);
  });

  it('should detach from stdin once closed', async () => {
    const stdin = new PassThrough();
    const source = await openInput('-', stdin);
    if (!source.ok) throw new Error('stdin source should open');

    const lines = source.value.lines[Symbol.asyncIterator]();
    stdin.write('198.51.100.1\r\n');

    expect(await lines.next()).toEqual({ done: false, value: '198.51.100.1' });

    source.value.close();

    expect(stdin.listenerCount('data')).toBe(0);
    expect(await lines.next()).toEqual({ done: true, value: undefined });
  });
});
