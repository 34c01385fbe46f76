export { ExitCode, type RunIO, reportFatal, run } from './run.js';
export { type CliOptions, CliOptionsSchema, MAX_THREADS, USAGE, parseOptions } from './options.js';
export { STDIO, openInput, openOutput, type InputSource } from './io.js';
