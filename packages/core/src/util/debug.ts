/**
 * Debug tracing. Lines go to stderr by default so they never mix with a test
 * runner's stdout reporting; callers can plug in their own sink.
 */

export type TraceSink = (line: string) => void;

export const TRACE_PREFIX = '[objfuzz]';

export function formatTrace(message: string): string {
  return `${TRACE_PREFIX} ${message}`;
}

export function createStderrTrace(): TraceSink {
  return (line) => {
    process.stderr.write(`${line}\n`);
  };
}
