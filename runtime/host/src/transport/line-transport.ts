/**
 * Line-delimited JSON over process pipes
 */

import type { Logger } from 'pino';
import { MalformedOutputError } from '../errors.js';
import { LineFramer } from './line-framer.js';

export interface ReadJsonLinesOptions {
  logger?: Logger;
  /** Consecutive malformed lines tolerated before giving up; 0 = unbounded */
  maxConsecutiveMalformedLines?: number;
}

function parseLine(line: string): { ok: true; value: unknown } | { ok: false; error: unknown } {
  try {
    return { ok: true, value: JSON.parse(line) };
  } catch (error) {
    return { ok: false, error };
  }
}

/**
 * Yield each JSON value written to the stream, in order.
 *
 * Lines that are not valid JSON are logged at debug and skipped. With a
 * malformed-line limit set, exceeding it throws `MalformedOutputError`.
 */
export async function* readJsonLines(
  stream: ReadableStream<string>,
  options: ReadJsonLinesOptions = {}
): AsyncGenerator<unknown, void, undefined> {
  const framer = new LineFramer();
  const reader = stream.getReader();
  const limit = options.maxConsecutiveMalformedLines ?? 0;
  let malformed = 0;

  function* handle(lines: string[]): Generator<unknown, void, undefined> {
    for (const line of lines) {
      const parsed = parseLine(line);
      if (parsed.ok) {
        malformed = 0;
        yield parsed.value;
        continue;
      }
      malformed++;
      options.logger?.debug({ line: line.slice(0, 200), error: String(parsed.error) }, 'Skipping malformed line');
      if (limit > 0 && malformed > limit) {
        throw new MalformedOutputError(malformed);
      }
    }
  }

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      yield* handle(framer.push(value));
    }
    const rest = framer.flush();
    if (rest) yield* handle([rest]);
  } finally {
    reader.releaseLock();
  }
}

/**
 * Encode one value as a single line
 */
export function encodeLine(value: unknown): string {
  return `${JSON.stringify(value)}\n`;
}
