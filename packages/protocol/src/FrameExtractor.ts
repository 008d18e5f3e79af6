/**
 * @fileoverview Incremental JSON object framing for TCP streams.
 *
 * Simulator messages carry no length prefix or delimiter. A single read may hold
 * part of an object, exactly one object, or several concatenated ones, so
 * objects are located by brace matching that ignores braces inside strings.
 */

import { StringDecoder } from 'node:string_decoder';
import { FrameDecodeError } from './errors.js';

/**
 * Outcome of one extraction attempt.
 *
 * Only `frame` consumes input: everything before `end` is done with. Every
 * other kind consumes nothing and leaves the caller's buffer as it was.
 */
export type ExtractResult =
  | { readonly kind: 'frame'; readonly value: unknown; readonly start: number; readonly end: number }
  /** An object starts at `start` but its closing brace has not arrived */
  | { readonly kind: 'incomplete'; readonly start: number }
  /** No `{` in the buffer */
  | { readonly kind: 'empty' }
  /** Braces balance from `start` to `end` but the span is not JSON */
  | {
      readonly kind: 'malformed';
      readonly start: number;
      readonly end: number;
      readonly error: FrameDecodeError;
    };

/**
 * Extract the first complete JSON object from `buffer`.
 * Leading bytes before the first `{` are skipped.
 */
export function extractFrame(buffer: string): ExtractResult {
  const start = buffer.indexOf('{');
  if (start === -1) {
    return { kind: 'empty' };
  }

  let depth = 1;
  let inString = false;
  let escaped = false;

  for (let i = start + 1; i < buffer.length; i++) {
    if (escaped) {
      escaped = false;
      continue;
    }

    const char = buffer[i];
    if (char === '\\') {
      escaped = true;
      continue;
    }
    if (char === '"') {
      inString = !inString;
      continue;
    }
    if (inString) continue;

    if (char === '{') {
      depth++;
    } else if (char === '}') {
      depth--;
      if (depth === 0) {
        const end = i + 1;
        const span = buffer.slice(start, end);
        try {
          const value: unknown = JSON.parse(span);
          return { kind: 'frame', value, start, end };
        } catch (error) {
          return { kind: 'malformed', start, end, error: new FrameDecodeError(span, { cause: error }) };
        }
      }
    }
  }

  return { kind: 'incomplete', start };
}

/**
 * Recover from a malformed frame that starts at `start`.
 * Drops everything before the next `{` after `start`, or everything if there is none.
 */
export function skipMalformedFrame(buffer: string, start: number): string {
  const next = buffer.indexOf('{', start + 1);
  return next === -1 ? '' : buffer.slice(next);
}

/**
 * Objects pulled out of a stream by one {@link StreamBuffer.drain} call.
 */
export interface DrainResult {
  /** Decoded objects in arrival order */
  readonly frames: unknown[];
  /** Malformed frames skipped during this drain */
  readonly malformed: number;
}

/**
 * Accumulated inbound data of one connection.
 *
 * Bytes are decoded as UTF-8 incrementally, so a character split across two
 * reads is held back until its remaining bytes arrive.
 */
export class StreamBuffer {
  private readonly decoder = new StringDecoder('utf8');
  private text = '';

  append(chunk: Buffer | string): void {
    this.text += typeof chunk === 'string' ? chunk : this.decoder.write(chunk);
  }

  /**
   * Extract every complete object currently buffered.
   * Stops at the first incomplete object; its bytes stay buffered for the next read.
   */
  drain(): DrainResult {
    const frames: unknown[] = [];
    let malformed = 0;

    for (;;) {
      const result = extractFrame(this.text);
      if (result.kind === 'frame') {
        frames.push(result.value);
        this.text = this.text.slice(result.end);
      } else if (result.kind === 'malformed') {
        malformed++;
        this.text = skipMalformedFrame(this.text, result.start);
      } else {
        return { frames, malformed };
      }
    }
  }

  /** Text received but not yet consumed */
  get pending(): string {
    return this.text;
  }

  /**
   * Release buffered data. A partial object still pending is discarded.
   */
  clear(): void {
    this.text = '';
    this.decoder.end();
  }
}
