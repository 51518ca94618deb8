/**
 * Candidate ingestion: newline-delimited text into a list of lines.
 */

import { PickerError } from '../utils/PickerError';

/**
 * Anything candidates can be read from; `isTTY` is set on terminal stdin.
 */
export type CandidateSource = NodeJS.ReadableStream & { isTTY?: boolean };

const utf8 = new TextDecoder('utf-8', { fatal: true });

const LINE_TERMINATOR = /\r\n|[\n\r\u2028\u2029\u0085\v\f]/;

/**
 * Splits text into lines and drops empty ones. Whitespace-only lines stay.
 *
 * @example
 * parseLines('alpha\r\nbeta\n\ngamma\n') // ['alpha', 'beta', 'gamma']
 */
export function parseLines(text: string): string[] {
  return text.split(LINE_TERMINATOR).filter((line) => line.length > 0);
}

/**
 * Reads the whole stream as UTF-8 and returns its non-empty lines.
 *
 * @throws PickerError when the source is a terminal, is not valid UTF-8 or
 * carries no lines
 */
export async function readCandidates(source: CandidateSource): Promise<string[]> {
  if (source.isTTY) {
    throw PickerError.noInput();
  }

  const chunks: Buffer[] = [];
  for await (const chunk of source) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk);
  }

  let text: string;
  try {
    text = utf8.decode(Buffer.concat(chunks));
  } catch (error) {
    if (error instanceof TypeError) {
      throw PickerError.noInput();
    }
    throw error;
  }

  const lines = parseLines(text);
  if (lines.length === 0) {
    throw PickerError.noInput();
  }

  return lines;
}
