/**
 * Container file codec.
 *
 * A container is one JSON array holding a whole collection. Decoding is
 * strict about the outer shape only; record contents are left to the
 * migrator.
 */

import { TextDecoder } from 'node:util';
import { isRawRecord, type RawRecord } from '../types.js';

/** Raised when container bytes are not a well-formed array of objects. */
export class CorruptContainerError extends Error {
  constructor(reason: string) {
    super(`Corrupt container: ${reason}`);
    this.name = 'CorruptContainerError';
  }
}

export const EMPTY_CONTAINER = '[]\n';

const utf8 = new TextDecoder('utf-8', { fatal: true });

/** Container text from raw file bytes. Invalid UTF-8 is corruption, not replaced. */
function decodeText(bytes: Uint8Array): string {
  try {
    return utf8.decode(bytes);
  } catch {
    throw new CorruptContainerError('invalid UTF-8');
  }
}

export function decodeContainer(input: string | Uint8Array): RawRecord[] {
  const text = typeof input === 'string' ? input : decodeText(input);
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new CorruptContainerError(error instanceof Error ? error.message : String(error));
  }

  if (!Array.isArray(data)) {
    throw new CorruptContainerError('top-level value is not an array');
  }

  const records: RawRecord[] = [];
  for (const [index, item] of data.entries()) {
    if (!isRawRecord(item)) {
      throw new CorruptContainerError(`element ${index} is not an object`);
    }
    records.push(item);
  }
  return records;
}

export function encodeContainer(records: readonly object[]): string {
  return JSON.stringify(records, null, 2) + '\n';
}
