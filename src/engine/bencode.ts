/**
 * Bencode Encoder/Decoder
 *
 * Implements the bencode format used by torrent files and peer metadata.
 * Decoding is a single forward scan over the input and is strict: any input
 * that is not the unique canonical encoding of its value is rejected.
 *
 * Byte strings are decoded as views into the input buffer (no copy). The
 * input buffer must therefore outlive every value decoded from it, and must
 * not be mutated while those values are in use.
 *
 * Format:
 * - Integers: i<number>e (e.g., i42e, i-42e)
 * - Byte strings: <length>:<string> (e.g., 4:spam)
 * - Lists: l<items>e (e.g., l4:spami42ee)
 * - Dictionaries: d<key><value>...e (keys are byte strings, ascending)
 *
 * @module engine/bencode
 */

import { MalformedEncodingError } from './types.js';

// =============================================================================
// Types
// =============================================================================

export interface BencodeInteger {
  type: 'integer';
  value: bigint;
}

/**
 * A byte string. `value` is a view into the decoded buffer, not a copy.
 */
export interface BencodeBytes {
  type: 'bytes';
  value: Buffer;
}

export interface BencodeList {
  type: 'list';
  items: BencodeValue[];
}

export interface BencodeEntry {
  key: Buffer;
  value: BencodeValue;
}

/**
 * A dictionary. Entries keep the order in which they were decoded, which for
 * well-formed input is ascending by raw key bytes.
 */
export interface BencodeDictionary {
  type: 'dictionary';
  entries: BencodeEntry[];
}

export type BencodeValue = BencodeInteger | BencodeBytes | BencodeList | BencodeDictionary;

export interface DecodeResult {
  value: BencodeValue;
  /** Number of input bytes the value occupied */
  bytesConsumed: number;
}

// =============================================================================
// Constants
// =============================================================================

const CHAR_D = 0x64; // 'd'
const CHAR_E = 0x65; // 'e'
const CHAR_I = 0x69; // 'i'
const CHAR_L = 0x6c; // 'l'
const CHAR_COLON = 0x3a; // ':'
const CHAR_MINUS = 0x2d; // '-'
const CHAR_0 = 0x30; // '0'
const CHAR_9 = 0x39; // '9'

/** Maximum nesting of lists and dictionaries accepted by the decoder */
export const MAX_NESTING_DEPTH = 512;

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

/** Byte string lengths are limited to what a Buffer offset can address */
const MAX_LENGTH_DIGITS = 15;

const textDecoder = new TextDecoder('utf-8', { fatal: true });

// =============================================================================
// Construction Helpers
// =============================================================================

export function integer(value: number | bigint): BencodeInteger {
  return { type: 'integer', value: BigInt(value) };
}

/**
 * Create a byte string value. Strings are encoded as UTF-8.
 */
export function bytes(value: string | Buffer): BencodeBytes {
  return { type: 'bytes', value: typeof value === 'string' ? Buffer.from(value) : value };
}

export function list(...items: BencodeValue[]): BencodeList {
  return { type: 'list', items };
}

/**
 * Create a dictionary from a record. Entries are stored in the record's
 * iteration order; `encode` sorts them.
 */
export function dictionary(fields: Record<string, BencodeValue>): BencodeDictionary {
  return {
    type: 'dictionary',
    entries: Object.entries(fields).map(([key, value]) => ({ key: Buffer.from(key), value })),
  };
}

// =============================================================================
// Access Helpers
// =============================================================================

/**
 * Look up a dictionary entry by key.
 */
export function dictGet(dict: BencodeDictionary, key: string | Buffer): BencodeValue | undefined {
  const needle = typeof key === 'string' ? Buffer.from(key) : key;
  for (const entry of dict.entries) {
    if (entry.key.equals(needle)) {
      return entry.value;
    }
  }
  return undefined;
}

/**
 * Interpret a byte string as UTF-8 text.
 *
 * @throws {TypeError} If the bytes are not valid UTF-8
 */
export function toText(value: BencodeBytes | Buffer): string {
  const raw = Buffer.isBuffer(value) ? value : value.value;
  return textDecoder.decode(raw);
}

// =============================================================================
// Decoding
// =============================================================================

interface ParseState {
  buffer: Buffer;
  offset: number;
  depth: number;
}

function fail(state: ParseState, message: string): never {
  throw new MalformedEncodingError(`${message} at position ${state.offset}`, state.offset);
}

function peek(state: ParseState): number {
  if (state.offset >= state.buffer.length) {
    fail(state, 'Unexpected end of data');
  }
  return state.buffer[state.offset];
}

function isDigit(byte: number): boolean {
  return byte >= CHAR_0 && byte <= CHAR_9;
}

/**
 * Read a run of ASCII digits ending at `terminator`. Returns the digits as a
 * string and leaves the offset after the terminator.
 */
function readDigits(state: ParseState, terminator: number, what: string): string {
  const start = state.offset;
  while (state.offset < state.buffer.length && isDigit(state.buffer[state.offset])) {
    state.offset++;
  }
  const digits = state.buffer.toString('latin1', start, state.offset);
  const next = peek(state);
  if (next !== terminator) {
    fail(state, `Invalid character in ${what}`);
  }
  if (digits.length === 0) {
    fail(state, `Empty ${what}`);
  }
  if (digits.length > 1 && digits.charCodeAt(0) === CHAR_0) {
    state.offset = start;
    fail(state, `Leading zeros not allowed in ${what}`);
  }
  state.offset++;
  return digits;
}

function parseInteger(state: ParseState): BencodeInteger {
  state.offset++; // skip 'i'

  let negative = false;
  if (peek(state) === CHAR_MINUS) {
    negative = true;
    state.offset++;
  }

  const digits = readDigits(state, CHAR_E, 'integer');
  if (negative && digits === '0') {
    fail(state, 'Negative zero not allowed');
  }

  const magnitude = BigInt(digits);
  const value = negative ? -magnitude : magnitude;
  if (value < INT64_MIN || value > INT64_MAX) {
    fail(state, 'Integer out of 64-bit range');
  }
  return { type: 'integer', value };
}

function parseByteString(state: ParseState): BencodeBytes {
  const digits = readDigits(state, CHAR_COLON, 'string length');
  if (digits.length > MAX_LENGTH_DIGITS) {
    fail(state, 'String length too large');
  }

  const length = Number(digits);
  const end = state.offset + length;
  if (end > state.buffer.length) {
    fail(state, `String length ${length} exceeds available data`);
  }

  const value = state.buffer.subarray(state.offset, end);
  state.offset = end;
  return { type: 'bytes', value };
}

function enter(state: ParseState): void {
  state.depth++;
  if (state.depth > MAX_NESTING_DEPTH) {
    fail(state, 'Nesting too deep');
  }
  state.offset++; // skip 'l' or 'd'
}

function parseList(state: ParseState): BencodeList {
  enter(state);
  const items: BencodeValue[] = [];

  while (peek(state) !== CHAR_E) {
    items.push(parseValue(state));
  }

  state.offset++; // skip 'e'
  state.depth--;
  return { type: 'list', items };
}

function parseDictionary(state: ParseState): BencodeDictionary {
  enter(state);
  const entries: BencodeEntry[] = [];
  let previousKey: Buffer | null = null;

  while (peek(state) !== CHAR_E) {
    const keyStart = state.offset;
    if (!isDigit(peek(state))) {
      fail(state, 'Dictionary key must be a byte string');
    }
    const key = parseByteString(state).value;

    if (previousKey !== null) {
      const order = Buffer.compare(previousKey, key);
      if (order === 0) {
        state.offset = keyStart;
        fail(state, 'Duplicate dictionary key');
      }
      if (order > 0) {
        state.offset = keyStart;
        fail(state, 'Dictionary keys must be sorted');
      }
    }
    previousKey = key;

    if (peek(state) === CHAR_E) {
      fail(state, 'Dictionary key without value');
    }
    entries.push({ key, value: parseValue(state) });
  }

  state.offset++; // skip 'e'
  state.depth--;
  return { type: 'dictionary', entries };
}

function parseValue(state: ParseState): BencodeValue {
  const byte = peek(state);

  if (byte === CHAR_I) {
    return parseInteger(state);
  }
  if (byte === CHAR_L) {
    return parseList(state);
  }
  if (byte === CHAR_D) {
    return parseDictionary(state);
  }
  if (isDigit(byte)) {
    return parseByteString(state);
  }

  return fail(state, `Unexpected character '${String.fromCharCode(byte)}'`);
}

/**
 * Decode the bencoded value at the start of `data`.
 *
 * Bytes after the value are left untouched and reported through
 * `bytesConsumed`.
 *
 * @throws {MalformedEncodingError} If the input is not canonical bencode
 *
 * @example
 * ```typescript
 * const { value, bytesConsumed } = decode(Buffer.from('i42e'));
 * // value: { type: 'integer', value: 42n }, bytesConsumed: 4
 * ```
 */
export function decode(data: Buffer): DecodeResult {
  const state: ParseState = { buffer: data, offset: 0, depth: 0 };
  const value = parseValue(state);
  return { value, bytesConsumed: state.offset };
}

/**
 * Decode a buffer that must contain exactly one bencoded value.
 *
 * @throws {MalformedEncodingError} If the input is malformed or has trailing data
 */
export function decodeAll(data: Buffer): BencodeValue {
  const { value, bytesConsumed } = decode(data);
  if (bytesConsumed !== data.length) {
    throw new MalformedEncodingError(
      `Unexpected data after value at position ${bytesConsumed}`,
      bytesConsumed
    );
  }
  return value;
}

// =============================================================================
// Encoding
// =============================================================================

function encodeInto(value: BencodeValue, chunks: Buffer[]): void {
  switch (value.type) {
    case 'integer':
      if (value.value < INT64_MIN || value.value > INT64_MAX) {
        throw new RangeError(`Cannot encode integer outside 64-bit range: ${value.value}`);
      }
      chunks.push(Buffer.from(`i${value.value}e`, 'latin1'));
      return;

    case 'bytes':
      chunks.push(Buffer.from(`${value.value.length}:`, 'latin1'), value.value);
      return;

    case 'list':
      chunks.push(Buffer.from('l', 'latin1'));
      for (const item of value.items) {
        encodeInto(item, chunks);
      }
      chunks.push(Buffer.from('e', 'latin1'));
      return;

    case 'dictionary': {
      const sorted = [...value.entries].sort((a, b) => Buffer.compare(a.key, b.key));
      chunks.push(Buffer.from('d', 'latin1'));
      for (let i = 0; i < sorted.length; i++) {
        if (i > 0 && sorted[i - 1].key.equals(sorted[i].key)) {
          throw new RangeError(`Cannot encode duplicate dictionary key '${sorted[i].key.toString('latin1')}'`);
        }
        chunks.push(Buffer.from(`${sorted[i].key.length}:`, 'latin1'), sorted[i].key);
        encodeInto(sorted[i].value, chunks);
      }
      chunks.push(Buffer.from('e', 'latin1'));
      return;
    }
  }
}

/**
 * Encode a value to its canonical bencoded form.
 *
 * Dictionary keys are always written in ascending byte order, so two
 * structurally equal values encode identically.
 *
 * @throws {RangeError} For duplicate dictionary keys or out-of-range integers
 */
export function encode(value: BencodeValue): Buffer {
  const chunks: Buffer[] = [];
  encodeInto(value, chunks);
  return Buffer.concat(chunks);
}
