/**
 * Torrent Metainfo Parser
 *
 * Builds a typed descriptor from a decoded .torrent file:
 * - Single-file and multi-file layouts
 * - Piece hashes and piece length
 * - Info hash over the info dictionary exactly as it was received
 * - Optional tracker and descriptive fields
 *
 * @module engine/torrent/parser
 */

import { isUtf8 } from 'buffer';
import { createHash } from 'crypto';
import {
  decodeAll,
  dictGet,
  encode,
  toText,
  type BencodeDictionary,
  type BencodeList,
  type BencodeValue,
} from '../bencode.js';
import { InvalidMetainfoError, MalformedEncodingError } from '../types.js';

// =============================================================================
// Types
// =============================================================================

/** Size of one SHA-1 piece hash */
export const PIECE_HASH_LENGTH = 20;

/**
 * A file within a torrent
 */
export interface TorrentFileInfo {
  /** Path relative to the download root; multi-file torrents are rooted at the torrent name */
  readonly relativePath: string;

  /** Path components as listed in the metainfo */
  readonly pathParts: readonly string[];

  /** Size of the file in bytes */
  readonly length: number;

  /** Absolute byte offset within the concatenated torrent data */
  readonly offset: number;
}

/**
 * Parsed torrent metainfo. Immutable once parsed.
 */
export interface TorrentDescriptor {
  /** 20-byte SHA-1 hash of the bencoded info dictionary */
  readonly infoHash: Buffer;

  /** Name of the torrent (file or directory name) */
  readonly name: string;

  /** Size of each piece in bytes; the last piece may be shorter */
  readonly pieceLength: number;

  /** One 20-byte SHA-1 digest per piece */
  readonly pieceHashes: readonly Buffer[];

  /** Total size of all files in bytes */
  readonly totalLength: number;

  readonly files: readonly TorrentFileInfo[];

  /** Whether the torrent is marked private */
  readonly isPrivate: boolean;

  /** Primary tracker URL */
  readonly announce?: string;

  /** Multi-tracker announce list (BEP 12) */
  readonly announceList?: readonly (readonly string[])[];

  readonly comment?: string;
  readonly createdBy?: string;

  /** Unix timestamp in seconds */
  readonly creationDate?: number;
}

// =============================================================================
// Field Helpers
// =============================================================================

function asDictionary(value: BencodeValue | undefined, context: string): BencodeDictionary {
  if (value === undefined) {
    throw new InvalidMetainfoError(`Missing required ${context}`);
  }
  if (value.type !== 'dictionary') {
    throw new InvalidMetainfoError(`${context} must be a dictionary`);
  }
  return value;
}

function asList(value: BencodeValue | undefined, context: string): BencodeList {
  if (value === undefined) {
    throw new InvalidMetainfoError(`Missing required ${context}`);
  }
  if (value.type !== 'list') {
    throw new InvalidMetainfoError(`${context} must be a list`);
  }
  return value;
}

function getRequiredBytes(dict: BencodeDictionary, key: string, context: string): Buffer {
  const value = dictGet(dict, key);
  if (value === undefined) {
    throw new InvalidMetainfoError(`Missing required field '${key}' in ${context}`);
  }
  if (value.type !== 'bytes') {
    throw new InvalidMetainfoError(`Field '${key}' in ${context} must be a byte string`);
  }
  return value.value;
}

function getRequiredText(dict: BencodeDictionary, key: string, context: string): string {
  return decodeText(getRequiredBytes(dict, key, context), `'${key}' in ${context}`);
}

function getRequiredNumber(dict: BencodeDictionary, key: string, context: string): number {
  const value = dictGet(dict, key);
  if (value === undefined) {
    throw new InvalidMetainfoError(`Missing required field '${key}' in ${context}`);
  }
  return toSafeNumber(value, `'${key}' in ${context}`);
}

/**
 * Descriptive fields that are missing, mistyped or not UTF-8 read as absent.
 */
function getOptionalText(dict: BencodeDictionary, key: string): string | undefined {
  const value = dictGet(dict, key);
  if (value === undefined || value.type !== 'bytes') {
    return undefined;
  }
  return tryDecodeText(value.value);
}

function getOptionalNumber(dict: BencodeDictionary, key: string): number | undefined {
  const value = dictGet(dict, key);
  if (value === undefined || value.type !== 'integer') {
    return undefined;
  }
  const result = Number(value.value);
  return Number.isSafeInteger(result) ? result : undefined;
}

function toSafeNumber(value: BencodeValue, context: string): number {
  if (value.type !== 'integer') {
    throw new InvalidMetainfoError(`${context} must be an integer`);
  }
  const result = Number(value.value);
  if (!Number.isSafeInteger(result)) {
    throw new InvalidMetainfoError(`${context} is out of range: ${value.value}`);
  }
  return result;
}

function tryDecodeText(raw: Buffer): string | undefined {
  return isUtf8(raw) ? toText(raw) : undefined;
}

function decodeText(raw: Buffer, context: string): string {
  try {
    return toText(raw);
  } catch (err) {
    throw new InvalidMetainfoError(`${context} is not valid UTF-8`, { cause: err });
  }
}

function validatePathComponent(part: string, context: string): void {
  if (part === '' || part === '.' || part === '..' || part.includes('/') || part.includes('\\')) {
    throw new InvalidMetainfoError(`Invalid path component '${part}' in ${context}`);
  }
}

// =============================================================================
// Parsing
// =============================================================================

/**
 * Parse the announce-list (BEP 12). URLs that are not text and tiers left empty are skipped.
 */
function parseAnnounceList(value: BencodeValue | undefined): string[][] | undefined {
  if (value === undefined || value.type !== 'list') {
    return undefined;
  }

  const tiers: string[][] = [];
  for (const tier of value.items) {
    if (tier.type !== 'list') {
      continue;
    }
    const urls: string[] = [];
    for (const url of tier.items) {
      const text = url.type === 'bytes' ? tryDecodeText(url.value) : undefined;
      if (text !== undefined) {
        urls.push(text);
      }
    }
    if (urls.length > 0) {
      tiers.push(urls);
    }
  }

  return tiers.length > 0 ? tiers : undefined;
}

function parseMultiFileInfo(
  info: BencodeDictionary,
  name: string
): { files: TorrentFileInfo[]; totalLength: number } {
  const entries = asList(dictGet(info, 'files'), "'files' in info");
  const files: TorrentFileInfo[] = [];
  let totalLength = 0;

  entries.items.forEach((entry, i) => {
    const context = `files[${i}]`;
    const fileDict = asDictionary(entry, context);

    const length = getRequiredNumber(fileDict, 'length', context);
    if (length < 0) {
      throw new InvalidMetainfoError(`Invalid file length in ${context}: ${length}`);
    }

    const pathParts = asList(dictGet(fileDict, 'path'), `'path' in ${context}`).items.map((part) => {
      if (part.type !== 'bytes') {
        throw new InvalidMetainfoError(`Invalid path component in ${context}`);
      }
      const text = decodeText(part.value, `path component in ${context}`);
      validatePathComponent(text, context);
      return text;
    });

    if (pathParts.length === 0) {
      throw new InvalidMetainfoError(`Empty path in ${context}`);
    }

    files.push(
      Object.freeze({
        relativePath: [name, ...pathParts].join('/'),
        pathParts: Object.freeze(pathParts),
        length,
        offset: totalLength,
      })
    );
    totalLength += length;
  });

  if (files.length === 0) {
    throw new InvalidMetainfoError('Multi-file torrent has no files');
  }

  return { files, totalLength };
}

function parseSingleFileInfo(
  info: BencodeDictionary,
  name: string
): { files: TorrentFileInfo[]; totalLength: number } {
  const length = getRequiredNumber(info, 'length', 'info');
  if (length < 0) {
    throw new InvalidMetainfoError(`Invalid file length: ${length}`);
  }

  return {
    files: [Object.freeze({ relativePath: name, pathParts: Object.freeze([name]), length, offset: 0 })],
    totalLength: length,
  };
}

/**
 * Hash the info dictionary. Decoding only accepts canonical input, so the
 * re-encoded bytes are the bytes that were received.
 */
function calculateInfoHash(info: BencodeDictionary): Buffer {
  return createHash('sha1').update(encode(info)).digest();
}

function splitPieceHashes(pieces: Buffer): Buffer[] {
  const hashes: Buffer[] = [];
  for (let offset = 0; offset < pieces.length; offset += PIECE_HASH_LENGTH) {
    hashes.push(Buffer.from(pieces.subarray(offset, offset + PIECE_HASH_LENGTH)));
  }
  return hashes;
}

/**
 * Build a torrent descriptor from a decoded metainfo value.
 *
 * @throws {InvalidMetainfoError} If required fields are missing or inconsistent
 *
 * @example
 * ```typescript
 * const descriptor = parseMetainfo(decodeAll(fileBytes));
 * console.log(descriptor.infoHash.toString('hex'));
 * ```
 */
export function parseMetainfo(value: BencodeValue): TorrentDescriptor {
  const root = asDictionary(value, 'metainfo');
  const info = asDictionary(dictGet(root, 'info'), "'info' dictionary");

  const name = getRequiredText(info, 'name', 'info');
  validatePathComponent(name, 'info');

  const pieceLength = getRequiredNumber(info, 'piece length', 'info');
  if (pieceLength <= 0) {
    throw new InvalidMetainfoError(`Invalid piece length: ${pieceLength}`);
  }

  const pieces = getRequiredBytes(info, 'pieces', 'info');
  if (pieces.length === 0) {
    throw new InvalidMetainfoError("Empty 'pieces' field");
  }
  if (pieces.length % PIECE_HASH_LENGTH !== 0) {
    throw new InvalidMetainfoError(
      `Invalid 'pieces' length: ${pieces.length} (must be a multiple of ${PIECE_HASH_LENGTH})`
    );
  }

  const { files, totalLength } =
    dictGet(info, 'files') !== undefined ? parseMultiFileInfo(info, name) : parseSingleFileInfo(info, name);

  const pieceHashes = splitPieceHashes(pieces);
  const expectedPieceCount = Math.ceil(totalLength / pieceLength);
  if (pieceHashes.length !== expectedPieceCount) {
    throw new InvalidMetainfoError(
      `Piece count mismatch: got ${pieceHashes.length}, expected ${expectedPieceCount} for total length ${totalLength}`
    );
  }

  const announceList = parseAnnounceList(dictGet(root, 'announce-list'));

  return Object.freeze({
    infoHash: calculateInfoHash(info),
    name,
    pieceLength,
    pieceHashes: Object.freeze(pieceHashes),
    totalLength,
    files: Object.freeze(files),
    isPrivate: getOptionalNumber(info, 'private') === 1,
    announce: getOptionalText(root, 'announce') ?? announceList?.[0]?.[0],
    announceList,
    comment: getOptionalText(root, 'comment'),
    createdBy: getOptionalText(root, 'created by'),
    creationDate: getOptionalNumber(root, 'creation date'),
  });
}

/**
 * Decode and parse the contents of a .torrent file.
 *
 * @throws {InvalidMetainfoError} If the data is not valid bencode or not valid metainfo
 */
export function parseTorrentFile(data: Buffer): TorrentDescriptor {
  let decoded: BencodeValue;
  try {
    decoded = decodeAll(data);
  } catch (err) {
    if (err instanceof MalformedEncodingError) {
      throw new InvalidMetainfoError(`Failed to decode torrent file: ${err.message}`, { cause: err });
    }
    throw err;
  }
  return parseMetainfo(decoded);
}

// =============================================================================
// Piece Geometry
// =============================================================================

export function pieceCount(descriptor: TorrentDescriptor): number {
  return descriptor.pieceHashes.length;
}

/**
 * Length of a specific piece. All pieces have the standard piece length
 * except the last, which may be shorter.
 *
 * @throws {RangeError} If pieceIndex is out of range
 */
export function pieceSize(descriptor: TorrentDescriptor, pieceIndex: number): number {
  const count = pieceCount(descriptor);
  if (!Number.isInteger(pieceIndex) || pieceIndex < 0 || pieceIndex >= count) {
    throw new RangeError(`Invalid piece index: ${pieceIndex} (valid range: 0-${count - 1})`);
  }
  if (pieceIndex === count - 1) {
    const remainder = descriptor.totalLength % descriptor.pieceLength;
    return remainder === 0 ? descriptor.pieceLength : remainder;
  }
  return descriptor.pieceLength;
}

/**
 * @throws {RangeError} If pieceIndex is out of range
 */
export function pieceHash(descriptor: TorrentDescriptor, pieceIndex: number): Buffer {
  const hash = descriptor.pieceHashes[pieceIndex];
  if (hash === undefined) {
    throw new RangeError(`Invalid piece index: ${pieceIndex}`);
  }
  return hash;
}
