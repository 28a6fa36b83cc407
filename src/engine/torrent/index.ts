/**
 * Torrent metainfo parsing
 *
 * @module engine/torrent
 */

export {
  PIECE_HASH_LENGTH,
  parseMetainfo,
  parseTorrentFile,
  pieceCount,
  pieceHash,
  pieceSize,
} from './parser.js';
export type { TorrentDescriptor, TorrentFileInfo } from './parser.js';
