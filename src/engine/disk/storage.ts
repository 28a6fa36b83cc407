/**
 * Storage adapters.
 *
 * The piece manager hands each verified piece to a `Storage` at its absolute
 * payload offset. `FileStorage` maps that offset onto the torrent's files;
 * `MemoryStorage` keeps the payload in a single buffer.
 *
 * @module engine/disk/storage
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import type { TorrentDescriptor, TorrentFileInfo } from '../torrent/parser.js';
import type { Storage } from '../types.js';

// =============================================================================
// Memory Storage
// =============================================================================

/**
 * Storage backed by a fixed-size buffer.
 */
export class MemoryStorage implements Storage {
  private readonly data: Buffer;
  private writeCount = 0;

  constructor(totalLength: number) {
    this.data = Buffer.alloc(totalLength);
  }

  /** Number of completed writes */
  get writes(): number {
    return this.writeCount;
  }

  async write(offset: number, data: Buffer): Promise<void> {
    checkRange(offset, data.length, this.data.length);
    data.copy(this.data, offset);
    this.writeCount++;
  }

  async read(offset: number, length: number): Promise<Buffer> {
    checkRange(offset, length, this.data.length);
    return Buffer.from(this.data.subarray(offset, offset + length));
  }

  /**
   * Copy of the whole payload.
   */
  contents(): Buffer {
    return Buffer.from(this.data);
  }
}

// =============================================================================
// File Storage
// =============================================================================

/**
 * Portion of a payload range that falls within one file.
 */
interface FileSegment {
  file: TorrentFileInfo;

  /** Offset within the file */
  fileOffset: number;

  /** Offset within the caller's buffer */
  bufferOffset: number;
  length: number;
}

export interface FileStorageOptions {
  descriptor: TorrentDescriptor;

  /** Directory the torrent's files are created under */
  downloadPath: string;
}

/**
 * Storage that writes the payload into the torrent's files on disk.
 * Files and their directories are created on first access.
 *
 * @example
 * ```typescript
 * const storage = new FileStorage({ descriptor, downloadPath: './downloads' });
 * try {
 *   await coordinator.run();
 * } finally {
 *   await storage.close();
 * }
 * ```
 */
export class FileStorage implements Storage {
  private readonly files: readonly TorrentFileInfo[];
  private readonly totalLength: number;
  private readonly downloadPath: string;
  private readonly handles = new Map<string, Promise<fs.FileHandle>>();

  constructor(options: FileStorageOptions) {
    this.files = options.descriptor.files;
    this.totalLength = options.descriptor.totalLength;
    this.downloadPath = options.downloadPath;
  }

  async write(offset: number, data: Buffer): Promise<void> {
    checkRange(offset, data.length, this.totalLength);
    for (const segment of this.segmentsFor(offset, data.length)) {
      const handle = await this.openFile(segment.file);
      await handle.write(data, segment.bufferOffset, segment.length, segment.fileOffset);
    }
  }

  /**
   * Read a payload range. Bytes never written read as zeros.
   */
  async read(offset: number, length: number): Promise<Buffer> {
    checkRange(offset, length, this.totalLength);
    const buffer = Buffer.alloc(length);
    for (const segment of this.segmentsFor(offset, length)) {
      const handle = await this.openFile(segment.file);
      await handle.read(buffer, segment.bufferOffset, segment.length, segment.fileOffset);
    }
    return buffer;
  }

  /**
   * Close every open file handle.
   */
  async close(): Promise<void> {
    const pending = [...this.handles.values()];
    this.handles.clear();
    const handles = await Promise.all(pending);
    await Promise.all(handles.map((handle) => handle.close()));
  }

  /**
   * Absolute path of a file within the download directory.
   *
   * @throws {RangeError} If the file's path resolves outside the download directory
   */
  filePath(file: TorrentFileInfo): string {
    const root = path.resolve(this.downloadPath);
    const resolved = path.resolve(root, ...file.relativePath.split('/'));
    const relative = path.relative(root, resolved);
    if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
      throw new RangeError(`File path '${file.relativePath}' escapes the download directory`);
    }
    return resolved;
  }

  private segmentsFor(offset: number, length: number): FileSegment[] {
    const end = offset + length;
    const segments: FileSegment[] = [];

    for (const file of this.files) {
      const fileEnd = file.offset + file.length;
      if (fileEnd <= offset || file.offset >= end || file.length === 0) {
        continue;
      }
      const start = Math.max(offset, file.offset);
      const stop = Math.min(end, fileEnd);
      segments.push({
        file,
        fileOffset: start - file.offset,
        bufferOffset: start - offset,
        length: stop - start,
      });
    }
    return segments;
  }

  private openFile(file: TorrentFileInfo): Promise<fs.FileHandle> {
    const filePath = this.filePath(file);
    let handle = this.handles.get(filePath);
    if (!handle) {
      handle = openOrCreate(filePath);
      this.handles.set(filePath, handle);
      // A failed open is retried on the next access
      handle.catch(() => this.handles.delete(filePath));
    }
    return handle;
  }
}

// =============================================================================
// Helpers
// =============================================================================

function checkRange(offset: number, length: number, size: number): void {
  if (!Number.isInteger(offset) || !Number.isInteger(length) || offset < 0 || length < 0 || offset + length > size) {
    throw new RangeError(`Range ${offset}+${length} is outside the payload of ${size} bytes`);
  }
}

async function openOrCreate(filePath: string): Promise<fs.FileHandle> {
  try {
    return await fs.open(filePath, 'r+');
  } catch (err) {
    if (!(err instanceof Error && 'code' in err && err.code === 'ENOENT')) {
      throw err;
    }
  }
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  return fs.open(filePath, 'w+');
}
