/**
 * Log Sink
 * The append-only log file shared by the supervised service (stdout/stderr)
 * and the dashboard (audit lines, tail reads).
 *
 * Tail reads walk backwards from the end of the file in fixed-size chunks, so
 * a long-running service with a large log never costs a full-file read.
 */

import { open, appendFile, mkdir, writeFile } from 'fs/promises';
import type { FileHandle } from 'fs/promises';
import { dirname } from 'path';
import { logger } from '../utils/logger.js';
import { SerialQueue } from '../utils/serial-queue.js';
import { IOError, systemErrorCode } from './errors.js';

const NEWLINE = 0x0a;

export interface LogSinkOptions {
  chunkSize?: number;
  maxBytes?: number;  // cap on bytes read per tail
}

export type SinkWriter = (...lines: string[]) => Promise<void>;

export class LogSink {
  readonly path: string;
  private readonly chunkSize: number;
  private readonly maxBytes: number;
  private readonly writes = new SerialQueue();

  constructor(path: string, options?: LogSinkOptions) {
    this.path = path;
    this.chunkSize = options?.chunkSize ?? 64 * 1024;
    this.maxBytes = options?.maxBytes ?? 1024 * 1024;
  }

  /**
   * Last `maxLines` lines, oldest first, without line terminators.
   * Missing file or read failure yields [].
   */
  async tail(maxLines: number): Promise<string[]> {
    if (maxLines <= 0) return [];

    let handle: FileHandle;
    try {
      handle = await open(this.path, 'r');
    } catch (error) {
      if (systemErrorCode(error) !== 'ENOENT') {
        const ioError = new IOError('open', this.path, error);
        logger.warn(ioError.message, { code: ioError.code });
      }
      return [];
    }

    try {
      return await this.readTail(handle, maxLines);
    } catch (error) {
      const ioError = new IOError('read', this.path, error);
      logger.warn(ioError.message, { code: ioError.code });
      return [];
    } finally {
      await handle.close();
    }
  }

  private async readTail(handle: FileHandle, maxLines: number): Promise<string[]> {
    // Everything past this size was appended after the read began
    const { size } = await handle.stat();
    if (size === 0) return [];

    const chunks: Buffer[] = [];
    let position = size;
    let bytesTaken = 0;
    let newlines = 0;

    while (position > 0 && newlines <= maxLines && bytesTaken < this.maxBytes) {
      const readSize = Math.min(this.chunkSize, position, this.maxBytes - bytesTaken);
      position -= readSize;
      bytesTaken += readSize;

      const buffer = Buffer.alloc(readSize);
      const { bytesRead } = await handle.read(buffer, 0, readSize, position);
      const chunk = buffer.subarray(0, bytesRead);
      chunks.unshift(chunk);

      for (const byte of chunk) {
        if (byte === NEWLINE) newlines++;
      }
    }

    const text = Buffer.concat(chunks).toString('utf-8');
    const lines = text.split('\n');
    if (text.endsWith('\n')) lines.pop();
    // Did not reach the start of the file: the first piece may be a partial line
    if (position > 0) lines.shift();

    return lines.slice(-maxLines).map(line => line.endsWith('\r') ? line.slice(0, -1) : line);
  }

  /**
   * Append lines as one write, queued behind every other dashboard write.
   */
  append(...lines: string[]): Promise<void> {
    return this.writes.run(() => this.write(lines));
  }

  /**
   * Run `task` while holding the write lock. The writer it receives appends
   * without queueing again, so state changes and their audit lines land together.
   */
  exclusive<T>(task: (write: SinkWriter) => Promise<T>): Promise<T> {
    return this.writes.run(() => task((...lines) => this.write(lines)));
  }

  /**
   * Truncate the file and open it for the supervised process to write into.
   * The descriptor is in append mode: every child write lands at the current
   * end of file, after any audit lines written in between.
   * The caller owns the returned handle.
   */
  openForWriter(): Promise<FileHandle> {
    return this.writes.run(async () => {
      try {
        await mkdir(dirname(this.path), { recursive: true });
        await writeFile(this.path, '');
      } catch (error) {
        throw new IOError('truncate', this.path, error);
      }
      try {
        return await open(this.path, 'a');
      } catch (error) {
        throw new IOError('open', this.path, error);
      }
    });
  }

  private async write(lines: string[]): Promise<void> {
    if (lines.length === 0) return;
    try {
      await appendFile(this.path, lines.map(line => `${line}\n`).join(''), 'utf-8');
    } catch (error) {
      throw new IOError('append', this.path, error);
    }
  }
}
