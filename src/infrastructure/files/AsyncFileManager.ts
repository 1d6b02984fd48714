import { createHash, randomUUID } from 'crypto';
import { createReadStream } from 'fs';
import { mkdir, readdir, rm, stat, writeFile } from 'fs/promises';
import path from 'path';
import { ValidationError } from '../../core/errors.js';
import { detectImageType } from '../../utils/imageValidation.js';
import { Logger, silentLogger } from '../../utils/logger.js';

export interface AsyncFileManagerOptions {
  uploadDir: string;
  chunkSize?: number;
  maxUploadBytes?: number;
  logger?: Logger;
}

export interface StoredUpload {
  fileId: string;
  fileName: string;
  path: string;
  size: number;
  contentType: string;
}

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[1-8][0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

/**
 * Non-blocking file access for job inputs and archived outputs.
 *
 * Uploads are stored under generated names; clients only ever hold the
 * file id, so no caller-supplied path reaches the filesystem.
 */
export class AsyncFileManager {
  private readonly uploadDir: string;
  private readonly chunkSize: number;
  private readonly maxUploadBytes: number;
  private readonly logger: Logger;

  constructor(options: AsyncFileManagerOptions) {
    this.uploadDir = path.resolve(options.uploadDir);
    this.chunkSize = options.chunkSize ?? 8192;
    this.maxUploadBytes = options.maxUploadBytes ?? 10 * 1024 * 1024;
    this.logger = options.logger ?? silentLogger;
  }

  async *readChunked(filePath: string, chunkSize: number = this.chunkSize): AsyncGenerator<Buffer> {
    const stream = createReadStream(filePath, { highWaterMark: chunkSize });
    for await (const chunk of stream) {
      const value: unknown = chunk;
      if (Buffer.isBuffer(value)) {
        yield value;
      }
    }
  }

  async readFile(filePath: string): Promise<Buffer> {
    const chunks: Buffer[] = [];
    for await (const chunk of this.readChunked(filePath)) {
      chunks.push(chunk);
    }
    return Buffer.concat(chunks);
  }

  async write(filePath: string, bytes: Uint8Array): Promise<void> {
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(filePath, bytes);
  }

  async hashFile(filePath: string): Promise<string> {
    const hash = createHash('sha256');
    for await (const chunk of this.readChunked(filePath)) {
      hash.update(chunk);
    }
    return hash.digest('hex');
  }

  async storeUpload(bytes: Uint8Array, originalName: string): Promise<StoredUpload> {
    if (bytes.length === 0) {
      throw new ValidationError('Uploaded file is empty');
    }
    if (bytes.length > this.maxUploadBytes) {
      throw new ValidationError(
        `File too large: ${bytes.length} bytes (limit ${this.maxUploadBytes})`
      );
    }

    const imageType = detectImageType(bytes);
    if (!imageType) {
      throw new ValidationError('Unsupported file type. Upload a JPEG, PNG, GIF, WEBP or BMP image');
    }

    const fileId = randomUUID();
    const filePath = path.join(this.uploadDir, `${fileId}${imageType.extension}`);
    await this.write(filePath, bytes);

    this.logger.debug(`Stored upload ${fileId} (${bytes.length} bytes, ${imageType.mimeType})`);

    return {
      fileId,
      fileName: path.basename(originalName) || `${fileId}${imageType.extension}`,
      path: filePath,
      size: bytes.length,
      contentType: imageType.mimeType,
    };
  }

  async resolveUpload(fileId: string): Promise<string> {
    const entry = await this.findUpload(fileId);
    if (!entry) {
      throw new ValidationError(`Unknown file_id: ${fileId}`);
    }
    return path.join(this.uploadDir, entry);
  }

  /**
   * Delete uploads last modified before `cutoffMs` (epoch ms). Returns the
   * removed file names.
   */
  sweepUploads(cutoffMs: number): Promise<string[]> {
    return this.removeOlderThan(this.uploadDir, cutoffMs);
  }

  async removeOlderThan(dir: string, cutoffMs: number): Promise<string[]> {
    let entries: string[];
    try {
      entries = await readdir(dir);
    } catch (error) {
      if (isMissingPath(error)) return [];
      throw error;
    }

    const removed: string[] = [];
    for (const entry of entries) {
      const filePath = path.join(dir, entry);
      const info = await stat(filePath).catch((error: unknown) => {
        if (isMissingPath(error)) return null;
        throw error;
      });
      if (info && info.isFile() && info.mtimeMs < cutoffMs) {
        await rm(filePath, { force: true });
        removed.push(entry);
      }
    }

    if (removed.length > 0) {
      this.logger.debug(`Removed ${removed.length} expired file(s) from ${dir}`);
    }
    return removed;
  }

  private async findUpload(fileId: string): Promise<string | null> {
    if (!UUID_PATTERN.test(fileId)) {
      throw new ValidationError(`Invalid file_id: ${fileId}`);
    }

    let entries: string[];
    try {
      entries = await readdir(this.uploadDir);
    } catch (error) {
      if (isMissingPath(error)) return null;
      throw error;
    }
    return entries.find((name) => name.startsWith(`${fileId}.`)) ?? null;
  }
}

function isMissingPath(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
