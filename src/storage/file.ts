// ═══════════════════════════════════════════════════════════════════════════════
// FILE STORAGE — JSON Document on Disk with Atomic Replace
// ═══════════════════════════════════════════════════════════════════════════════
//
// Writes go to a uniquely named temp file beside the target, are flushed to
// disk, then renamed over the target. A crash mid-write leaves at most a stray
// temp file; the target always holds a complete document.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { mkdir, open, readFile, rename, rm } from 'node:fs/promises';
import path from 'node:path';
import { v4 as uuidv4 } from 'uuid';

import type { DocumentStorage } from './types.js';
import { getLogger, toError } from '../logging/index.js';

const logger = getLogger({ component: 'file-storage' });

const TEMP_EXTENSION = '.tmp';

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class FileDocumentStorage implements DocumentStorage {
  readonly name = 'file';
  readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
  }

  async read(): Promise<string | null> {
    try {
      return await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }
  }

  async write(contents: string): Promise<void> {
    const tempPath = `${this.filePath}.${uuidv4()}${TEMP_EXTENSION}`;

    try {
      await mkdir(path.dirname(this.filePath), { recursive: true });

      const handle = await open(tempPath, 'w');
      try {
        await handle.writeFile(contents, 'utf-8');
        await handle.sync();
      } finally {
        await handle.close();
      }

      await rename(tempPath, this.filePath);
    } catch (error) {
      await this.discard(tempPath);
      throw error;
    }
  }

  async close(): Promise<void> {
    // Files are opened per write
  }

  private async discard(tempPath: string): Promise<void> {
    try {
      await rm(tempPath, { force: true });
    } catch (cleanupError) {
      logger.warn('Failed to remove temp file', {
        tempPath,
        error: toError(cleanupError).message,
      });
    }
  }
}
