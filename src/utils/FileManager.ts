import fs from 'fs/promises';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { logger } from './logger';

/**
 * FileManager - Owns the flat output directory
 * Final paths are only ever produced by rename, so an interrupted write
 * leaves at most a temporary file behind.
 */
export class FileManager {
  private readonly outputDir: string;
  private initialization?: Promise<void>;

  constructor(outputDirectory: string = 'artwork') {
    this.outputDir = outputDirectory;
  }

  get directory(): string {
    return this.outputDir;
  }

  /**
   * Create the output directory (with parents) once, before the first write
   */
  initialize(): Promise<void> {
    if (!this.initialization) {
      this.initialization = fs
        .mkdir(this.outputDir, { recursive: true })
        .then(() => {
          logger.info('📁 Output directory initialized', { path: this.outputDir });
        })
        .catch((error: unknown) => {
          this.initialization = undefined;
          logger.error('Failed to create output directory', {
            path: this.outputDir,
            error: error instanceof Error ? error.message : String(error),
          });
          throw error;
        });
    }
    return this.initialization;
  }

  resolvePath(filename: string): string {
    return path.join(this.outputDir, filename);
  }

  /**
   * Sibling temp path for a final path, unique per write
   */
  createTempPath(finalPath: string): string {
    const dir = path.dirname(finalPath);
    const base = path.basename(finalPath);
    return path.join(dir, `.${base}.${uuidv4().substring(0, 8)}.part`);
  }

  /**
   * Move a finished temp file onto its final path
   */
  async commit(tempPath: string, finalPath: string): Promise<void> {
    await fs.rename(tempPath, finalPath);
  }

  /**
   * Write the whole content to a temp file and rename it into place
   */
  async writeAtomic(finalPath: string, content: string | Buffer): Promise<number> {
    const tempPath = this.createTempPath(finalPath);
    try {
      await fs.writeFile(tempPath, content);
      await this.commit(tempPath, finalPath);
    } catch (error) {
      await this.deleteFile(tempPath);
      throw error;
    }
    return typeof content === 'string' ? Buffer.byteLength(content) : content.length;
  }

  /**
   * Delete a file, ignoring a missing one
   */
  async deleteFile(filePath: string): Promise<void> {
    try {
      await fs.unlink(filePath);
    } catch (error: unknown) {
      const err = error as NodeJS.ErrnoException;
      if (err.code !== 'ENOENT') {
        logger.error('Failed to delete file', {
          path: filePath,
          error: err.message,
        });
      }
    }
  }

  /**
   * Get file size in bytes
   */
  async getFileSize(filePath: string): Promise<number> {
    const stats = await fs.stat(filePath);
    return stats.size;
  }

  /**
   * Check if file exists
   */
  async fileExists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }
}
