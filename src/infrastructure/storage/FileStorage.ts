import * as fs from 'fs/promises';
import * as path from 'path';
import { config } from '../../config/index';
import { logger } from '../logging/Logger';

/**
 * Export file storage interface
 */
export interface IFileStorage {
  save(fileName: string, content: string): Promise<string>;
  exists(fileName: string): Promise<boolean>;
  getPath(fileName: string): string;
}

/**
 * Writes exported records under the export directory. Existing files are
 * never overwritten; a timestamp suffix is added instead.
 */
export class FileStorage implements IFileStorage {
  private readonly baseDir: string;

  constructor(baseDir?: string) {
    this.baseDir = baseDir || path.resolve(process.cwd(), config.storage.exportOutputDir);
  }

  getPath(fileName: string): string {
    return path.join(this.baseDir, path.basename(fileName));
  }

  async exists(fileName: string): Promise<boolean> {
    try {
      await fs.access(this.getPath(fileName));
      return true;
    } catch {
      return false;
    }
  }

  private async getUniqueFileName(fileName: string): Promise<string> {
    const baseFileName = path.basename(fileName);
    if (!(await this.exists(baseFileName))) {
      return baseFileName;
    }

    const ext = path.extname(baseFileName);
    const stem = path.basename(baseFileName, ext);

    return `${stem}_${Date.now()}${ext}`;
  }

  /**
   * Save text content and return the full path written
   */
  async save(fileName: string, content: string): Promise<string> {
    try {
      await fs.mkdir(this.baseDir, { recursive: true });

      const uniqueFileName = await this.getUniqueFileName(fileName);
      const filePath = this.getPath(uniqueFileName);

      await fs.writeFile(filePath, content, 'utf-8');

      logger.info('Export written', {
        filePath,
        size: Buffer.byteLength(content, 'utf-8'),
      });

      return filePath;
    } catch (error) {
      logger.error('Failed to write export', error instanceof Error ? error : undefined, { fileName });
      throw error;
    }
  }
}
