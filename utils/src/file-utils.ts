import { promises as fs } from 'fs';
import path from 'path';
import { logger } from './logger.js';

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class FileUtils {
  static async exists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }

  static async isDirectory(dirPath: string): Promise<boolean> {
    try {
      return (await fs.stat(dirPath)).isDirectory();
    } catch (error) {
      if (isMissing(error)) return false;
      throw error;
    }
  }

  /** Read a text file, or `undefined` when it does not exist. */
  static async readTextIfExists(filePath: string): Promise<string | undefined> {
    try {
      return await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (isMissing(error)) return undefined;
      throw error;
    }
  }

  static async ensureDir(dirPath: string): Promise<void> {
    await fs.mkdir(dirPath, { recursive: true });
  }

  /**
   * Write through a temporary sibling and rename it into place, creating the
   * parent directory first.
   */
  static async writeAtomic(filePath: string, content: string): Promise<void> {
    await FileUtils.ensureDir(path.dirname(filePath));
    const tmp = `${filePath}.${process.pid}.tmp`;
    await fs.writeFile(tmp, content, 'utf-8');
    await fs.rename(tmp, filePath);
    logger.debug('wrote file', { file: filePath, bytes: Buffer.byteLength(content) });
  }

  static async copyInto(source: string, target: string): Promise<void> {
    await FileUtils.ensureDir(path.dirname(target));
    await fs.copyFile(source, target);
    logger.debug('copied file', { source, target });
  }
}
