import * as fs from 'fs/promises';
import * as path from 'path';

import { createLogger } from './logger';

export class FileStorage {
  private dataDir: string;
  private logger = createLogger('FileStorage');
  // Strict allowlist pattern for file/directory names
  private readonly SAFE_PATH_PATTERN = /^[a-zA-Z0-9_-]+$/;
  private readonly SAFE_FILENAME_PATTERN = /^[a-zA-Z0-9_-]+\.(json|csv)$/;

  constructor(dataDir: string = './data') {
    this.dataDir = path.resolve(dataDir);
  }

  /**
   * Validates that a path component (directory or filename) is safe
   */
  private validatePathComponent(component: string): void {
    if (!component) {
      throw new Error('Path component cannot be empty');
    }

    if (
      component.includes('..') ||
      component.includes('/') ||
      component.includes('\\')
    ) {
      throw new Error(`Invalid path component: ${component}`);
    }

    if (component.includes('.')) {
      if (!this.SAFE_FILENAME_PATTERN.test(component)) {
        throw new Error(`Invalid filename format: ${component}`);
      }
    } else if (!this.SAFE_PATH_PATTERN.test(component)) {
      throw new Error(`Invalid path format: ${component}`);
    }
  }

  /**
   * Validates and resolves a file path, ensuring it stays within dataDir
   */
  private validateAndResolvePath(filePath: string): string {
    const pathParts = filePath.split('/').filter(part => part.length > 0);
    pathParts.forEach(part => this.validatePathComponent(part));

    const fullPath = path.resolve(this.dataDir, filePath);
    if (
      !fullPath.startsWith(this.dataDir + path.sep) &&
      fullPath !== this.dataDir
    ) {
      throw new Error('Path traversal attempt detected');
    }

    return fullPath;
  }

  async ensureDataDir(): Promise<void> {
    try {
      await fs.mkdir(this.dataDir, { recursive: true });
    } catch (error) {
      this.logger.error('Error creating data directory', error);
      throw error;
    }
  }

  async readJSON<T>(filePath: string): Promise<T | null> {
    const raw = await this.readRaw(filePath);
    return raw === null ? null : (JSON.parse(raw) as T);
  }

  /**
   * Writes JSON through a temporary file and a rename, so the target is
   * either the old or the new document.
   */
  async writeJSON<T>(filePath: string, data: T): Promise<void> {
    try {
      const fullPath = this.validateAndResolvePath(filePath);
      await fs.mkdir(path.dirname(fullPath), { recursive: true });
      const tempPath = `${fullPath}.${process.pid}.tmp`;
      await fs.writeFile(tempPath, JSON.stringify(data, null, 2), 'utf-8');
      await fs.rename(tempPath, fullPath);
    } catch (error) {
      this.logger.error('Error writing JSON file', error);
      throw error;
    }
  }

  /**
   * Reads raw file content as string, or null when the file does not exist.
   */
  async readRaw(filePath: string): Promise<string | null> {
    try {
      const fullPath = this.validateAndResolvePath(filePath);
      return await fs.readFile(fullPath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return null;
      }
      throw error;
    }
  }

  /**
   * Appends text to a file, creating it (and its directory) when missing.
   */
  async appendRaw(filePath: string, content: string): Promise<void> {
    const fullPath = this.validateAndResolvePath(filePath);
    await fs.mkdir(path.dirname(fullPath), { recursive: true });
    await fs.appendFile(fullPath, content, 'utf-8');
  }

  async exists(filePath: string): Promise<boolean> {
    try {
      const fullPath = this.validateAndResolvePath(filePath);
      await fs.access(fullPath);
      return true;
    } catch {
      return false;
    }
  }
}
