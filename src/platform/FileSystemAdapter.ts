/**
 * FileSystemAdapter - IFileSystem over fs/promises
 */

import type { IFileSystem } from './IFileSystem.js';
import fs from 'fs/promises';

export class FileSystemAdapter implements IFileSystem {
  async readFile(path: string, encoding: BufferEncoding = 'utf-8'): Promise<string> {
    return fs.readFile(path, encoding);
  }

  async writeFile(
    path: string,
    content: string,
    encoding: BufferEncoding = 'utf-8'
  ): Promise<void> {
    await fs.writeFile(path, content, encoding);
  }

  async exists(path: string): Promise<boolean> {
    return fs.access(path).then(
      () => true,
      () => false
    );
  }

  async mkdir(path: string, options?: { recursive?: boolean }): Promise<void> {
    await fs.mkdir(path, options);
  }
}
