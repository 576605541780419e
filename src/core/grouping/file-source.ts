import * as fs from 'fs';
import * as path from 'path';
import type { FileSource } from '../../types/grouping.js';

/**
 * Reads files relative to a repository root from the local filesystem.
 */
export class LocalFileSource implements FileSource {
  constructor(private readonly rootDir: string = process.cwd()) {}

  private resolve(filePath: string): string {
    return path.resolve(this.rootDir, filePath);
  }

  sizeOf = (filePath: string): number | undefined => {
    try {
      const stats = fs.statSync(this.resolve(filePath));
      return stats.isFile() ? stats.size : undefined;
    } catch {
      return undefined;
    }
  };

  readBytes = (filePath: string): Uint8Array | undefined => {
    try {
      return fs.readFileSync(this.resolve(filePath));
    } catch {
      return undefined;
    }
  };
}
