import fs from 'node:fs/promises';
import path from 'node:path';
import type { FileSourcePort } from '../../domain/ports/FileSourcePort.js';
import { FileNotFoundError, FilePermissionError } from '../../domain/errors/DomainErrors.js';

function errnoOf(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

function mapFsError(err: unknown, filePath: string): unknown {
  const code = errnoOf(err);
  if (code === 'ENOENT' || code === 'ENOTDIR' || code === 'EISDIR') {
    return new FileNotFoundError(filePath, { cause: err });
  }
  if (code === 'EACCES' || code === 'EPERM') {
    return new FilePermissionError(filePath, { cause: err });
  }
  return err;
}

export class FileSystemSourceAdapter implements FileSourcePort {
  async fileExists(filePath: string): Promise<boolean> {
    try {
      const stat = await fs.stat(filePath);
      return stat.isFile();
    } catch {
      return false;
    }
  }

  async readFile(filePath: string): Promise<Uint8Array> {
    try {
      return await fs.readFile(filePath);
    } catch (err) {
      throw mapFsError(err, filePath);
    }
  }

  async listFiles(rootDir: string, extensions: readonly string[]): Promise<string[]> {
    const wanted = new Set(extensions.map((e) => e.toLowerCase()));
    const results: string[] = [];
    try {
      await this.walkDir(rootDir, wanted, results);
    } catch (err) {
      throw mapFsError(err, rootDir);
    }
    return results.sort();
  }

  /** 遞迴走訪目錄，收集指定副檔名的檔案（跳過隱藏目錄與隱藏檔） */
  private async walkDir(dir: string, wanted: Set<string>, results: string[]): Promise<void> {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      if (entry.name.startsWith('.')) continue;
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await this.walkDir(fullPath, wanted, results);
      } else if (entry.isFile() && wanted.has(path.extname(entry.name).toLowerCase())) {
        results.push(fullPath);
      }
    }
  }
}
