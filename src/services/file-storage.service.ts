import { Injectable, Logger } from '@nestjs/common';
import fs from 'fs/promises';
import path from 'path';
import { getAppConfig } from '../config/app.config';

/**
 * Where uploaded bytes live. Keys are relative paths such as
 * `<ownerId>/<documentId>.pdf`.
 */
export interface FileStorage {
  save(key: string, data: Buffer): Promise<void>;
  read(key: string): Promise<Buffer>;
  remove(key: string): Promise<void>;
}

@Injectable()
export class LocalFileStorage implements FileStorage {
  private readonly logger = new Logger(LocalFileStorage.name);
  private readonly rootDir: string;

  constructor(rootDir?: string) {
    this.rootDir = path.resolve(rootDir || getAppConfig().uploadDir);
  }

  async save(key: string, data: Buffer): Promise<void> {
    const target = this.resolve(key);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, data);
    this.logger.debug(`Stored ${data.length} bytes at ${key}`);
  }

  async read(key: string): Promise<Buffer> {
    return fs.readFile(this.resolve(key));
  }

  /**
   * Missing files are ignored
   */
  async remove(key: string): Promise<void> {
    await fs.rm(this.resolve(key), { force: true });
  }

  private resolve(key: string): string {
    const target = path.resolve(this.rootDir, key);
    if (!target.startsWith(this.rootDir + path.sep)) {
      throw new Error(`Storage key escapes the upload directory: ${key}`);
    }
    return target;
  }
}
