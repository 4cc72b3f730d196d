import fs from 'node:fs/promises';
import path from 'node:path';
import { FileNotFoundError } from '../errors.js';
import { getLogger, type Logger } from '../monitoring/logger.js';
import type { FormElementHandle } from './types.js';

export interface FileHandlerOptions {
  /** Base for relative paths; defaults to `process.cwd()`. */
  cwd?: string;
  logger?: Logger;
}

export class FileHandler {
  private readonly cwd: string;
  private readonly logger: Logger;

  constructor(opts: FileHandlerOptions = {}) {
    this.cwd = opts.cwd ?? process.cwd();
    this.logger = opts.logger ?? getLogger().child({ component: 'FileHandler' });
  }

  resolvePath(filePath: string): string {
    return path.resolve(this.cwd, filePath);
  }

  /**
   * Upload `filePath` into a file input. The file must exist before the
   * browser is asked to do anything. Returns the absolute path uploaded.
   */
  async upload(handle: FormElementHandle, filePath: string): Promise<string> {
    const absolute = this.resolvePath(filePath);
    const stat = await fs.stat(absolute).catch(() => null);
    if (!stat?.isFile()) {
      this.logger.warn('Upload file missing', { path: absolute });
      throw new FileNotFoundError(absolute);
    }

    await handle.setInputFiles(absolute);
    this.logger.info('File uploaded', { path: absolute, bytes: stat.size });
    return absolute;
  }
}
