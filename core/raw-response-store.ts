/**
 * Debug archive of upstream responses.
 *
 * Each saved response is one JSON file under `<dataDir>/raw_responses`.
 * The directory is bounded by file count and total size after every write.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { RAW_RESPONSES_DIR_NAME, RAW_RESPONSE_FILE_SUFFIX } from '../config/constants';
import type { RawResponseMode } from '../types/config';
import { ensureDirExists, sanitizeSegment } from '../utils/fileutils';
import { createEnhancedLogger } from '../utils/logger';
import { fileTimestamp, nowIso } from '../utils/time';

const logger = createEnhancedLogger('RawResponseStore');

const DISABLED_MODES = new Set(['none', 'off', 'false', '0']);
const ERROR_MODES = new Set(['errors', 'error']);

export interface RawResponseStoreOptions {
  dataDir: string;
  mode: RawResponseMode | string;
  /** Negative disables the count cap */
  keep: number;
  /** 0 or less disables the size cap */
  maxMb: number;
  now?: () => Date;
}

export interface RawResponseDocument {
  url: string;
  timestamp: string;
  status: number;
  params: unknown;
  data: unknown;
}

interface StoredFile {
  path: string;
  mtimeMs: number;
  size: number;
}

/**
 * Maps the free-form setting to one of the three behaviours
 */
export function normalizeRawResponseMode(mode: string | undefined | null): RawResponseMode {
  const value = String(mode || 'errors').toLowerCase();
  if (DISABLED_MODES.has(value)) return 'none';
  if (ERROR_MODES.has(value)) return 'errors';
  return 'all';
}

export class RawResponseStore {
  private readonly dir: string;
  private readonly mode: RawResponseMode;
  private readonly keep: number;
  private readonly maxBytes: number;
  private readonly now: () => Date;

  constructor(options: RawResponseStoreOptions) {
    this.dir = path.join(options.dataDir, RAW_RESPONSES_DIR_NAME);
    this.mode = normalizeRawResponseMode(options.mode);
    this.keep = options.keep;
    this.maxBytes = options.maxMb > 0 ? options.maxMb * 1024 * 1024 : 0;
    this.now = options.now ?? (() => new Date());
  }

  shouldSave(status: number): boolean {
    if (this.mode === 'none') return false;
    if (this.mode === 'errors') return status !== 200;
    return true;
  }

  /**
   * Writes the response if the mode asks for it; returns the file path or null.
   * Failures are logged and never reach the caller.
   */
  async save(label: string, url: string, params: unknown, status: number, data: unknown): Promise<string | null> {
    if (!this.shouldSave(status)) {
      return null;
    }

    const date = this.now();
    const filePath = path.join(
      this.dir,
      `${fileTimestamp(date, true)}_${sanitizeSegment(label)}${RAW_RESPONSE_FILE_SUFFIX}`
    );
    const document: RawResponseDocument = { url, timestamp: nowIso(date), status, params, data };

    try {
      await ensureDirExists(this.dir);
      await fs.writeFile(filePath, JSON.stringify(document, null, 2), 'utf-8');
    } catch (error) {
      logger.warn('Failed to save raw response', { label, status, error: String(error) });
      return null;
    }

    await this.sweep();
    return filePath;
  }

  /**
   * Keeps the newest `keep` files, then drops the oldest until the total
   * size fits the byte budget.
   */
  async sweep(): Promise<number> {
    let removed = 0;

    let files = await this.listFiles();
    if (this.keep >= 0) {
      for (const file of files.slice(this.keep)) {
        if (await this.remove(file.path)) removed++;
      }
      files = files.slice(0, this.keep);
    }

    if (this.maxBytes > 0) {
      let total = files.reduce((sum, file) => sum + file.size, 0);
      for (let i = files.length - 1; i >= 0 && total > this.maxBytes; i--) {
        if (await this.remove(files[i].path)) removed++;
        total -= files[i].size;
      }
    }

    if (removed > 0) {
      logger.debug(`Removed ${removed} old raw responses`);
    }
    return removed;
  }

  /**
   * Matching files, newest first
   */
  private async listFiles(): Promise<StoredFile[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.dir);
    } catch (error) {
      logger.debug('Raw response directory not readable', { error: String(error) });
      return [];
    }

    const files: StoredFile[] = [];
    for (const name of names) {
      if (!name.endsWith(RAW_RESPONSE_FILE_SUFFIX)) continue;
      const filePath = path.join(this.dir, name);
      try {
        const stat = await fs.stat(filePath);
        files.push({ path: filePath, mtimeMs: stat.mtimeMs, size: stat.size });
      } catch (error) {
        logger.debug(`Skipping ${name}`, { error: String(error) });
      }
    }
    return files.sort((a, b) => b.mtimeMs - a.mtimeMs);
  }

  private async remove(filePath: string): Promise<boolean> {
    try {
      await fs.unlink(filePath);
      return true;
    } catch (error) {
      logger.debug(`Failed to remove ${filePath}`, { error: String(error) });
      return false;
    }
  }
}
