/**
 * File helpers for crawl output and checkpoints
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { createEnhancedLogger } from './logger';

const logger = createEnhancedLogger('FileUtils');

const DEFAULT_IDENTIFIER = 'post';

/**
 * Cleans a value for use as a file name segment. Case is preserved since
 * shortcodes are case sensitive.
 */
export function sanitizeSegment(segment: string = ''): string {
  return String(segment)
    .trim()
    .replace(/[^a-z0-9-_]+/gi, '-')
    .replace(/-{2,}/g, '-')
    .replace(/^-|-$/g, '') || DEFAULT_IDENTIFIER;
}

/**
 * Creates the directory tree; false when it cannot be created
 */
export async function ensureDirExists(dir: string): Promise<boolean> {
  if (!dir) {
    logger.error('ensureDirExists requires directory path');
    return false;
  }
  try {
    await fs.mkdir(dir, { recursive: true });
    return true;
  } catch (error) {
    logger.error(`Failed to create directory: ${dir}`, error instanceof Error ? error : undefined);
    return false;
  }
}

/**
 * Whole-document JSON write through a sibling temp file and rename, so a
 * reader never sees a half-written file.
 */
export async function writeJsonFile(filePath: string, data: unknown): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;
  try {
    await fs.writeFile(tempPath, JSON.stringify(data, null, 2), 'utf-8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

/**
 * Parsed JSON, or null when the file is missing or unparseable
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      return null;
    }
    logger.warn(`Failed to read ${filePath}`, { error: String(error) });
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error) {
    logger.warn(`Ignoring unparseable JSON in ${filePath}`, { error: String(error) });
    return null;
  }
}

export function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
