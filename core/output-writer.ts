import * as path from 'path';
import { COMMENTS_DIR_NAME } from '../config/constants';
import type { CrawlResult } from '../types/comment';
import { writeJsonFile } from '../utils/fileutils';
import { createEnhancedLogger } from '../utils/logger';
import { fileTimestamp } from '../utils/time';
import { ScraperErrors } from './errors';

const logger = createEnhancedLogger('OutputWriter');

export type CrawlOutput = Omit<CrawlResult, 'output_path'>;

/**
 * Writes final crawl results as `<shortcode>_<YYYYMMDD_HHMMSS>.json`
 */
export class OutputWriter {
  private readonly dir: string;

  constructor(dataDir: string, private readonly now: () => Date = () => new Date()) {
    this.dir = path.join(dataDir, COMMENTS_DIR_NAME);
  }

  pathFor(shortcode: string, date: Date = this.now()): string {
    return path.join(this.dir, `${shortcode}_${fileTimestamp(date)}.json`);
  }

  async writeResult(shortcode: string, result: CrawlOutput): Promise<string> {
    const filePath = this.pathFor(shortcode);
    try {
      await writeJsonFile(filePath, result);
    } catch (error) {
      throw ScraperErrors.fileSystemError(
        `Failed to write crawl output: ${filePath}`,
        error instanceof Error ? error : undefined,
        { shortcode }
      );
    }
    logger.info(`Saved output: ${filePath}`, { comments: result.comment_count });
    return filePath;
  }
}
