/**
 * Per-post crawl checkpoints.
 *
 * One document per shortcode at `<dataDir>/ig_comments/<shortcode>_resume.json`,
 * rewritten whole after every page. A checkpoint that cannot be read or
 * does not have the expected shape is treated as absent.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { COMMENTS_DIR_NAME, RESUME_FILE_SUFFIX } from '../config/constants';
import { STOP_REASONS } from '../types/comment';
import type { CommentRecord, CrawlCheckpoint } from '../types/comment';
import { isMissingFile, readJsonFile, writeJsonFile } from '../utils/fileutils';
import { createEnhancedLogger } from '../utils/logger';
import { nowIso } from '../utils/time';
import type { CrawlerEventBus } from './event-bus';

const logger = createEnhancedLogger('ResumeStore');

const commentUserSchema = z.object({
  id: z.string().nullable(),
  username: z.string().nullable(),
  full_name: z.string().nullable(),
  is_verified: z.boolean().nullable(),
});

const commentRecordSchema: z.ZodType<CommentRecord> = z.lazy(() =>
  z.object({
    id: z.string(),
    text: z.string().nullable(),
    created_at: z.string().nullable(),
    like_count: z.number().nullable(),
    gif_url: z.string().nullable(),
    user: commentUserSchema,
    is_author: z.boolean(),
    reply_count: z.number(),
    replies: z.array(commentRecordSchema),
    parent_id: z.string().optional(),
  })
);

const postIdentitySchema = z.object({
  url: z.string().optional(),
  shortcode: z.string(),
  media_id: z.string().nullable(),
  owner_id: z.string().nullable().optional(),
  caption: z.string().nullable().optional(),
  created_at: z.string().nullable().optional(),
});

export const checkpointSchema = z.object({
  post: postIdentitySchema,
  comment_count: z.number(),
  comments: z.array(commentRecordSchema),
  seen_comment_ids: z.array(z.string()),
  cursor: z.string().nullable(),
  last_cursor: z.string().nullable(),
  pages: z.number().int().nonnegative(),
  expected_comment_count: z.number().nullable(),
  stop_reason: z.enum(STOP_REASONS).nullable(),
  complete: z.boolean(),
  updated_at: z.string(),
});

function commentIds(comments: readonly CommentRecord[]): string[] {
  return comments.flatMap((comment) => [comment.id, ...commentIds(comment.replies)]);
}

export class ResumeStore {
  private readonly dir: string;
  private eventBus?: CrawlerEventBus;

  constructor(dataDir: string, eventBus?: CrawlerEventBus) {
    this.dir = path.join(dataDir, COMMENTS_DIR_NAME);
    this.eventBus = eventBus;
  }

  pathFor(shortcode: string): string {
    return path.join(this.dir, `${shortcode}${RESUME_FILE_SUFFIX}`);
  }

  /**
   * Null when absent, unreadable or malformed; never throws. Every id in the
   * stored comment tree counts as seen, whatever the stored id list says.
   */
  async load(shortcode: string): Promise<CrawlCheckpoint | null> {
    const raw = await readJsonFile(this.pathFor(shortcode));
    if (raw === null) {
      return null;
    }
    const parsed = checkpointSchema.safeParse(raw);
    if (!parsed.success) {
      this.log(`Ignoring malformed checkpoint for ${shortcode}: ${parsed.error.issues[0]?.message ?? 'invalid'}`, 'warn');
      return null;
    }
    const checkpoint = parsed.data;
    checkpoint.seen_comment_ids = [...new Set([...checkpoint.seen_comment_ids, ...commentIds(checkpoint.comments)])];
    this.log(`Loaded checkpoint for ${shortcode}: ${checkpoint.comment_count} comments, ${checkpoint.pages} pages`);
    return checkpoint;
  }

  /**
   * Refreshes `updated_at` and rewrites the whole document
   */
  async save(checkpoint: CrawlCheckpoint): Promise<boolean> {
    checkpoint.updated_at = nowIso();
    const filePath = this.pathFor(checkpoint.post.shortcode);
    try {
      await writeJsonFile(filePath, checkpoint);
      return true;
    } catch (error) {
      logger.error(`Failed to save checkpoint: ${filePath}`, error instanceof Error ? error : undefined);
      this.eventBus?.emitLog(`Failed to save checkpoint for ${checkpoint.post.shortcode}`, 'error');
      return false;
    }
  }

  async clear(shortcode: string): Promise<void> {
    const filePath = this.pathFor(shortcode);
    try {
      await fs.unlink(filePath);
      this.log(`Cleared checkpoint for ${shortcode}`, 'debug');
    } catch (error) {
      if (!isMissingFile(error)) {
        logger.warn(`Failed to clear checkpoint: ${filePath}`, { error: String(error) });
      }
    }
  }

  private log(message: string, level: 'info' | 'warn' | 'error' | 'debug' = 'info'): void {
    if (this.eventBus) {
      this.eventBus.emitLog(message, level);
    }
    logger[level](message);
  }
}
