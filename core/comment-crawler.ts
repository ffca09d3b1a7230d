/**
 * Comment-tree harvester for a single post.
 *
 * Walks the top-level comments connection page by page, pages each
 * comment's replies when the inline slice is incomplete, deduplicates every
 * id across the whole tree, and checkpoints after each page so an
 * interrupted crawl can pick up where it stopped.
 *
 *   RESOLVING_IDENTITY -> PAGING_COMMENTS <-> PAGING_REPLIES -> TERMINATED(reason)
 */

import type { CommentRecord, CrawlCheckpoint, CrawlResult, PageInfo, PostIdentity, StopReason } from '../types/comment';
import type { CrawlerConfig, CrawlOptions, EndpointDescriptor } from '../types/config';
import { createEnhancedLogger } from '../utils/logger';
import { sleep as defaultSleep } from '../utils/retry';
import type { SleepFn } from '../utils/retry';
import { formatDuration, nowIso } from '../utils/time';
import { extractInlineReplies, parseCommentNode } from './comment-parser';
import { ErrorClassifier, ScraperErrors } from './errors';
import defaultEventBus from './event-bus';
import type { CrawlerEventBus } from './event-bus';
import { AxiosHttpTransport } from './http-transport';
import type { HttpTransport } from './http-transport';
import type { CrawlOutput } from './output-writer';
import { OutputWriter } from './output-writer';
import { extractShortcode, isEndpointConfigured, PostResolver, shortcodeToMediaId } from './post-resolver';
import { RequestRateLimiter } from './rate-limiter';
import { RawResponseStore } from './raw-response-store';
import { RequestExecutor } from './request-executor';
import { edgeNodes, extractConnection } from './response-navigator';
import type { UnknownRecord } from './response-navigator';
import { ResumeStore } from './resume-store';
import { getShouldStopScraping } from './stop-signal';
import { renderEndpointVariables } from './template-renderer';

const logger = createEnhancedLogger('CommentCrawler');

export type CrawlState = 'RESOLVING_IDENTITY' | 'PAGING_COMMENTS' | 'PAGING_REPLIES' | 'TERMINATED';

export interface CommentCrawlerDeps {
  config: CrawlerConfig;
  executor: RequestExecutor;
  resolver: PostResolver;
  resumeStore: ResumeStore;
  outputWriter: OutputWriter;
  eventBus?: CrawlerEventBus;
  shouldStop?: () => boolean;
  sleep?: SleepFn;
  now?: () => Date;
}

/**
 * Mutable state of one crawl run
 */
interface CrawlSession {
  shortcode: string;
  mediaId: string | null;
  post: PostIdentity;
  comments: CommentRecord[];
  seen: Set<string>;
  cursor: string | null;
  lastCursor: string | null;
  prevCursor: string | null;
  backtrackUsed: boolean;
  pages: number;
  expectedCount: number | null;
  maxComments: number;
  fetchReplies: boolean;
  state: CrawlState;
}

export class CommentCrawler {
  private readonly config: CrawlerConfig;
  private readonly executor: RequestExecutor;
  private readonly resolver: PostResolver;
  private readonly resumeStore: ResumeStore;
  private readonly outputWriter: OutputWriter;
  private readonly eventBus: CrawlerEventBus;
  private readonly shouldStop: () => boolean;
  private readonly sleep: SleepFn;
  private readonly now: () => Date;

  constructor(deps: CommentCrawlerDeps) {
    this.config = deps.config;
    this.executor = deps.executor;
    this.resolver = deps.resolver;
    this.resumeStore = deps.resumeStore;
    this.outputWriter = deps.outputWriter;
    this.eventBus = deps.eventBus ?? defaultEventBus;
    this.shouldStop = deps.shouldStop ?? getShouldStopScraping;
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Crawls every comment of the post. Throws for a URL that carries no
   * shortcode or when the output file cannot be written; request failures
   * end the crawl with a stop reason.
   */
  async crawlPostComments(postUrl: string, options: CrawlOptions = {}): Promise<CrawlResult> {
    const shortcode = extractShortcode(postUrl);
    if (!shortcode) {
      throw ScraperErrors.invalidPostUrl(postUrl);
    }

    const { settings } = this.config;
    const startedAt = this.now().getTime();
    logger.setContext({ shortcode });
    this.eventBus.emitLog(`Start: ${postUrl}`);

    const session = await this.openSession(shortcode, postUrl, {
      maxComments: options.maxComments ?? settings.maxComments,
      resume: options.resume ?? settings.resumeByDefault,
      fetchReplies: options.fetchReplies ?? settings.fetchReplies,
    });

    let stopReason: StopReason;
    try {
      stopReason = await this.pageComments(session);
    } catch (error) {
      if (!ErrorClassifier.isInterruption(error)) {
        throw error;
      }
      stopReason = 'interrupted';
    }

    this.transition(session, 'TERMINATED');
    this.eventBus.emitLog(`Stop: ${stopReason}`);

    const result = await this.finalize(session, stopReason);
    const elapsed = this.now().getTime() - startedAt;
    logger.performance('crawlPostComments', elapsed, {
      comments: result.comment_count,
      pages: result.pages,
      stopReason,
    });
    this.eventBus.emitLog(`Total time: ${formatDuration(elapsed)}`);
    logger.clearContext();
    return result;
  }

  private async openSession(
    shortcode: string,
    postUrl: string,
    options: Required<CrawlOptions>
  ): Promise<CrawlSession> {
    const session: CrawlSession = {
      shortcode,
      mediaId: null,
      post: { url: postUrl, shortcode, media_id: null },
      comments: [],
      seen: new Set<string>(),
      cursor: null,
      lastCursor: null,
      prevCursor: null,
      backtrackUsed: false,
      pages: 0,
      expectedCount: null,
      maxComments: options.maxComments,
      fetchReplies: options.fetchReplies,
      state: 'RESOLVING_IDENTITY',
    };

    let checkpoint: CrawlCheckpoint | null = null;
    if (options.resume) {
      checkpoint = await this.resumeStore.load(shortcode);
      if (checkpoint?.complete) {
        this.eventBus.emitLog('Checkpoint is marked complete. Starting fresh.');
        checkpoint = null;
      } else if (checkpoint) {
        this.eventBus.emitLog(`Resuming from checkpoint: ${checkpoint.comment_count} comments, page ${checkpoint.pages}`);
      } else {
        this.eventBus.emitLog('No checkpoint found. Starting fresh.');
      }
    }

    if (checkpoint) {
      session.post = checkpoint.post;
      session.mediaId = checkpoint.post.media_id ?? shortcodeToMediaId(shortcode);
      session.comments = checkpoint.comments;
      session.seen = new Set(checkpoint.seen_comment_ids);
      session.cursor = checkpoint.cursor;
      session.lastCursor = checkpoint.last_cursor;
      session.pages = checkpoint.pages;
      session.expectedCount = checkpoint.expected_comment_count;
    } else {
      const resolution = await this.resolver.resolve(shortcode, postUrl);
      session.mediaId = resolution.mediaId;
      session.post = resolution.post;
    }

    logger.info(`Media ID: ${session.mediaId ?? 'unknown'}`);
    return session;
  }

  /**
   * Outer work loop over comment pages; resolves to the reason it stopped
   */
  private async pageComments(session: CrawlSession): Promise<StopReason> {
    this.transition(session, 'PAGING_COMMENTS');

    while (true) {
      this.assertNotStopped(session);

      const pageStartedAt = this.now().getTime();
      const currentCursor = session.cursor;
      const payload = await this.fetchCommentsPageWithRetry(session, currentCursor);

      if (!payload) {
        if (session.prevCursor && session.prevCursor !== currentCursor && !session.backtrackUsed) {
          this.eventBus.emitLog('Page fetch failed. Backtracking to previous cursor.', 'warn');
          session.cursor = session.prevCursor;
          session.backtrackUsed = true;
          continue;
        }
        return 'no_payload';
      }

      session.backtrackUsed = false;
      session.pages += 1;

      const page = extractConnection(payload, 'comments');
      if (session.expectedCount === null && page.totalCount !== undefined) {
        session.expectedCount = page.totalCount;
      }
      logger.info(
        `Page ${session.pages}: ${page.edges.length} comments, ${session.seen.size} total, ` +
          formatDuration(this.now().getTime() - pageStartedAt)
      );

      for (const node of edgeNodes(page.edges)) {
        this.assertNotStopped(session);
        if ((await this.processComment(session, node)) === 'max_reached') {
          return 'max_reached';
        }
      }

      this.emitProgress(session, `page ${session.pages}`);

      if (!page.pageInfo.hasNextPage) {
        // a stop during the last comment's replies must not read as complete
        this.assertNotStopped(session);
        return 'no_more_pages';
      }
      session.prevCursor = currentCursor;
      session.cursor = page.pageInfo.endCursor ?? null;
      if (!session.cursor) {
        return 'missing_cursor';
      }
      if (session.cursor === session.lastCursor) {
        return 'cursor_stalled';
      }
      session.lastCursor = session.cursor;

      await this.resumeStore.save(this.toCheckpoint(session, null));
    }
  }

  private async fetchCommentsPageWithRetry(
    session: CrawlSession,
    cursor: string | null
  ): Promise<UnknownRecord | null> {
    const { pageRetryAttempts, pageRetryDelay } = this.config.settings;

    for (let attempt = 0; attempt <= pageRetryAttempts; attempt++) {
      const payload = await this.fetchCommentsPage(session, cursor);
      if (payload) {
        return payload;
      }
      if (attempt < pageRetryAttempts) {
        const delay = pageRetryDelay * (attempt + 1);
        this.eventBus.emitLog(`Page fetch failed, retrying in ${delay.toFixed(1)}s...`, 'warn');
        await this.sleep(delay * 1000);
      }
    }
    return null;
  }

  private async fetchCommentsPage(session: CrawlSession, cursor: string | null): Promise<UnknownRecord | null> {
    const endpoint = this.config.endpoints.comments;
    if (!isEndpointConfigured(endpoint)) {
      logger.warn('Comments endpoint not configured');
      return null;
    }

    const variables = renderEndpointVariables(
      endpoint,
      { shortcode: session.shortcode, media_id: session.mediaId, cursor, comment_id: null },
      this.config.settings.commentsPageSize
    );
    return usablePayload(await this.executor.execute(endpoint, variables, 'comments'));
  }

  /**
   * Parses one top-level node with its replies and appends it
   */
  private async processComment(session: CrawlSession, node: UnknownRecord): Promise<'max_reached' | null> {
    const parsed = parseCommentNode(node, session.post.owner_id);
    if (!parsed) {
      logger.debug('Skipping comment node without id');
      return null;
    }
    if (session.seen.has(parsed.id)) {
      return null;
    }
    session.seen.add(parsed.id);

    const inline = extractInlineReplies(node);
    this.collectReplies(session, parsed, inline.edges);

    const repliesEndpoint = this.config.endpoints.comment_replies;
    if (
      session.fetchReplies &&
      isEndpointConfigured(repliesEndpoint) &&
      (parsed.reply_count > parsed.replies.length || inline.pageInfo.hasNextPage)
    ) {
      await this.pageReplies(session, parsed, inline.pageInfo, repliesEndpoint);
    }

    session.comments.push(parsed);

    if (session.maxComments > 0 && session.seen.size >= session.maxComments) {
      return 'max_reached';
    }
    return null;
  }

  /**
   * Inner work loop over one comment's reply pages. Stops quietly on any
   * failure; a stop request ends it so the parent can still be kept.
   */
  private async pageReplies(
    session: CrawlSession,
    parent: CommentRecord,
    inlinePage: PageInfo,
    endpoint: Readonly<EndpointDescriptor>
  ): Promise<void> {
    this.transition(session, 'PAGING_REPLIES');

    let replyCursor = inlinePage.hasNextPage ? inlinePage.endCursor ?? null : null;
    let lastReplyCursor: string | null = null;

    while (!this.shouldStop()) {
      const variables = renderEndpointVariables(
        endpoint,
        { shortcode: null, media_id: session.mediaId, cursor: replyCursor, comment_id: parent.id },
        this.config.settings.repliesPageSize
      );
      const payload = usablePayload(await this.executor.execute(endpoint, variables, 'comment_replies'));
      if (!payload) {
        logger.debug(`Reply fetch failed for comment ${parent.id}`);
        break;
      }

      const page = extractConnection(payload, 'replies');
      this.collectReplies(session, parent, page.edges);

      if (!page.pageInfo.hasNextPage) {
        break;
      }
      replyCursor = page.pageInfo.endCursor ?? null;
      if (!replyCursor || replyCursor === lastReplyCursor) {
        break;
      }
      lastReplyCursor = replyCursor;
    }

    this.transition(session, 'PAGING_COMMENTS');
  }

  private collectReplies(session: CrawlSession, parent: CommentRecord, edges: readonly unknown[]): void {
    for (const node of edgeNodes(edges)) {
      const reply = parseCommentNode(node, session.post.owner_id);
      if (!reply || session.seen.has(reply.id)) {
        continue;
      }
      reply.parent_id = parent.id;
      session.seen.add(reply.id);
      parent.replies.push(reply);
    }
  }

  private async finalize(session: CrawlSession, stopReason: StopReason): Promise<CrawlResult> {
    const output: CrawlOutput = {
      post: session.post,
      comment_count: session.comments.length,
      expected_comment_count: session.expectedCount,
      fetched_at: nowIso(this.now()),
      comments: session.comments,
      pages: session.pages,
      stop_reason: stopReason,
    };

    if (stopReason !== 'no_more_pages') {
      await this.resumeStore.save(this.toCheckpoint(session, stopReason));
    }

    const outputPath = await this.outputWriter.writeResult(session.shortcode, output);

    if (stopReason === 'no_more_pages') {
      await this.resumeStore.clear(session.shortcode);
    }

    this.eventBus.emitComplete({ count: output.comment_count, outputPath, stopReason });
    return { ...output, output_path: outputPath };
  }

  private toCheckpoint(session: CrawlSession, stopReason: StopReason | null): CrawlCheckpoint {
    return {
      post: session.post,
      comment_count: session.comments.length,
      comments: session.comments,
      seen_comment_ids: [...session.seen],
      cursor: session.cursor,
      last_cursor: session.lastCursor,
      pages: session.pages,
      expected_comment_count: session.expectedCount,
      stop_reason: stopReason,
      complete: false,
      updated_at: nowIso(this.now()),
    };
  }

  private assertNotStopped(session: CrawlSession): void {
    if (this.shouldStop()) {
      throw ScraperErrors.interrupted({ shortcode: session.shortcode, page: session.pages });
    }
  }

  private transition(session: CrawlSession, state: CrawlState): void {
    if (session.state !== state) {
      logger.debug(`${session.state} -> ${state}`);
      session.state = state;
    }
  }

  private emitProgress(session: CrawlSession, action: string): void {
    this.eventBus.emitProgress({
      current: session.seen.size,
      target: session.maxComments > 0 ? session.maxComments : session.expectedCount ?? 0,
      action,
      page: session.pages,
    });
  }
}

/**
 * Missing and empty payloads both count as a failed fetch
 */
function usablePayload(payload: UnknownRecord | null): UnknownRecord | null {
  return payload && Object.keys(payload).length > 0 ? payload : null;
}

export interface CommentCrawlerOverrides {
  transport?: HttpTransport;
  eventBus?: CrawlerEventBus;
  shouldStop?: () => boolean;
  sleep?: SleepFn;
  now?: () => Date;
}

/**
 * Wires the default collaborators for a configuration
 */
export function createCommentCrawler(config: CrawlerConfig, overrides: CommentCrawlerOverrides = {}): CommentCrawler {
  const { settings } = config;
  const eventBus = overrides.eventBus ?? defaultEventBus;
  const transport =
    overrides.transport ?? new AxiosHttpTransport({ authentication: config.authentication, proxy: config.proxy });

  const executor = new RequestExecutor({
    transport,
    rateLimiter: new RequestRateLimiter({
      requestsPerMinute: settings.requestsPerMinute,
      jitterRatio: settings.jitterRatio,
      sleep: overrides.sleep,
    }),
    rawStore: new RawResponseStore({
      dataDir: config.dataDir,
      mode: settings.saveRawResponses,
      keep: settings.rawResponsesKeep,
      maxMb: settings.rawResponsesMaxMb,
      now: overrides.now,
    }),
    settings,
    sleep: overrides.sleep,
  });

  return new CommentCrawler({
    config,
    executor,
    resolver: new PostResolver(executor, config.endpoints.post_by_shortcode),
    resumeStore: new ResumeStore(config.dataDir, eventBus),
    outputWriter: new OutputWriter(config.dataDir, overrides.now),
    eventBus,
    shouldStop: overrides.shouldStop,
    sleep: overrides.sleep,
    now: overrides.now,
  });
}
