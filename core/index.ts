/**
 * Core Module Exports
 */

export { CommentCrawler, type CommentCrawlerDeps, createCommentCrawler, type CrawlState } from './comment-crawler';
export { extractGifUrl, extractInlineReplies, parseCommentNode, parseTimestamp, parseUser } from './comment-parser';
export {
  ErrorClassifier,
  ErrorCode,
  type ErrorContext,
  RETRYABLE_STATUS_CODES,
  ScraperError,
  ScraperErrors,
} from './errors';
export {
  type CrawlCompleteData,
  CrawlerEventBus,
  type CrawlProgressData,
  createEventBus,
  default as eventBusInstance,
  type LogMessageData,
} from './event-bus';
export { AxiosHttpTransport, type HttpRequest, type HttpResponse, type HttpTransport } from './http-transport';
export { OutputWriter } from './output-writer';
export { extractShortcode, PostResolver, shortcodeToMediaId } from './post-resolver';
export { RequestRateLimiter } from './rate-limiter';
export { RawResponseStore } from './raw-response-store';
export { buildRequest, RequestExecutor } from './request-executor';
export { edgeNodes, extractConnection, extractPostIdentityFields } from './response-navigator';
export { ResumeStore } from './resume-store';
export {
  getShouldStopScraping,
  installStopSignalHandlers,
  resetShouldStopScraping,
  setShouldStopScraping,
} from './stop-signal';
export { renderEndpointVariables, renderTemplate } from './template-renderer';
