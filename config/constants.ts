/**
 * Application Constants
 *
 * This file contains ONLY truly immutable constants:
 * - URL shapes and identifier alphabets
 * - Known response paths for paginated connections
 * - Default HTTP headers and on-disk layout names
 *
 * For configurable values (rate limits, retries, page sizes), see:
 * - utils/config-manager.ts (ConfigManager)
 */

import type { CrawlerSettings } from "../types/config";

// ==================== Post identifiers ====================

/**
 * Post, reel and IGTV permalinks
 */
export const POST_URL_PATTERN = /instagram\.com\/(p|reel|tv)\/([^/?#]+)\/?/;

/**
 * Shortcodes are big-endian base-64 numbers over this alphabet
 */
export const SHORTCODE_ALPHABET =
  "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789-_";

export const POST_PAGE_URL = (shortcode: string): string =>
  `https://www.instagram.com/p/${shortcode}/`;

/**
 * Values left in a config template that were never filled in
 */
export const PLACEHOLDER_PREFIX = "YOUR_";

// ==================== Response shapes ====================

export type KeyPath = readonly (string | number)[];

/**
 * Comment connections, newest response shape first
 */
export const COMMENT_CONNECTION_PATHS: readonly KeyPath[] = [
  ["data", "xdt_api__v1__media__media_id__comments__connection"],
  ["data", "xdt_shortcode_media", "edge_media_to_parent_comment"],
  ["data", "shortcode_media", "edge_media_to_parent_comment"],
  ["data", "xdt_shortcode_media", "edge_media_to_comment"],
  ["data", "shortcode_media", "edge_media_to_comment"],
];

export const COMMENT_CONNECTION_SUFFIXES: readonly string[] = ["__comments__connection"];

export const REPLY_CONNECTION_PATHS: readonly KeyPath[] = [
  ["data", "comment", "edge_threaded_comments"],
  ["data", "comment", "edge_media_to_parent_comment"],
  ["data", "comment", "edge_media_to_comment"],
];

export const REPLY_CONNECTION_SUFFIXES: readonly string[] = [
  "__replies__connection",
  "__comments__replies__connection",
];

export const CHILD_COMMENT_CONNECTION_SUFFIXES: readonly string[] = ["__child_comments__connection"];

/**
 * Post lookup fields
 */
export const POST_MEDIA_ID_PATHS: readonly KeyPath[] = [
  ["data", "xdt_shortcode_media", "id"],
  ["data", "shortcode_media", "id"],
  ["data", "xdt_shortcode_media", "pk"],
  ["data", "shortcode_media", "pk"],
  ["data", "media", "id"],
  ["data", "media", "pk"],
];

export const POST_OWNER_ID_PATHS: readonly KeyPath[] = [
  ["data", "xdt_shortcode_media", "owner", "id"],
  ["data", "shortcode_media", "owner", "id"],
];

export const POST_CAPTION_PATHS: readonly KeyPath[] = [
  ["data", "xdt_shortcode_media", "edge_media_to_caption", "edges", 0, "node", "text"],
  ["data", "shortcode_media", "edge_media_to_caption", "edges", 0, "node", "text"],
];

export const POST_TIMESTAMP_PATHS: readonly KeyPath[] = [
  ["data", "xdt_shortcode_media", "taken_at_timestamp"],
  ["data", "shortcode_media", "taken_at_timestamp"],
];

/**
 * Media id patterns in the server-rendered post page
 */
export const POST_HTML_MEDIA_ID_PATTERNS = (shortcode: string): RegExp[] => {
  const escaped = shortcode.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
  return [
    /"media_id":"(\d+)"/,
    new RegExp(`"id":"(\\d+)","shortcode":"${escaped}"`),
    new RegExp(`"pk":"(\\d+)","shortcode":"${escaped}"`),
  ];
};

/**
 * GIF renditions, best first
 */
export const GIF_PREFERRED_KEYS: readonly string[] = [
  "original",
  "fixed_width",
  "fixed_height",
  "downsized",
  "preview_gif",
];

// ==================== HTTP ====================

export const DEFAULT_REQUEST_HEADERS: Readonly<Record<string, string>> = {
  Accept: "*/*",
  "Accept-Language": "en-US,en;q=0.9",
};

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

export const REQUIRED_COOKIES: readonly string[] = ["sessionid", "csrftoken", "ds_user_id"];

// ==================== Storage layout ====================

export const DEFAULT_DATA_DIR = "crawler_data";
export const COMMENTS_DIR_NAME = "ig_comments";
export const RAW_RESPONSES_DIR_NAME = "raw_responses";
export const RESUME_FILE_SUFFIX = "_resume.json";
export const RAW_RESPONSE_FILE_SUFFIX = "_response.json";

// ==================== Defaults ====================

export const DEFAULT_SETTINGS: Readonly<CrawlerSettings> = {
  requestsPerMinute: 8,
  retryAttempts: 3,
  retryDelay: 5,
  timeout: 30,
  maxComments: 400,
  fetchReplies: true,
  resumeByDefault: true,
  commentsPageSize: 20,
  repliesPageSize: 20,
  jitterRatio: 0.2,
  saveRawResponses: "errors",
  rawResponsesKeep: 200,
  rawResponsesMaxMb: 100,
  pageRetryAttempts: 2,
  pageRetryDelay: 3,
};
