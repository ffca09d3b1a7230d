/**
 * Crawl data model. Persisted documents keep snake_case keys so that
 * output and checkpoint files stay readable by other tooling.
 */

export interface CommentUser {
  id: string | null;
  username: string | null;
  full_name: string | null;
  is_verified: boolean | null;
}

export interface CommentRecord {
  /** Globally unique across top-level comments and replies */
  id: string;
  text: string | null;
  /** ISO-8601 UTC */
  created_at: string | null;
  like_count: number | null;
  gif_url: string | null;
  user: CommentUser;
  is_author: boolean;
  reply_count: number;
  replies: CommentRecord[];
  parent_id?: string;
}

export interface PostIdentity {
  url?: string;
  shortcode: string;
  media_id: string | null;
  owner_id?: string | null;
  caption?: string | null;
  created_at?: string | null;
}

export const STOP_REASONS = [
  "no_more_pages",
  "max_reached",
  "no_payload",
  "missing_cursor",
  "cursor_stalled",
  "interrupted",
] as const;

export type StopReason = (typeof STOP_REASONS)[number];

export interface CrawlCheckpoint {
  post: PostIdentity;
  comment_count: number;
  comments: CommentRecord[];
  seen_comment_ids: string[];
  cursor: string | null;
  last_cursor: string | null;
  pages: number;
  expected_comment_count: number | null;
  stop_reason: StopReason | null;
  complete: boolean;
  updated_at: string;
}

export interface CrawlResult {
  post: PostIdentity;
  comment_count: number;
  expected_comment_count: number | null;
  fetched_at: string;
  comments: CommentRecord[];
  pages: number;
  stop_reason: StopReason | null;
  output_path: string;
}

/**
 * Paginated connection as found in a response payload
 */
export interface PageInfo {
  hasNextPage: boolean;
  endCursor?: string;
}

export interface ConnectionPage {
  edges: unknown[];
  pageInfo: PageInfo;
  totalCount?: number;
}
