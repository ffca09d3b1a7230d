/**
 * Normalizes raw comment and reply nodes into CommentRecord.
 *
 * Field names vary between response shapes (`id`/`pk`, `text`/`comment_text`,
 * three timestamp spellings, three like counters); the first present wins.
 */

import { GIF_PREFERRED_KEYS } from "../config/constants";
import type { CommentRecord, CommentUser, PageInfo } from "../types/comment";
import { formatUnixSeconds } from "../utils/time";
import { deepGet, isRecord, readPageInfo } from "./response-navigator";
import type { UnknownRecord } from "./response-navigator";

function isPresent(value: unknown): boolean {
  return value !== undefined && value !== null && value !== "";
}

function firstPresent(...values: unknown[]): unknown {
  return values.find(isPresent);
}

function asIdString(value: unknown): string | null {
  if (typeof value === "string" && value.length > 0) return value;
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  if (typeof value === "bigint") return value.toString();
  return null;
}

function asString(value: unknown): string | null {
  return typeof value === "string" ? value : null;
}

function asCount(value: unknown): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

/**
 * Numbers are Unix seconds; strings are assumed to be formatted already
 */
export function parseTimestamp(value: unknown): string | null {
  if (typeof value === "number") {
    return formatUnixSeconds(value);
  }
  if (typeof value === "string") {
    return value;
  }
  return null;
}

function pickRenditionUrl(images: unknown, keys: readonly string[]): string | null {
  if (!isRecord(images)) {
    return null;
  }
  const urlOf = (entry: unknown): string | null => {
    if (!isRecord(entry)) return null;
    const url = firstPresent(entry.url, entry.mp4);
    return typeof url === "string" ? url : null;
  };

  for (const key of keys) {
    const url = urlOf(images[key]);
    if (url) return url;
  }
  for (const entry of Object.values(images)) {
    const url = urlOf(entry);
    if (url) return url;
  }
  return null;
}

/**
 * Direct URL first, then the first-party proxied renditions, then giphy's own
 */
export function extractGifUrl(node: UnknownRecord): string | null {
  const info = node.giphy_media_info;
  if (!isRecord(info)) {
    return null;
  }
  if (typeof info.url === "string") {
    return info.url;
  }
  return (
    pickRenditionUrl(info.first_party_cdn_proxied_images, GIF_PREFERRED_KEYS) ??
    pickRenditionUrl(info.images, GIF_PREFERRED_KEYS)
  );
}

export function parseUser(node: UnknownRecord): CommentUser {
  const raw = firstPresent(node.owner, node.user);
  const user = isRecord(raw) ? raw : {};
  return {
    id: asIdString(firstPresent(user.id, user.pk)),
    username: asString(user.username),
    full_name: asString(user.full_name),
    is_verified: typeof user.is_verified === "boolean" ? user.is_verified : null,
  };
}

function resolveReplyCount(node: UnknownRecord): number {
  const threaded = node.edge_threaded_comments;
  const threadedCount = isRecord(threaded) ? asCount(threaded.count) : null;
  return threadedCount ?? asCount(node.child_comment_count) ?? 0;
}

/**
 * Returns null when the node carries no usable id.
 */
export function parseCommentNode(
  node: UnknownRecord,
  postOwnerId?: string | null
): CommentRecord | null {
  const id = asIdString(firstPresent(node.id, node.pk));
  if (!id) {
    return null;
  }

  const user = parseUser(node);
  const ownerId = postOwnerId === undefined || postOwnerId === null ? null : String(postOwnerId);

  return {
    id,
    text: asString(firstPresent(node.text, node.comment_text)) ?? null,
    created_at: parseTimestamp(firstPresent(node.created_at, node.created_at_utc, node.created_at_time)),
    like_count:
      asCount(node.like_count) ??
      asCount(node.comment_like_count) ??
      asCount(deepGet(node, ["edge_liked_by", "count"])),
    gif_url: extractGifUrl(node),
    user,
    is_author: Boolean(ownerId && user.id && user.id === ownerId),
    reply_count: resolveReplyCount(node),
    replies: [],
  };
}

/**
 * Replies embedded in a comment node, with their own paging state
 */
export function extractInlineReplies(node: UnknownRecord): { edges: unknown[]; pageInfo: PageInfo } {
  const connection = node.edge_threaded_comments;
  if (!isRecord(connection)) {
    return { edges: [], pageInfo: { hasNextPage: false } };
  }
  return {
    edges: Array.isArray(connection.edges) ? connection.edges : [],
    pageInfo: readPageInfo(connection.page_info),
  };
}
