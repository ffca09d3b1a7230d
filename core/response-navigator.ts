/**
 * Locates paginated connections inside GraphQL payloads.
 *
 * The same semantic connection has shipped under several key paths over
 * time, and newer responses hide it behind generated key names. Lookups are
 * expressed as an ordered list of strategies; the first one that yields a
 * mapping wins.
 */

import {
  CHILD_COMMENT_CONNECTION_SUFFIXES,
  COMMENT_CONNECTION_PATHS,
  COMMENT_CONNECTION_SUFFIXES,
  POST_CAPTION_PATHS,
  POST_MEDIA_ID_PATHS,
  POST_OWNER_ID_PATHS,
  POST_TIMESTAMP_PATHS,
  REPLY_CONNECTION_PATHS,
  REPLY_CONNECTION_SUFFIXES,
} from "../config/constants";
import type { KeyPath } from "../config/constants";
import type { ConnectionPage, PageInfo } from "../types/comment";

export type ConnectionPurpose = "comments" | "replies";

export type UnknownRecord = Record<string, unknown>;

/**
 * A pure lookup that either finds a connection mapping or gives up
 */
export type ConnectionLookup = (payload: unknown) => UnknownRecord | undefined;

export function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Walks a key path through mappings and sequences
 */
export function deepGet(data: unknown, path: KeyPath): unknown {
  let current: unknown = data;
  for (const key of path) {
    if (typeof key === "number") {
      if (Array.isArray(current) && key >= 0 && key < current.length) {
        current = current[key];
        continue;
      }
      return undefined;
    }
    if (isRecord(current) && Object.prototype.hasOwnProperty.call(current, key)) {
      current = current[key];
      continue;
    }
    return undefined;
  }
  return current;
}

/**
 * First non-null value found along the given paths
 */
export function pickFirstPath(data: unknown, paths: readonly KeyPath[]): unknown {
  for (const path of paths) {
    const value = deepGet(data, path);
    if (value !== undefined && value !== null) {
      return value;
    }
  }
  return undefined;
}

export function fixedPath(path: KeyPath): ConnectionLookup {
  return (payload) => {
    const value = deepGet(payload, path);
    return isRecord(value) ? value : undefined;
  };
}

/**
 * Scans the direct children of `data` for a key ending in one of the suffixes
 */
export function suffixMatch(suffixes: readonly string[]): ConnectionLookup {
  return (payload) => {
    const data = isRecord(payload) ? payload.data : undefined;
    if (!isRecord(data)) {
      return undefined;
    }
    for (const [key, value] of Object.entries(data)) {
      if (!isRecord(value)) {
        continue;
      }
      if (suffixes.some((suffix) => key.endsWith(suffix))) {
        return value;
      }
    }
    return undefined;
  };
}

const COMMENT_LOOKUPS: readonly ConnectionLookup[] = [
  ...COMMENT_CONNECTION_PATHS.map(fixedPath),
  suffixMatch(COMMENT_CONNECTION_SUFFIXES),
];

// Some reply responses collapse into the comment connection shape.
const REPLY_LOOKUPS: readonly ConnectionLookup[] = [
  ...REPLY_CONNECTION_PATHS.map(fixedPath),
  suffixMatch(REPLY_CONNECTION_SUFFIXES),
  suffixMatch(CHILD_COMMENT_CONNECTION_SUFFIXES),
  ...COMMENT_LOOKUPS,
];

export const CONNECTION_LOOKUPS: Readonly<Record<ConnectionPurpose, readonly ConnectionLookup[]>> = {
  comments: COMMENT_LOOKUPS,
  replies: REPLY_LOOKUPS,
};

export function findConnection(
  payload: unknown,
  lookups: readonly ConnectionLookup[]
): UnknownRecord | undefined {
  for (const lookup of lookups) {
    const connection = lookup(payload);
    if (connection) {
      return connection;
    }
  }
  return undefined;
}

export function readPageInfo(value: unknown): PageInfo {
  if (!isRecord(value)) {
    return { hasNextPage: false };
  }
  const endCursor = value.end_cursor;
  return {
    hasNextPage: Boolean(value.has_next_page),
    endCursor: typeof endCursor === "string" && endCursor.length > 0 ? endCursor : undefined,
  };
}

/**
 * Reads edges, page info and total count out of a connection mapping
 */
export function readConnection(connection: UnknownRecord | undefined): ConnectionPage {
  if (!connection) {
    return { edges: [], pageInfo: { hasNextPage: false } };
  }
  const { edges, page_info: pageInfo, count } = connection;
  return {
    edges: Array.isArray(edges) ? edges : [],
    pageInfo: readPageInfo(pageInfo),
    totalCount: typeof count === "number" && Number.isFinite(count) ? count : undefined,
  };
}

/**
 * Never throws: a payload with no recognisable connection reads as an
 * empty last page.
 */
export function extractConnection(payload: unknown, purpose: ConnectionPurpose): ConnectionPage {
  return readConnection(findConnection(payload, CONNECTION_LOOKUPS[purpose]));
}

/**
 * Unwraps `{ node }` edge wrappers, skipping anything without a node
 */
export function edgeNodes(edges: readonly unknown[]): UnknownRecord[] {
  const nodes: UnknownRecord[] = [];
  for (const edge of edges) {
    const node = isRecord(edge) ? edge.node : undefined;
    if (isRecord(node) && Object.keys(node).length > 0) {
      nodes.push(node);
    }
  }
  return nodes;
}

export interface PostIdentityFields {
  mediaId: string | null;
  ownerId: string | null;
  caption: string | null;
  /** Unix seconds */
  takenAt: number | null;
}

function asId(value: unknown): string | null {
  if (typeof value === "string" && value.length > 0) return value;
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return null;
}

/**
 * Identity fields of the post lookup response; each field is read on its own
 */
export function extractPostIdentityFields(payload: unknown): PostIdentityFields {
  const caption = pickFirstPath(payload, POST_CAPTION_PATHS);
  const takenAt = pickFirstPath(payload, POST_TIMESTAMP_PATHS);
  return {
    mediaId: asId(pickFirstPath(payload, POST_MEDIA_ID_PATHS)),
    ownerId: asId(pickFirstPath(payload, POST_OWNER_ID_PATHS)),
    caption: typeof caption === "string" ? caption : null,
    takenAt: typeof takenAt === "number" && Number.isFinite(takenAt) ? takenAt : null,
  };
}
