/**
 * Configuration types and interfaces
 * Centralized configuration for the comment crawler
 */

import type { JsonObject } from "./json";

/**
 * Logical endpoints the crawler knows how to call
 */
export type EndpointName = "post_by_shortcode" | "comments" | "comment_replies";

export type EndpointKind = "graphql" | "rest";

/**
 * Static description of one upstream endpoint, as captured from the web client
 */
export interface EndpointDescriptor {
  /** Transport flavour: GraphQL document or plain REST call */
  type: EndpointKind;
  /** Upper-cased HTTP method */
  method: string;
  url: string;
  /** Persisted GraphQL document id */
  doc_id?: string;
  /** Legacy GraphQL query hash */
  query_hash?: string;
  /** Extra fixed parameters sent with every call */
  params?: JsonObject;
  /** Variables template with `{shortcode}`, `{media_id}`, `{cursor}`, `{comment_id}` placeholders */
  variables: JsonObject;
}

export type RawResponseMode = "none" | "errors" | "all";

/**
 * Tunable crawler behaviour
 */
export interface CrawlerSettings {
  requestsPerMinute: number;
  retryAttempts: number;
  /** Seconds */
  retryDelay: number;
  /** Seconds */
  timeout: number;
  /** 0 disables the cap */
  maxComments: number;
  fetchReplies: boolean;
  resumeByDefault: boolean;
  commentsPageSize: number;
  repliesPageSize: number;
  jitterRatio: number;
  saveRawResponses: RawResponseMode;
  rawResponsesKeep: number;
  rawResponsesMaxMb: number;
  pageRetryAttempts: number;
  /** Seconds */
  pageRetryDelay: number;
}

export interface ProxySettings {
  http?: string;
  https?: string;
}

export interface AuthenticationConfig {
  cookies: Readonly<Record<string, string>>;
  headers: Readonly<Record<string, string>>;
}

/**
 * Immutable configuration value built once at startup
 */
export interface CrawlerConfig {
  readonly dataDir: string;
  readonly authentication: Readonly<AuthenticationConfig>;
  readonly endpoints: Readonly<Partial<Record<EndpointName, Readonly<EndpointDescriptor>>>>;
  readonly settings: Readonly<CrawlerSettings>;
  readonly proxy?: Readonly<ProxySettings>;
}

/**
 * Per-run overrides coming from the CLI
 */
export interface CrawlOptions {
  maxComments?: number;
  resume?: boolean;
  fetchReplies?: boolean;
}
