/**
 * Configuration Manager
 *
 * Builds the immutable crawler configuration.
 * Priority: environment variables > config file > defaults
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { DEFAULT_DATA_DIR, DEFAULT_SETTINGS, DEFAULT_USER_AGENT, REQUIRED_COOKIES } from '../config/constants';
import { parseEnv } from '../core/env';
import type { Env } from '../core/env';
import { ScraperErrors } from '../core/errors';
import { normalizeRawResponseMode } from '../core/raw-response-store';
import type { CrawlerConfig, CrawlerSettings, EndpointDescriptor, EndpointName, ProxySettings } from '../types/config';
import type { JsonObject, JsonValue } from '../types/json';
import { isJsonObject } from '../types/json';
import { createEnhancedLogger } from './logger';
import { isPlaceholderValue } from './validation';

const logger = createEnhancedLogger('ConfigManager');

export const DEFAULT_CONFIG_FILE = 'config.json';

const ENDPOINT_NAMES: readonly EndpointName[] = ['post_by_shortcode', 'comments', 'comment_replies'];

const GRAPHQL_URL = 'https://www.instagram.com/api/graphql';

/**
 * Built-in defaults, in config file shape. `YOUR_...` values are placeholders
 * that keep an endpoint or credential switched off until filled in.
 */
const DEFAULT_FILE_CONFIG: JsonObject = {
  instagram: {
    authentication: {
      cookies: {
        sessionid: 'YOUR_SESSIONID_HERE',
        csrftoken: 'YOUR_CSRFTOKEN_HERE',
        ds_user_id: 'YOUR_DS_USER_ID_HERE',
        rur: 'YOUR_RUR_HERE',
      },
      headers: {
        'X-CSRFToken': 'YOUR_X_CSRF_TOKEN_HERE',
        'X-IG-App-ID': 'YOUR_X_IG_APP_ID_HERE',
        'X-IG-WWW-Claim': 'YOUR_X_IG_WWW_CLAIM_HERE',
        'X-ASBD-ID': 'YOUR_X_ASBD_ID_HERE',
        Referer: 'https://www.instagram.com/',
        'User-Agent': DEFAULT_USER_AGENT,
      },
    },
    endpoints: {
      post_by_shortcode: {
        type: 'graphql',
        method: 'POST',
        url: GRAPHQL_URL,
        doc_id: 'YOUR_DOC_ID_HERE',
        variables: { shortcode: '{shortcode}' },
      },
      comments: {
        type: 'graphql',
        method: 'POST',
        url: GRAPHQL_URL,
        doc_id: 'YOUR_DOC_ID_HERE',
        variables: { shortcode: '{shortcode}', first: 50, after: '{cursor}' },
      },
      comment_replies: {
        type: 'graphql',
        method: 'POST',
        url: GRAPHQL_URL,
        doc_id: 'YOUR_DOC_ID_HERE',
        variables: { comment_id: '{comment_id}', first: 50, after: '{cursor}' },
      },
    },
    settings: {
      requests_per_minute: DEFAULT_SETTINGS.requestsPerMinute,
      retry_attempts: DEFAULT_SETTINGS.retryAttempts,
      retry_delay: DEFAULT_SETTINGS.retryDelay,
      timeout: DEFAULT_SETTINGS.timeout,
      max_comments: DEFAULT_SETTINGS.maxComments,
      fetch_replies: DEFAULT_SETTINGS.fetchReplies,
      resume_by_default: DEFAULT_SETTINGS.resumeByDefault,
      comments_first: DEFAULT_SETTINGS.commentsPageSize,
      replies_first: DEFAULT_SETTINGS.repliesPageSize,
      request_jitter_ratio: DEFAULT_SETTINGS.jitterRatio,
      save_raw_responses: DEFAULT_SETTINGS.saveRawResponses,
      raw_responses_keep: DEFAULT_SETTINGS.rawResponsesKeep,
      raw_responses_max_mb: DEFAULT_SETTINGS.rawResponsesMaxMb,
      page_retry_attempts: DEFAULT_SETTINGS.pageRetryAttempts,
      page_retry_delay: DEFAULT_SETTINGS.pageRetryDelay,
      data_dir: DEFAULT_DATA_DIR,
    },
    proxy: {
      http: null,
      https: null,
    },
  },
};

// ==================== File schema ====================

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)])
);

const jsonObjectSchema = z.record(jsonValueSchema);

const endpointSchema = z.object({
  type: z.enum(['graphql', 'rest']).default('graphql'),
  method: z.string().default('POST'),
  url: z.string().min(1, 'Endpoint URL missing'),
  doc_id: z.union([z.string(), z.number()]).transform(String).optional(),
  query_hash: z.string().optional(),
  params: jsonObjectSchema.optional(),
  variables: jsonObjectSchema.default({}),
});

// Credential values may be numbers in hand-written files
const stringMapSchema = z.record(z.union([z.string(), z.number()]).nullable()).transform((values) => {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== null) {
      result[key] = String(value);
    }
  }
  return result;
});

const settingsSchema = z.object({
  requests_per_minute: z.number(),
  retry_attempts: z.number().int(),
  retry_delay: z.number().nonnegative(),
  timeout: z.number().positive(),
  max_comments: z.number().int().nonnegative(),
  fetch_replies: z.boolean(),
  resume_by_default: z.boolean(),
  comments_first: z.number().int().nonnegative(),
  replies_first: z.number().int().nonnegative(),
  request_jitter_ratio: z.number(),
  save_raw_responses: z.union([z.string(), z.boolean(), z.number()]).transform(String),
  raw_responses_keep: z.number().int(),
  raw_responses_max_mb: z.number(),
  page_retry_attempts: z.number().int().nonnegative(),
  page_retry_delay: z.number().nonnegative(),
  data_dir: z.string().min(1),
});

const fileConfigSchema = z.object({
  instagram: z.object({
    authentication: z.object({
      cookies: stringMapSchema,
      headers: stringMapSchema,
    }),
    endpoints: z.object({
      post_by_shortcode: endpointSchema.optional(),
      comments: endpointSchema.optional(),
      comment_replies: endpointSchema.optional(),
    }),
    settings: settingsSchema,
    proxy: z
      .object({
        http: z.string().nullable().optional(),
        https: z.string().nullable().optional(),
      })
      .default({}),
  }),
});

export type FileConfig = z.infer<typeof fileConfigSchema>;

// ==================== Helpers ====================

/**
 * Recursively merges `update` into a copy of `base`; non-mapping values replace
 */
export function deepMerge(base: JsonObject, update: JsonObject): JsonObject {
  const merged: JsonObject = { ...base };
  for (const [key, value] of Object.entries(update)) {
    const current = merged[key];
    merged[key] = isJsonObject(current) && isJsonObject(value) ? deepMerge(current, value) : value;
  }
  return merged;
}

export function deepFreeze<T>(value: T): Readonly<T> {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`).join('; ');
}

function overlayEnv(config: FileConfig, env: Env): void {
  const { authentication, settings, proxy } = config.instagram;

  const cookieOverrides: Array<[string, string | undefined]> = [
    ['sessionid', env.IG_SESSIONID],
    ['csrftoken', env.IG_CSRFTOKEN],
    ['ds_user_id', env.IG_DS_USER_ID],
    ['rur', env.IG_RUR],
  ];
  const headerOverrides: Array<[string, string | undefined]> = [
    ['X-CSRFToken', env.IG_X_CSRF_TOKEN],
    ['X-IG-App-ID', env.IG_X_IG_APP_ID],
    ['X-IG-WWW-Claim', env.IG_X_IG_WWW_CLAIM],
    ['X-ASBD-ID', env.IG_X_ASBD_ID],
    ['User-Agent', env.IG_USER_AGENT],
    ['Referer', env.IG_REFERER],
  ];
  for (const [name, value] of cookieOverrides) {
    if (value !== undefined) authentication.cookies[name] = value;
  }
  for (const [name, value] of headerOverrides) {
    if (value !== undefined) authentication.headers[name] = value;
  }

  if (env.HTTP_PROXY !== undefined) proxy.http = env.HTTP_PROXY;
  if (env.HTTPS_PROXY !== undefined) proxy.https = env.HTTPS_PROXY;

  settings.requests_per_minute = env.IG_REQUESTS_PER_MINUTE ?? settings.requests_per_minute;
  settings.retry_attempts = env.IG_RETRY_ATTEMPTS ?? settings.retry_attempts;
  settings.retry_delay = env.IG_RETRY_DELAY ?? settings.retry_delay;
  settings.timeout = env.IG_TIMEOUT ?? settings.timeout;
  settings.max_comments = env.IG_MAX_COMMENTS ?? settings.max_comments;
  settings.fetch_replies = env.IG_FETCH_REPLIES ?? settings.fetch_replies;
  settings.resume_by_default = env.IG_RESUME_BY_DEFAULT ?? settings.resume_by_default;
  settings.comments_first = env.IG_COMMENTS_FIRST ?? settings.comments_first;
  settings.replies_first = env.IG_REPLIES_FIRST ?? settings.replies_first;
  settings.request_jitter_ratio = env.IG_JITTER_RATIO ?? settings.request_jitter_ratio;
  settings.save_raw_responses = env.IG_SAVE_RAW_RESPONSES ?? settings.save_raw_responses;
  settings.raw_responses_keep = env.IG_RAW_RESPONSES_KEEP ?? settings.raw_responses_keep;
  settings.raw_responses_max_mb = env.IG_RAW_RESPONSES_MAX_MB ?? settings.raw_responses_max_mb;
  settings.page_retry_attempts = env.IG_PAGE_RETRY_ATTEMPTS ?? settings.page_retry_attempts;
  settings.page_retry_delay = env.IG_PAGE_RETRY_DELAY ?? settings.page_retry_delay;
  settings.data_dir = env.DATA_DIR ?? settings.data_dir;
}

function toSettings(settings: FileConfig['instagram']['settings']): CrawlerSettings {
  return {
    requestsPerMinute: settings.requests_per_minute,
    retryAttempts: settings.retry_attempts,
    retryDelay: settings.retry_delay,
    timeout: settings.timeout,
    maxComments: settings.max_comments,
    fetchReplies: settings.fetch_replies,
    resumeByDefault: settings.resume_by_default,
    commentsPageSize: settings.comments_first,
    repliesPageSize: settings.replies_first,
    jitterRatio: settings.request_jitter_ratio,
    saveRawResponses: normalizeRawResponseMode(settings.save_raw_responses),
    rawResponsesKeep: settings.raw_responses_keep,
    rawResponsesMaxMb: settings.raw_responses_max_mb,
    pageRetryAttempts: settings.page_retry_attempts,
    pageRetryDelay: settings.page_retry_delay,
  };
}

function toProxy(proxy: FileConfig['instagram']['proxy']): ProxySettings | undefined {
  const http = proxy.http || undefined;
  const https = proxy.https || undefined;
  return http || https ? { http, https } : undefined;
}

function toConfig(file: FileConfig): CrawlerConfig {
  const { instagram } = file;
  const endpoints: Partial<Record<EndpointName, EndpointDescriptor>> = {};
  for (const name of ENDPOINT_NAMES) {
    const endpoint = instagram.endpoints[name];
    if (endpoint) {
      endpoints[name] = { ...endpoint, method: endpoint.method.toUpperCase() };
    }
  }

  return {
    dataDir: instagram.settings.data_dir,
    authentication: {
      cookies: instagram.authentication.cookies,
      headers: instagram.authentication.headers,
    },
    endpoints,
    settings: toSettings(instagram.settings),
    proxy: toProxy(instagram.proxy),
  };
}

// ==================== Manager ====================

export interface CredentialCheck {
  valid: boolean;
  missing: string[];
}

export class ConfigManager {
  private readonly configFile: string;
  private readonly config: CrawlerConfig;

  constructor(configFile: string = DEFAULT_CONFIG_FILE, env: NodeJS.ProcessEnv = process.env) {
    this.configFile = path.resolve(configFile);
    this.config = deepFreeze(this.load(env));
  }

  getConfig(): CrawlerConfig {
    return this.config;
  }

  getConfigFile(): string {
    return this.configFile;
  }

  /**
   * Required session cookies that are empty or still placeholders
   */
  validateCredentials(): CredentialCheck {
    const { cookies } = this.config.authentication;
    const missing = REQUIRED_COOKIES.filter((name) => isPlaceholderValue(cookies[name]));
    return { valid: missing.length === 0, missing };
  }

  private load(env: NodeJS.ProcessEnv): CrawlerConfig {
    const merged = deepMerge(DEFAULT_FILE_CONFIG, this.readConfigFile());

    const parsedFile = fileConfigSchema.safeParse(merged);
    if (!parsedFile.success) {
      throw ScraperErrors.invalidConfiguration(`Invalid config file: ${formatIssues(parsedFile.error)}`, {
        configFile: this.configFile,
      });
    }

    const parsedEnv = parseEnv(env);
    if (!parsedEnv.success) {
      throw ScraperErrors.invalidConfiguration(`Invalid environment: ${formatIssues(parsedEnv.error)}`);
    }

    overlayEnv(parsedFile.data, parsedEnv.data);
    return toConfig(parsedFile.data);
  }

  private readConfigFile(): JsonObject {
    if (!fs.existsSync(this.configFile)) {
      logger.debug(`Config file not found, using defaults: ${this.configFile}`);
      return {};
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(this.configFile, 'utf-8'));
    } catch (error) {
      throw ScraperErrors.invalidConfiguration(`Failed to read config file: ${String(error)}`, {
        configFile: this.configFile,
      });
    }

    const validated = jsonObjectSchema.safeParse(parsed);
    if (!validated.success) {
      throw ScraperErrors.invalidConfiguration('Config file must contain a JSON object', {
        configFile: this.configFile,
      });
    }
    logger.debug(`Loaded config from ${this.configFile}`);
    return validated.data;
  }
}

let configManagerInstance: ConfigManager | null = null;

export function getConfigManager(configFile?: string): ConfigManager {
  if (!configManagerInstance) {
    configManagerInstance = new ConfigManager(configFile);
  }
  return configManagerInstance;
}

export function resetConfigManager(): void {
  configManagerInstance = null;
}
