/**
 * Turns endpoint descriptors into HTTP calls with rate limiting, retries
 * and raw response archiving.
 *
 * Request failures never throw out of here: every exhausted or
 * non-retryable call comes back as null and the caller decides.
 */

import type { EndpointDescriptor } from '../types/config';
import type { JsonObject, JsonValue } from '../types/json';
import { createEnhancedLogger } from '../utils/logger';
import { linearBackoffMs, sleep as defaultSleep } from '../utils/retry';
import type { SleepFn } from '../utils/retry';
import { ErrorClassifier, ScraperError, ScraperErrors } from './errors';
import type { HttpResponse, HttpTransport, RequestFields } from './http-transport';
import type { RequestRateLimiter } from './rate-limiter';
import type { RawResponseStore } from './raw-response-store';
import { isRecord } from './response-navigator';
import type { UnknownRecord } from './response-navigator';

const logger = createEnhancedLogger('RequestExecutor');

export interface PreparedRequest {
  method: string;
  url: string;
  params: RequestFields;
  data: RequestFields;
}

export interface RequestExecutorSettings {
  retryAttempts: number;
  /** Seconds */
  retryDelay: number;
  /** Seconds */
  timeout: number;
}

export interface RequestExecutorDeps {
  transport: HttpTransport;
  rateLimiter: RequestRateLimiter;
  rawStore: RawResponseStore;
  settings: RequestExecutorSettings;
  sleep?: SleepFn;
}

function toField(value: JsonValue): string | number | boolean | null {
  if (value === null || typeof value !== 'object') {
    return value;
  }
  return JSON.stringify(value);
}

function assignFields(target: RequestFields, source: JsonObject): void {
  for (const [key, value] of Object.entries(source)) {
    target[key] = toField(value);
  }
}

/**
 * GraphQL endpoints carry the document id and JSON-encoded variables in the
 * form body; REST endpoints send fixed params in the query and variables in
 * the body. GET requests fold the body into the query.
 */
export function buildRequest(endpoint: EndpointDescriptor, variables: JsonObject): PreparedRequest {
  if (!endpoint.url) {
    throw ScraperErrors.invalidConfiguration('Endpoint URL missing', { endpointType: endpoint.type });
  }

  const method = (endpoint.method || 'POST').toUpperCase();
  let params: RequestFields = {};
  let data: RequestFields = {};
  const hasVariables = Object.keys(variables).length > 0;
  const fixedParams = endpoint.params && Object.keys(endpoint.params).length > 0 ? endpoint.params : undefined;

  if ((endpoint.type || 'graphql') === 'graphql') {
    if (endpoint.doc_id) data.doc_id = endpoint.doc_id;
    if (endpoint.query_hash) data.query_hash = endpoint.query_hash;
    if (fixedParams) assignFields(data, fixedParams);
    if (hasVariables) data.variables = JSON.stringify(variables);
  } else {
    if (fixedParams) assignFields(params, fixedParams);
    if (hasVariables) assignFields(data, variables);
  }

  if (method === 'GET') {
    params = { ...params, ...data };
    data = {};
  }

  return { method, url: endpoint.url, params, data };
}

/**
 * Response bodies that are not a JSON object are kept as `{ error: <text> }`
 */
export function parseResponseBody(body: string): UnknownRecord {
  try {
    const parsed: unknown = JSON.parse(body);
    if (isRecord(parsed)) {
      return parsed;
    }
  } catch {
    // fall through to the text wrapper
  }
  return { error: body };
}

export class RequestExecutor {
  private readonly transport: HttpTransport;
  private readonly rateLimiter: RequestRateLimiter;
  private readonly rawStore: RawResponseStore;
  private readonly settings: RequestExecutorSettings;
  private readonly sleep: SleepFn;

  constructor(deps: RequestExecutorDeps) {
    this.transport = deps.transport;
    this.rateLimiter = deps.rateLimiter;
    this.rawStore = deps.rawStore;
    this.settings = deps.settings;
    this.sleep = deps.sleep ?? defaultSleep;
  }

  /**
   * Calls the endpoint; resolves to the parsed payload on HTTP 200, else null
   */
  async execute(endpoint: EndpointDescriptor, variables: JsonObject, label: string): Promise<UnknownRecord | null> {
    const request = buildRequest(endpoint, variables);
    const attempts = Math.max(1, this.settings.retryAttempts);

    for (let attempt = 1; attempt <= attempts; attempt++) {
      await this.rateLimiter.waitForSlot();

      const response = await this.trySend(request, label, attempt, attempts);
      if (!response) {
        if (attempt < attempts) {
          await this.sleep(this.settings.retryDelay * 1000);
        }
        continue;
      }

      const { status, body } = response;
      const payload = parseResponseBody(body);
      await this.rawStore.save(label, request.url, { params: request.params, data: request.data }, status, payload);

      if (status === 200) {
        return payload;
      }

      const failure = ScraperError.fromHttpResponse({ status }, { label, attempt, url: request.url });
      if (failure.retryable && attempt < attempts) {
        logger.warn(`${failure.message}, retrying (${attempt}/${attempts})`, { label, errorCode: failure.code });
        await this.sleep(linearBackoffMs(this.settings.retryDelay, attempt));
        continue;
      }

      logger.warn(`${failure.message}, giving up`, { label, attempt, errorCode: failure.code });
      return null;
    }

    return null;
  }

  private async trySend(
    request: PreparedRequest,
    label: string,
    attempt: number,
    attempts: number
  ): Promise<HttpResponse | null> {
    try {
      return await this.transport.send({ ...request, timeoutMs: this.settings.timeout * 1000 });
    } catch (error) {
      const classified = ErrorClassifier.classify(error, { label, attempt, url: request.url });
      if (attempt < attempts) {
        logger.warn(`Request error, retrying (${attempt}/${attempts})`, {
          label,
          errorCode: classified.code,
          message: classified.message,
        });
      } else {
        logger.error(`Request failed after ${attempts} attempts`, classified, { label });
      }
      return null;
    }
  }

  /**
   * Single rate-limited GET; the body on HTTP 200, otherwise null
   */
  async fetchText(url: string): Promise<string | null> {
    await this.rateLimiter.waitForSlot();
    try {
      const response = await this.transport.send({ method: 'GET', url, timeoutMs: this.settings.timeout * 1000 });
      if (response.status !== 200) {
        logger.debug(`GET ${url} returned HTTP ${response.status}`);
        return null;
      }
      return response.body;
    } catch (error) {
      const classified = ErrorClassifier.classify(error, { url });
      logger.warn('Page fetch failed', { url, errorCode: classified.code });
      return null;
    }
  }
}
