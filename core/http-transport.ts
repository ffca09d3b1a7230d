/**
 * HTTP capability used by the request executor.
 *
 * The executor only needs "send this, give me status and body"; the axios
 * implementation owns session headers, cookies, proxies and timeouts.
 */

import axios from 'axios';
import type { AxiosInstance, AxiosRequestConfig } from 'axios';
import { HttpsProxyAgent } from 'https-proxy-agent';
import { DEFAULT_REQUEST_HEADERS } from '../config/constants';
import type { AuthenticationConfig, ProxySettings } from '../types/config';
import type { JsonPrimitive } from '../types/json';
import { createEnhancedLogger } from '../utils/logger';
import { dropPlaceholders } from '../utils/validation';

const logger = createEnhancedLogger('HttpTransport');

export type RequestFields = Record<string, JsonPrimitive>;

export interface HttpRequest {
  method: string;
  url: string;
  params?: RequestFields;
  data?: RequestFields;
  headers?: Record<string, string>;
  timeoutMs: number;
}

export interface HttpResponse {
  status: number;
  body: string;
}

/**
 * Throws only when no response was received
 */
export interface HttpTransport {
  send(request: HttpRequest): Promise<HttpResponse>;
}

export interface AxiosTransportOptions {
  authentication: AuthenticationConfig;
  proxy?: ProxySettings;
}

export function buildCookieHeader(cookies: Readonly<Record<string, string>>): string {
  return Object.entries(dropPlaceholders(cookies))
    .map(([name, value]) => `${name}=${value}`)
    .join('; ');
}

export function buildSessionHeaders(authentication: AuthenticationConfig): Record<string, string> {
  const headers: Record<string, string> = {
    ...DEFAULT_REQUEST_HEADERS,
    ...dropPlaceholders(authentication.headers),
  };
  const cookie = buildCookieHeader(authentication.cookies);
  if (cookie) {
    headers.cookie = cookie;
  }
  return headers;
}

function toFormBody(data: RequestFields): string {
  const form = new URLSearchParams();
  for (const [key, value] of Object.entries(data)) {
    if (value !== null) {
      form.append(key, String(value));
    }
  }
  return form.toString();
}

export class AxiosHttpTransport implements HttpTransport {
  private axiosInstance: AxiosInstance;

  constructor(options: AxiosTransportOptions) {
    const axiosConfig: AxiosRequestConfig = {
      headers: buildSessionHeaders(options.authentication),
      validateStatus: () => true, // Status codes are handled by the executor
      responseType: 'text',
      transformResponse: [(data: unknown) => data],
      proxy: false,
    };

    const proxyUrl = options.proxy?.https || options.proxy?.http;
    if (proxyUrl) {
      const agent = new HttpsProxyAgent(proxyUrl);
      axiosConfig.httpsAgent = agent;
      axiosConfig.httpAgent = agent;
      logger.info('Using proxy agent', { proxy: new URL(proxyUrl).host });
    }

    this.axiosInstance = axios.create(axiosConfig);
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    const hasBody = request.data !== undefined && Object.keys(request.data).length > 0;
    const response = await this.axiosInstance.request<unknown>({
      method: request.method,
      url: request.url,
      params: request.params,
      data: hasBody && request.data ? toFormBody(request.data) : undefined,
      headers: {
        ...(hasBody ? { 'content-type': 'application/x-www-form-urlencoded' } : {}),
        ...request.headers,
      },
      timeout: request.timeoutMs,
    });

    return {
      status: response.status,
      body: typeof response.data === 'string' ? response.data : JSON.stringify(response.data ?? ''),
    };
  }
}
