/**
 * Post identity resolution: shortcode parsing, offline media id decoding,
 * and the lookup-endpoint / HTML fallbacks.
 */

import {
  PLACEHOLDER_PREFIX,
  POST_HTML_MEDIA_ID_PATTERNS,
  POST_PAGE_URL,
  SHORTCODE_ALPHABET,
} from '../config/constants';
import type { PostIdentity } from '../types/comment';
import type { EndpointDescriptor } from '../types/config';
import { createEnhancedLogger } from '../utils/logger';
import { formatUnixSeconds } from '../utils/time';
import { validatePostUrl } from '../utils/validation';
import type { RequestExecutor } from './request-executor';
import { extractPostIdentityFields } from './response-navigator';
import { renderEndpointVariables } from './template-renderer';

const logger = createEnhancedLogger('PostResolver');

export function extractShortcode(postUrl: string): string | null {
  const validation = validatePostUrl(postUrl);
  return validation.valid ? validation.normalized ?? null : null;
}

/**
 * Decodes a shortcode as a big-endian base-64 number. Returns null for
 * empty input or characters outside the alphabet.
 */
export function shortcodeToMediaId(shortcode: string): string | null {
  if (!shortcode) {
    return null;
  }
  let value = 0n;
  for (const char of shortcode) {
    const digit = SHORTCODE_ALPHABET.indexOf(char);
    if (digit < 0) {
      return null;
    }
    value = value * 64n + BigInt(digit);
  }
  return value.toString();
}

/**
 * Present and not left at its `YOUR_...` template value
 */
export function isEndpointConfigured(
  endpoint: Readonly<EndpointDescriptor> | undefined
): endpoint is Readonly<EndpointDescriptor> {
  if (!endpoint) {
    return false;
  }
  return !String(endpoint.doc_id ?? '').startsWith(PLACEHOLDER_PREFIX);
}

export function findMediaIdInHtml(html: string, shortcode: string): string | null {
  for (const pattern of POST_HTML_MEDIA_ID_PATTERNS(shortcode)) {
    const match = pattern.exec(html);
    if (match) {
      return match[1];
    }
  }
  return null;
}

export interface PostResolution {
  mediaId: string | null;
  post: PostIdentity;
}

export class PostResolver {
  constructor(
    private readonly executor: RequestExecutor,
    private readonly endpoint: Readonly<EndpointDescriptor> | undefined
  ) {}

  async resolve(shortcode: string, postUrl: string): Promise<PostResolution> {
    const decoded = shortcodeToMediaId(shortcode);

    if (!isEndpointConfigured(this.endpoint)) {
      logger.info('post_by_shortcode endpoint not configured, using shortcode decode/HTML', { shortcode });
      const mediaId = decoded ?? (await this.resolveFromHtml(shortcode));
      return { mediaId, post: { url: postUrl, shortcode, media_id: mediaId } };
    }

    const variables = renderEndpointVariables(this.endpoint, {
      shortcode,
      media_id: null,
      cursor: null,
      comment_id: null,
    });
    const payload = await this.executor.execute(this.endpoint, variables, 'post_by_shortcode');

    if (!payload || Object.keys(payload).length === 0) {
      logger.warn('post_by_shortcode request failed, using shortcode decode', { shortcode });
      return { mediaId: decoded, post: { url: postUrl, shortcode, media_id: decoded } };
    }

    const fields = extractPostIdentityFields(payload);
    const mediaId = fields.mediaId ?? decoded;
    return {
      mediaId,
      post: {
        url: postUrl,
        shortcode,
        media_id: mediaId,
        owner_id: fields.ownerId,
        caption: fields.caption,
        created_at: fields.takenAt === null ? null : formatUnixSeconds(fields.takenAt),
      },
    };
  }

  async resolveFromHtml(shortcode: string): Promise<string | null> {
    const html = await this.executor.fetchText(POST_PAGE_URL(shortcode));
    return html ? findMediaIdInHtml(html, shortcode) : null;
  }
}
