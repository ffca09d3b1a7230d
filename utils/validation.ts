/**
 * Input validation helpers
 */

import { PLACEHOLDER_PREFIX, POST_URL_PATTERN } from '../config/constants';

export interface ValidationResult {
  valid: boolean;
  error?: string;
  normalized?: string;
}

/**
 * Empty values and untouched `YOUR_...` template values
 */
export function isPlaceholderValue(value: unknown): boolean {
  if (typeof value !== 'string') {
    return value === undefined || value === null;
  }
  const trimmed = value.trim();
  return trimmed.length === 0 || trimmed.startsWith(PLACEHOLDER_PREFIX);
}

/**
 * Keeps only entries that carry a real value
 */
export function dropPlaceholders(values: Readonly<Record<string, string>>): Record<string, string> {
  const kept: Record<string, string> = {};
  for (const [key, value] of Object.entries(values)) {
    if (!isPlaceholderValue(value)) {
      kept[key] = value;
    }
  }
  return kept;
}

/**
 * Validates a post permalink; `normalized` is the shortcode
 */
export function validatePostUrl(url: unknown): ValidationResult {
  if (!url) {
    return { valid: false, error: 'Post URL must not be empty' };
  }

  if (typeof url !== 'string') {
    return { valid: false, error: 'Post URL must be a string' };
  }

  const match = POST_URL_PATTERN.exec(url.trim());
  if (!match) {
    return { valid: false, error: 'Expected an instagram.com/p/, /reel/ or /tv/ URL' };
  }

  return { valid: true, normalized: match[2] };
}
