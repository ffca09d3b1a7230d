import { z } from 'zod';

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);

// Empty variables count as unset
const optionalString = z
  .string()
  .optional()
  .transform((val) => (val === undefined || val.trim() === '' ? undefined : val));

const optionalInt = optionalString.pipe(
  z
    .string()
    .regex(/^-?\d+$/, 'Expected an integer')
    .transform((val) => parseInt(val, 10))
    .optional()
);

const optionalFloat = optionalString.pipe(
  z
    .string()
    .regex(/^-?\d+(\.\d+)?$/, 'Expected a number')
    .transform((val) => parseFloat(val))
    .optional()
);

const optionalBool = optionalString.transform((val) =>
  val === undefined ? undefined : TRUE_VALUES.has(val.trim().toLowerCase())
);

const envSchema = z.object({
  // Node Environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Cookies
  IG_SESSIONID: optionalString,
  IG_CSRFTOKEN: optionalString,
  IG_DS_USER_ID: optionalString,
  IG_RUR: optionalString,

  // Headers
  IG_X_CSRF_TOKEN: optionalString,
  IG_X_IG_APP_ID: optionalString,
  IG_X_IG_WWW_CLAIM: optionalString,
  IG_X_ASBD_ID: optionalString,
  IG_USER_AGENT: optionalString,
  IG_REFERER: optionalString,

  // Proxy
  HTTP_PROXY: optionalString,
  HTTPS_PROXY: optionalString,

  // Crawler settings
  IG_REQUESTS_PER_MINUTE: optionalInt,
  IG_RETRY_ATTEMPTS: optionalInt,
  IG_RETRY_DELAY: optionalFloat,
  IG_TIMEOUT: optionalFloat,
  IG_MAX_COMMENTS: optionalInt,
  IG_FETCH_REPLIES: optionalBool,
  IG_RESUME_BY_DEFAULT: optionalBool,
  IG_COMMENTS_FIRST: optionalInt,
  IG_REPLIES_FIRST: optionalInt,
  IG_JITTER_RATIO: optionalFloat,
  IG_SAVE_RAW_RESPONSES: optionalString.transform((val) => val?.trim().toLowerCase()),
  IG_RAW_RESPONSES_KEEP: optionalInt,
  IG_RAW_RESPONSES_MAX_MB: optionalFloat,
  IG_PAGE_RETRY_ATTEMPTS: optionalInt,
  IG_PAGE_RETRY_DELAY: optionalFloat,

  // Storage
  DATA_DIR: optionalString,

  // Logging
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type Env = z.infer<typeof envSchema>;

export type EnvParseResult = ReturnType<typeof envSchema.safeParse>;

/**
 * Validates the crawler's environment variables
 */
export function parseEnv(source: NodeJS.ProcessEnv = process.env): EnvParseResult {
  return envSchema.safeParse(source);
}
