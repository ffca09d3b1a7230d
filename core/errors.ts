/**
 * Error handling module for the comment crawler
 * Defines error types, codes, and classification logic
 */

/**
 * Standard error codes for the crawler
 */
export enum ErrorCode {
  // Network Errors
  NETWORK_ERROR = "NETWORK_ERROR",
  CONNECTION_REFUSED = "CONNECTION_REFUSED",
  TIMEOUT = "TIMEOUT",
  DNS_ERROR = "DNS_ERROR",

  // Authentication Errors
  AUTH_FAILED = "AUTH_FAILED",

  // Rate Limiting
  RATE_LIMIT_EXCEEDED = "RATE_LIMIT_EXCEEDED",

  // API Errors
  API_ERROR = "API_ERROR",
  NOT_FOUND = "NOT_FOUND",
  SERVER_ERROR = "SERVER_ERROR",

  // Input / Crawl control
  INVALID_INPUT = "INVALID_INPUT",
  INTERRUPTED = "INTERRUPTED",

  // System Errors
  UNKNOWN_ERROR = "UNKNOWN_ERROR",
  CONFIG_ERROR = "CONFIG_ERROR",
  FILE_SYSTEM_ERROR = "FILE_SYSTEM_ERROR",
}

/**
 * Context information for errors
 */
export interface ErrorContext {
  url?: string;
  shortcode?: string;
  commentId?: string;
  operation?: string;
  statusCode?: number;
  attempt?: number;
  [key: string]: unknown;
}

/**
 * HTTP statuses worth another attempt
 */
export const RETRYABLE_STATUS_CODES: readonly number[] = [429, 500, 502, 503, 504];

/**
 * Custom error class for crawler errors
 */
export class ScraperError extends Error {
  public readonly code: ErrorCode;
  public readonly retryable: boolean;
  public readonly context: ErrorContext;
  public readonly timestamp: Date;
  public readonly originalError?: Error;
  public readonly statusCode?: number;

  constructor(
    code: ErrorCode,
    message: string,
    options: {
      retryable?: boolean;
      context?: ErrorContext;
      originalError?: Error;
      statusCode?: number;
    } = {}
  ) {
    super(message);
    this.name = "ScraperError";
    this.code = code;
    this.retryable = options.retryable ?? false;
    this.context = options.context || {};
    this.timestamp = new Date();
    this.originalError = options.originalError;
    this.statusCode = options.statusCode;

    // Capture stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ScraperError);
    }
  }

  /**
   * Create ScraperError from an HTTP status
   */
  public static fromHttpResponse(
    response: { status: number; statusText?: string },
    context?: ErrorContext
  ): ScraperError {
    const statusCode = response.status;
    const statusText = response.statusText || String(statusCode);
    const retryable = RETRYABLE_STATUS_CODES.includes(statusCode);

    if (statusCode === 429) {
      return new ScraperError(
        ErrorCode.RATE_LIMIT_EXCEEDED,
        `Rate limit exceeded: ${statusText}`,
        { retryable, statusCode, context }
      );
    }

    if (statusCode === 401 || statusCode === 403) {
      return new ScraperError(
        ErrorCode.AUTH_FAILED,
        `Authentication failed: ${statusText}`,
        { retryable, statusCode, context }
      );
    }

    if (statusCode === 404) {
      return new ScraperError(
        ErrorCode.NOT_FOUND,
        `Not found: ${statusText}`,
        { retryable, statusCode, context }
      );
    }

    if (statusCode >= 500) {
      return new ScraperError(
        ErrorCode.SERVER_ERROR,
        `Server error: ${statusText}`,
        { retryable, statusCode, context }
      );
    }

    return new ScraperError(
      ErrorCode.API_ERROR,
      `HTTP ${statusCode}: ${statusText}`,
      { retryable, statusCode, context }
    );
  }

}

/**
 * Factory for creating common errors
 */
export const ScraperErrors = {
  invalidPostUrl: (url: string) =>
    new ScraperError(ErrorCode.INVALID_INPUT, `Invalid Instagram post URL: ${url}`, {
      retryable: false,
      context: { url },
    }),

  invalidConfiguration: (message: string, context?: ErrorContext) =>
    new ScraperError(ErrorCode.CONFIG_ERROR, message, {
      retryable: false,
      context,
    }),

  interrupted: (context?: ErrorContext) =>
    new ScraperError(ErrorCode.INTERRUPTED, "Crawl interrupted by stop signal", {
      retryable: false,
      context,
    }),

  fileSystemError: (message: string, originalError?: Error, context?: ErrorContext) =>
    new ScraperError(ErrorCode.FILE_SYSTEM_ERROR, message, {
      retryable: false,
      originalError,
      context,
    }),
};

function errorCodeOf(error: unknown): string | undefined {
  if (error && typeof error === "object" && "code" in error) {
    const { code } = error;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

/**
 * Utility to classify unknown errors
 */
export class ErrorClassifier {
  /**
   * Classify an unknown error into a ScraperError
   */
  public static classify(error: unknown, context?: ErrorContext): ScraperError {
    if (error instanceof ScraperError) {
      if (context) {
        // Merge context if provided
        Object.assign(error.context, context);
      }
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);
    const originalError = error instanceof Error ? error : undefined;
    const lowerMessage = message.toLowerCase();
    const code = errorCodeOf(error);

    if (code === "ECONNREFUSED") {
      return new ScraperError(ErrorCode.CONNECTION_REFUSED, message, {
        retryable: true,
        context,
        originalError,
      });
    }

    if (code === "ENOTFOUND" || code === "EAI_AGAIN") {
      return new ScraperError(ErrorCode.DNS_ERROR, message, {
        retryable: true,
        context,
        originalError,
      });
    }

    // Timeouts
    if (
      code === "ECONNABORTED" ||
      code === "ETIMEDOUT" ||
      lowerMessage.includes("timeout") ||
      lowerMessage.includes("timed out")
    ) {
      return new ScraperError(ErrorCode.TIMEOUT, message, {
        retryable: true,
        context,
        originalError,
      });
    }

    // Rate Limiting
    if (
      lowerMessage.includes("rate limit") ||
      lowerMessage.includes("too many requests") ||
      lowerMessage.includes("429")
    ) {
      return new ScraperError(ErrorCode.RATE_LIMIT_EXCEEDED, message, {
        retryable: true,
        context,
        originalError,
      });
    }

    // Network Errors
    if (
      code === "ECONNRESET" ||
      code === "EPIPE" ||
      lowerMessage.includes("network") ||
      lowerMessage.includes("connection refused") ||
      lowerMessage.includes("socket hang up") ||
      lowerMessage.includes("fetch failed")
    ) {
      return new ScraperError(ErrorCode.NETWORK_ERROR, message, {
        retryable: true,
        context,
        originalError,
      });
    }

    // Authentication
    if (
      lowerMessage.includes("unauthorized") ||
      lowerMessage.includes("401") ||
      lowerMessage.includes("403")
    ) {
      return new ScraperError(ErrorCode.AUTH_FAILED, message, {
        retryable: false,
        context,
        originalError,
      });
    }

    // Default to Unknown Error
    return new ScraperError(ErrorCode.UNKNOWN_ERROR, message, {
      retryable: false,
      context,
      originalError,
    });
  }

  /**
   * Check if an error represents a cooperative stop
   */
  public static isInterruption(error: unknown): boolean {
    return error instanceof ScraperError && error.code === ErrorCode.INTERRUPTED;
  }
}
