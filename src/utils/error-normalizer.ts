import type { AuthErrorKind, OAuthError } from '../types.js';
import { AuthError } from '../errors.js';
import { isRecord } from './guards.js';
import createError from 'http-errors';
import { StatusCodes, ReasonPhrases } from 'http-status-codes';

export type ErrorContext = { endpoint?: string; source?: string };

/**
 * Error creation using http-errors for standardized error objects
 */
class ErrorBuilder {
  constructor(
    private readonly httpError: createError.HttpError,
    private readonly error: string,
    private readonly kindOverride?: AuthErrorKind
  ) {}

  withContext(kind: AuthErrorKind, context: ErrorContext): AuthError {
    const init: OAuthError = {
      kind: this.kindOverride ?? kind,
      statusCode: this.httpError.statusCode,
      error: this.error,
      error_description: this.httpError.message,
    };

    if (context.endpoint !== undefined) {
      init.endpoint = context.endpoint;
    }
    if (context.source !== undefined) {
      init.source = context.source;
    }

    return new AuthError(init);
  }
}

/**
 * Build an error using http-errors
 */
function buildError(
  statusCode: number,
  error: string,
  description?: string,
  kindOverride?: AuthErrorKind
): ErrorBuilder {
  // http-errors deprecates non-4xx/5xx status codes; coerce to 500 in those cases
  const statusForHttpError =
    statusCode >= 400 && statusCode < 600
      ? statusCode
      : StatusCodes.INTERNAL_SERVER_ERROR;
  const httpError = description
    ? createError(statusForHttpError, description)
    : createError(statusForHttpError);
  return new ErrorBuilder(httpError, error, kindOverride);
}

/**
 * Build a well-formed AuthError from an OAuth error code and description.
 */
export function createStandardError(
  kind: AuthErrorKind,
  error: string,
  description: string,
  context: ErrorContext = {},
  statusCode: number = StatusCodes.BAD_REQUEST
): AuthError {
  return buildError(statusCode, error, description).withContext(kind, context);
}

/**
 * Utility class for normalizing heterogeneous error shapes from HTTP transports,
 * cache clients, and native errors into AuthError instances.
 */
export class ErrorNormalizer {
  /**
   * Normalize unknown error into an AuthError of the given kind.
   * Timeouts and aborts always come out as kind `Timeout`; AuthErrors pass through.
   */
  static normalizeError(
    e: unknown,
    kind: AuthErrorKind,
    context: ErrorContext = {}
  ): AuthError {
    if (e instanceof AuthError) {
      return e;
    }

    const errorContext: ErrorContext = {};
    if (context.endpoint !== undefined) errorContext.endpoint = context.endpoint;
    if (context.source !== undefined) errorContext.source = context.source;

    // Try each error format in order of specificity
    return (
      this.tryTimeoutShape(e) ??
      this.tryOAuthErrorShape(e) ??
      this.tryHttpResponseShape(e) ??
      this.tryNativeErrorShape(e) ??
      this.tryStringErrorShape(e) ??
      this.createFallbackError()
    ).withContext(kind, errorContext);
  }

  /**
   * Abort and timeout signals raised by fetch, AbortSignal.timeout or withTimeout
   */
  private static tryTimeoutShape(e: unknown): ErrorBuilder | null {
    if (!(e instanceof Error)) return null;
    if (e.name !== 'TimeoutError' && e.name !== 'AbortError') return null;

    return buildError(
      StatusCodes.GATEWAY_TIMEOUT,
      'temporarily_unavailable',
      e.message || ReasonPhrases.GATEWAY_TIMEOUT,
      'Timeout'
    );
  }

  /**
   * Try parsing as existing OAuth error shape
   */
  private static tryOAuthErrorShape(e: unknown): ErrorBuilder | null {
    const obj = this.asObject(e);
    if (!obj) return null;

    const error = this.readString(obj, 'error');
    const statusCode =
      this.readNumber(obj, 'statusCode') ?? this.readNumber(obj, 'status');

    if (error && typeof statusCode === 'number') {
      const description =
        this.readString(obj, 'error_description') ??
        this.readString(obj, 'message');
      return buildError(statusCode, error, description);
    }
    return null;
  }

  /**
   * Try parsing as an HTTP response (transport result or fetch Response)
   */
  private static tryHttpResponseShape(e: unknown): ErrorBuilder | null {
    const obj = this.asObject(e);
    if (!obj) return null;

    const statusCode = this.readNumber(obj, 'status');
    if (typeof statusCode !== 'number') return null;

    const description =
      this.readString(obj, 'statusText') || this.getReasonPhrase(statusCode);
    const error =
      this.readString(obj, 'error') ?? this.mapStatusToOAuthError(statusCode);

    return buildError(statusCode, error, description);
  }

  /**
   * Try parsing as native Error instance
   */
  private static tryNativeErrorShape(e: unknown): ErrorBuilder | null {
    if (!(e instanceof Error)) return null;

    let statusCode: number = StatusCodes.INTERNAL_SERVER_ERROR;
    let error = 'server_error';
    let kindOverride: AuthErrorKind | undefined;

    // Heuristic mapping using http-status-codes
    if (/timeout|timed out|ETIMEDOUT/i.test(e.message)) {
      error = 'temporarily_unavailable';
      statusCode = StatusCodes.GATEWAY_TIMEOUT;
      kindOverride = 'Timeout';
    } else if (/network|fetch|ECONNREFUSED|ECONNRESET/i.test(e.message)) {
      statusCode = StatusCodes.SERVICE_UNAVAILABLE;
    } else if (/unauthorized|401/i.test(e.message)) {
      error = 'unauthorized';
      statusCode = StatusCodes.UNAUTHORIZED;
    } else if (/forbidden|403/i.test(e.message)) {
      error = 'access_denied';
      statusCode = StatusCodes.FORBIDDEN;
    }

    return buildError(statusCode, error, e.message, kindOverride);
  }

  /**
   * Try parsing as string primitive
   */
  private static tryStringErrorShape(e: unknown): ErrorBuilder | null {
    return typeof e === 'string'
      ? buildError(StatusCodes.INTERNAL_SERVER_ERROR, 'server_error', e)
      : null;
  }

  /**
   * Create fallback error for unrecognized shapes
   */
  private static createFallbackError(): ErrorBuilder {
    return buildError(
      StatusCodes.INTERNAL_SERVER_ERROR,
      'server_error',
      ReasonPhrases.INTERNAL_SERVER_ERROR
    );
  }

  /**
   * Map HTTP status codes to OAuth error codes
   */
  static mapStatusToOAuthError(statusCode: number): string {
    switch (statusCode) {
      case StatusCodes.BAD_REQUEST:
      case StatusCodes.NOT_FOUND:
        return 'invalid_request';
      case StatusCodes.UNAUTHORIZED:
        return 'unauthorized';
      case StatusCodes.FORBIDDEN:
        return 'access_denied';
      case StatusCodes.TOO_MANY_REQUESTS:
      case StatusCodes.GATEWAY_TIMEOUT:
        return 'temporarily_unavailable';
      default:
        return statusCode >= 400 && statusCode < 500
          ? 'invalid_request'
          : 'server_error';
    }
  }

  private static getReasonPhrase(statusCode: number): string {
    const reasonPhrases: Record<number, string> = {
      [StatusCodes.BAD_REQUEST]: ReasonPhrases.BAD_REQUEST,
      [StatusCodes.UNAUTHORIZED]: ReasonPhrases.UNAUTHORIZED,
      [StatusCodes.FORBIDDEN]: ReasonPhrases.FORBIDDEN,
      [StatusCodes.NOT_FOUND]: ReasonPhrases.NOT_FOUND,
      [StatusCodes.TOO_MANY_REQUESTS]: ReasonPhrases.TOO_MANY_REQUESTS,
      [StatusCodes.INTERNAL_SERVER_ERROR]: ReasonPhrases.INTERNAL_SERVER_ERROR,
      [StatusCodes.BAD_GATEWAY]: ReasonPhrases.BAD_GATEWAY,
      [StatusCodes.SERVICE_UNAVAILABLE]: ReasonPhrases.SERVICE_UNAVAILABLE,
      [StatusCodes.GATEWAY_TIMEOUT]: ReasonPhrases.GATEWAY_TIMEOUT,
    };

    return reasonPhrases[statusCode] ?? `HTTP ${statusCode}`;
  }

  private static asObject(v: unknown): Record<string, unknown> | null {
    return isRecord(v) ? v : null;
  }

  private static readNumber(
    obj: Record<string, unknown>,
    key: string
  ): number | undefined {
    const value = obj[key];
    return typeof value === 'number' ? value : undefined;
  }

  private static readString(
    obj: Record<string, unknown>,
    key: string
  ): string | undefined {
    const value = obj[key];
    return typeof value === 'string' ? value : undefined;
  }
}
