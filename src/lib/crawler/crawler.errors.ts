/**
 * Crawler Error Handling
 * Failure taxonomy and classification of transport errors
 */

export enum CrawlErrorKind {
  CONNECTION_FAILURE = 'CONNECTION_FAILURE',
  DNS_FAILURE = 'DNS_FAILURE',
  TIMEOUT = 'TIMEOUT',
  HTTP_STATUS = 'HTTP_STATUS',
  REDIRECT_LIMIT_EXCEEDED = 'REDIRECT_LIMIT_EXCEEDED',
  SSL_VERIFICATION_FAILURE = 'SSL_VERIFICATION_FAILURE',
  PROXY_FAILURE = 'PROXY_FAILURE',
  PROXY_EXHAUSTION = 'PROXY_EXHAUSTION',
  INVALID_URL = 'INVALID_URL',
  INVALID_REQUEST = 'INVALID_REQUEST',
  EXTRACTION_FAILURE = 'EXTRACTION_FAILURE',
  CANCELLED = 'CANCELLED',
}

export interface CrawlErrorOptions {
  statusCode?: number;
  /** URL the failing response came from, after redirects */
  url?: string;
  cause?: unknown;
}

export class CrawlError extends Error {
  readonly kind: CrawlErrorKind;
  readonly statusCode?: number;
  readonly url?: string;

  constructor(kind: CrawlErrorKind, message: string, options: CrawlErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'CrawlError';
    this.kind = kind;
    this.statusCode = options.statusCode;
    this.url = options.url;
  }
}

/**
 * Raised when the crawler is used outside its setup()/cleanup() lifetime
 */
export class CrawlerStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CrawlerStateError';
  }
}

export class CrawlerConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid crawler configuration: ${issues.join('; ')}`);
    this.name = 'CrawlerConfigError';
    this.issues = issues;
  }
}

const DNS_CODES = new Set(['ENOTFOUND', 'EAI_AGAIN']);

const CONNECTION_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'EPIPE',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ENETDOWN',
  'ECONNABORTED',
  'ERR_SOCKET_CONNECTION_TIMEOUT',
  'ERR_STREAM_PREMATURE_CLOSE',
]);

const TIMEOUT_CODES = new Set(['ETIMEDOUT', 'ESOCKETTIMEDOUT', 'UND_ERR_CONNECT_TIMEOUT']);

const SSL_CODES = new Set([
  'CERT_HAS_EXPIRED',
  'CERT_NOT_YET_VALID',
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'SELF_SIGNED_CERT_IN_CHAIN',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
  'UNABLE_TO_GET_ISSUER_CERT',
  'UNABLE_TO_GET_ISSUER_CERT_LOCALLY',
  'ERR_TLS_CERT_ALTNAME_INVALID',
  'CERT_UNTRUSTED',
  'CERT_REVOKED',
]);

/**
 * Read a string `code` from an error and the errors it wraps
 */
export function errorCode(error: unknown): string | undefined {
  let current: unknown = error;
  for (let depth = 0; depth < 5 && typeof current === 'object' && current !== null; depth++) {
    if ('code' in current && typeof current.code === 'string') {
      return current.code;
    }
    current = 'cause' in current ? current.cause : undefined;
  }
  return undefined;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === 'string' ? error : 'Unknown error';
}

export interface ClassifyContext {
  /** A proxy was in use for the failed exchange */
  viaProxy?: boolean;
}

/**
 * Map any thrown value onto the crawl failure taxonomy
 */
export function classifyError(error: unknown, context: ClassifyContext = {}): CrawlError {
  if (error instanceof CrawlError) {
    return error;
  }

  const code = errorCode(error);
  const message = errorMessage(error);

  if (code && SSL_CODES.has(code)) {
    return new CrawlError(CrawlErrorKind.SSL_VERIFICATION_FAILURE, `SSL verification failed: ${code}`, {
      cause: error,
    });
  }

  if (code === 'ERR_FR_TOO_MANY_REDIRECTS') {
    return new CrawlError(CrawlErrorKind.REDIRECT_LIMIT_EXCEEDED, message, { cause: error });
  }

  if (code === 'ERR_INVALID_URL') {
    return new CrawlError(CrawlErrorKind.INVALID_URL, message, { cause: error });
  }

  if ((code && TIMEOUT_CODES.has(code)) || /timeout|timed out/i.test(message)) {
    return new CrawlError(CrawlErrorKind.TIMEOUT, 'Request timed out', { cause: error });
  }

  const isDns = code !== undefined && DNS_CODES.has(code);
  const isConnection = (code !== undefined && CONNECTION_CODES.has(code)) || /socket hang up/i.test(message);

  if ((isDns || isConnection) && context.viaProxy) {
    return new CrawlError(CrawlErrorKind.PROXY_FAILURE, `Proxy connection failed: ${code ?? message}`, {
      cause: error,
    });
  }

  if (isDns) {
    return new CrawlError(CrawlErrorKind.DNS_FAILURE, `DNS lookup failed: ${code}`, { cause: error });
  }

  if (isConnection) {
    return new CrawlError(CrawlErrorKind.CONNECTION_FAILURE, `Connection failed: ${code ?? message}`, {
      cause: error,
    });
  }

  return new CrawlError(
    context.viaProxy ? CrawlErrorKind.PROXY_FAILURE : CrawlErrorKind.CONNECTION_FAILURE,
    message,
    { cause: error }
  );
}
