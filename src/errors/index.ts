/**
 * Error taxonomy
 *
 * Node-local errors (FetchError, ParseError, AutomationTimeoutError,
 * DomainViolationError) are recovered where they occur. AIProviderError and
 * ConfigError are crawl-fatal and surface to the caller.
 */

export type ErrorCode =
  | 'FETCH_ERROR'
  | 'AI_PROVIDER_ERROR'
  | 'PARSE_ERROR'
  | 'DOMAIN_VIOLATION'
  | 'AUTOMATION_TIMEOUT'
  | 'CONFIG_ERROR';

export class ExplorerError extends Error {
  readonly code: ErrorCode;
  readonly details?: unknown;

  constructor(code: ErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }

  /** Whether the crawl must stop when this error escapes a node */
  get fatal(): boolean {
    return this.code === 'AI_PROVIDER_ERROR' || this.code === 'CONFIG_ERROR';
  }
}

export class FetchError extends ExplorerError {
  constructor(
    message: string,
    readonly url: string,
    readonly status: number | null = null,
    details?: unknown
  ) {
    super('FETCH_ERROR', message, details);
  }

  /** 4xx responses other than 408/429 will not change on retry */
  get retryable(): boolean {
    if (this.status === null) return true;
    if (this.status === 408 || this.status === 429) return true;
    return this.status >= 500;
  }
}

export class AIProviderError extends ExplorerError {
  constructor(message: string, readonly provider: string, details?: unknown) {
    super('AI_PROVIDER_ERROR', message, details);
  }
}

export class ParseError extends ExplorerError {
  constructor(message: string, readonly responsePreview: string) {
    super('PARSE_ERROR', message);
  }
}

export class DomainViolationError extends ExplorerError {
  constructor(readonly url: string, readonly domain: string) {
    super('DOMAIN_VIOLATION', `${url} is outside crawl scope ${domain || '(empty)'}`);
  }
}

export class AutomationTimeoutError extends ExplorerError {
  constructor(readonly waitName: string, readonly timeoutMs: number) {
    super('AUTOMATION_TIMEOUT', `Wait "${waitName}" not satisfied within ${timeoutMs}ms`);
  }
}

export class ConfigError extends ExplorerError {
  constructor(message: string, details?: unknown) {
    super('CONFIG_ERROR', message, details);
  }
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
