import { AIProviderError, ParseError, toError } from '../errors/index.js';
import { createLogger, defaultMetrics, type Logger, type Metrics } from '../logger/index.js';
import type {
  AIProvider,
  DynamicLoadingVerdict,
  LinkInfo,
  LinkScore,
  NodeContext,
} from '../types/index.js';
import {
  SYSTEM_PROMPT,
  buildDetectionPrompt,
  buildScoringPrompt,
  parseDetectionResponse,
  parseScoreResponse,
} from './prompts.js';

// ============================================================================
// Contract
// ============================================================================

/**
 * AI scoring oracle consulted by the exploration engine
 */
export interface ScoringGateway {
  readonly provider: AIProvider;
  readonly model: string;
  /** Completed model requests, including re-asks */
  readonly callCount: number;

  /**
   * Score every candidate 0-10; productName is present only above 9
   * @throws AIProviderError when the provider is unreachable or rejects the call
   */
  scoreLinks(context: NodeContext, candidates: readonly LinkInfo[]): Promise<LinkScore[]>;

  /**
   * Find the control that loads more content, or `{id: -1}`
   * @throws AIProviderError when the provider is unreachable or rejects the call
   */
  detectDynamicLoading(
    context: NodeContext,
    candidates: readonly LinkInfo[]
  ): Promise<DynamicLoadingVerdict>;
}

export interface GatewayOptions {
  /** Re-asks after an unparseable response (default: 2) */
  maxParseRetries?: number;
  /** Output token ceiling for scoring calls (default: 4000) */
  maxTokens?: number;
  /** Backoff schedule for rate-limited calls (default: 1s, 2s, 4s, 8s, 16s) */
  rateLimitDelaysMs?: number[];
  logger?: Logger;
  metrics?: Metrics;
}

const DEFAULT_MAX_PARSE_RETRIES = 2;
const DEFAULT_MAX_TOKENS = 4000;
const DETECTION_MAX_TOKENS = 1000;
const RATE_LIMIT_DELAYS_MS = [1000, 2000, 4000, 8000, 16000];

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Whether an SDK error signals throttling: HTTP 429, Anthropic's 529
 * overload, or a message saying so
 */
export function isRateLimitError(error: unknown): boolean {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    const status = error.status;
    if (status === 429 || status === 529) return true;
  }
  const message = toError(error).message.toLowerCase();
  return (
    message.includes('rate_limit') ||
    message.includes('rate limit') ||
    message.includes('429') ||
    message.includes('overloaded') ||
    message.includes('resource_exhausted')
  );
}

// ============================================================================
// Prompt Gateway
// ============================================================================

/**
 * Shared gateway behaviour. Variants only implement `complete`, which sends
 * one system + user prompt pair and returns the model's text.
 */
export abstract class PromptGateway implements ScoringGateway {
  abstract readonly provider: AIProvider;
  readonly model: string;

  protected readonly logger: Logger;
  protected readonly metrics: Metrics;
  private readonly maxParseRetries: number;
  private readonly maxTokens: number;
  private readonly rateLimitDelaysMs: number[];
  private calls = 0;

  constructor(model: string, options: GatewayOptions = {}) {
    this.model = model;
    this.logger = options.logger ?? createLogger('gateway');
    this.metrics = options.metrics ?? defaultMetrics;
    this.maxParseRetries = options.maxParseRetries ?? DEFAULT_MAX_PARSE_RETRIES;
    this.maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.rateLimitDelaysMs = options.rateLimitDelaysMs ?? RATE_LIMIT_DELAYS_MS;
  }

  get callCount(): number {
    return this.calls;
  }

  protected abstract complete(system: string, user: string, maxTokens: number): Promise<string>;

  async scoreLinks(context: NodeContext, candidates: readonly LinkInfo[]): Promise<LinkScore[]> {
    if (candidates.length === 0) return [];

    const prompt = buildScoringPrompt(context, candidates);
    for (let attempt = 0; attempt <= this.maxParseRetries; attempt++) {
      const text = await this.call(prompt, this.maxTokens);
      try {
        const { scores, missing } = parseScoreResponse(text, candidates);
        if (missing.length > 0) {
          this.logger.warn('Scoring response missed candidates, defaulting to 0', {
            url: context.url,
            missing,
          });
        }
        return scores;
      } catch (error) {
        if (!(error instanceof ParseError)) throw error;
        this.metrics.increment('gateway.parse_errors', { provider: this.provider, kind: 'score' });
        this.logger.warn('Unparseable scoring response', {
          url: context.url,
          attempt: attempt + 1,
          maxAttempts: this.maxParseRetries + 1,
          error: error.message,
          response: error.responsePreview,
        });
      }
    }

    this.logger.warn('Scoring response never parsed, all candidates default to 0', {
      url: context.url,
      candidates: candidates.length,
    });
    return candidates.map((c) => ({ id: c.id, score: 0 }));
  }

  async detectDynamicLoading(
    context: NodeContext,
    candidates: readonly LinkInfo[]
  ): Promise<DynamicLoadingVerdict> {
    if (candidates.length === 0) return { id: -1 };

    const prompt = buildDetectionPrompt(context, candidates);
    const batchIds = new Set(candidates.map((c) => c.id));
    for (let attempt = 0; attempt <= this.maxParseRetries; attempt++) {
      const text = await this.call(prompt, DETECTION_MAX_TOKENS);
      try {
        return parseDetectionResponse(text, batchIds);
      } catch (error) {
        if (!(error instanceof ParseError)) throw error;
        this.metrics.increment('gateway.parse_errors', { provider: this.provider, kind: 'detect' });
        this.logger.warn('Unparseable detection response', {
          url: context.url,
          attempt: attempt + 1,
          error: error.message,
          response: error.responsePreview,
        });
      }
    }

    this.logger.warn('Detection response never parsed, assuming no dynamic loading', {
      url: context.url,
    });
    return { id: -1 };
  }

  /**
   * Send one prompt, retrying rate-limited calls on the backoff schedule.
   * Any other failure is fatal for the crawl.
   */
  private async call(prompt: string, maxTokens: number): Promise<string> {
    const startTime = Date.now();
    let lastError: Error | null = null;

    for (let attempt = 0; attempt <= this.rateLimitDelaysMs.length; attempt++) {
      try {
        this.metrics.increment('gateway.calls', { provider: this.provider });
        const text = await this.complete(SYSTEM_PROMPT, prompt, maxTokens);
        this.calls++;
        this.metrics.timing('gateway.duration', Date.now() - startTime, { provider: this.provider });
        this.logger.debug('Model response received', {
          provider: this.provider,
          model: this.model,
          length: text.length,
        });
        return text;
      } catch (error) {
        if (error instanceof AIProviderError) throw error;
        lastError = toError(error);

        const delay = this.rateLimitDelaysMs[attempt];
        if (isRateLimitError(error) && delay !== undefined) {
          this.logger.warn(`Rate limited, retrying in ${delay}ms`, {
            provider: this.provider,
            attempt: attempt + 1,
            error: lastError.message,
          });
          this.metrics.increment('gateway.rate_limit', { provider: this.provider });
          await sleep(delay);
          continue;
        }
        break;
      }
    }

    this.metrics.increment('gateway.errors', { provider: this.provider });
    throw new AIProviderError(
      `${this.provider} call failed: ${lastError?.message ?? 'unknown error'}`,
      this.provider,
      { model: this.model }
    );
  }
}
