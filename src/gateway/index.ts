/**
 * Scoring Gateway Module
 *
 * Responsibilities:
 * - Define the ScoringGateway contract the engine depends on
 * - Build the scoring and dynamic-loading prompts
 * - Parse and repair model output
 * - Route calls to one configured provider (Anthropic, OpenAI, Google)
 *
 * Usage:
 * ```typescript
 * const gateway = createScoringGateway({ provider: 'anthropic', apiKey, model });
 * const scores = await gateway.scoreLinks(context, candidates);
 * ```
 */

import { ConfigError } from '../errors/index.js';
import type { AIProvider } from '../types/index.js';
import type { GatewayOptions, ScoringGateway } from './base.js';
import { AnthropicGateway, GoogleGateway, OpenAIGateway } from './providers.js';

export { PromptGateway, isRateLimitError } from './base.js';
export type { GatewayOptions, ScoringGateway } from './base.js';
export {
  AnthropicGateway,
  GoogleGateway,
  OpenAIGateway,
  type AnthropicMessagesClient,
  type GoogleModelClient,
  type OpenAIChatClient,
  type ProviderCredentials,
} from './providers.js';
export {
  SYSTEM_PROMPT,
  DETECTABLE_TRIGGERS,
  buildDetectionPrompt,
  buildScoringPrompt,
  extractJson,
  normalizeTriggerType,
  parseDetectionResponse,
  parseScoreResponse,
  pruneCandidates,
  type ParsedScores,
  type PrunedCandidate,
} from './prompts.js';

export interface GatewayConfig {
  provider: AIProvider;
  apiKey: string;
  model: string;
  timeoutMs?: number;
}

/**
 * Factory function to create the gateway for the configured provider
 */
export function createScoringGateway(config: GatewayConfig, options: GatewayOptions = {}): ScoringGateway {
  if (!config.apiKey) {
    throw new ConfigError(`API key required for ${config.provider}`);
  }
  const credentials = { apiKey: config.apiKey, model: config.model, timeoutMs: config.timeoutMs };

  switch (config.provider) {
    case 'anthropic':
      return new AnthropicGateway(credentials, options);
    case 'openai':
      return new OpenAIGateway(credentials, options);
    case 'google':
      return new GoogleGateway(credentials, options);
  }
}
