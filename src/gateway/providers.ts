/**
 * Gateway variants, one per AI provider. Each wraps its vendor SDK behind
 * `complete`; the minimal client interfaces below let tests inject a fake
 * in place of the SDK.
 */

import Anthropic from '@anthropic-ai/sdk';
import OpenAI from 'openai';
import { GoogleGenerativeAI } from '@google/generative-ai';
import { PromptGateway, type GatewayOptions } from './base.js';

export interface ProviderCredentials {
  apiKey: string;
  model: string;
  /** Request timeout in milliseconds (default: 60000) */
  timeoutMs?: number;
}

const DEFAULT_TIMEOUT_MS = 60000;

// ============================================================================
// Anthropic
// ============================================================================

export interface AnthropicMessagesClient {
  create(params: {
    model: string;
    max_tokens: number;
    system: string;
    messages: Array<{ role: 'user'; content: string }>;
  }): Promise<{ content: Array<{ type: string; text?: string }> }>;
}

export class AnthropicGateway extends PromptGateway {
  override readonly provider = 'anthropic' as const;
  private readonly messages: AnthropicMessagesClient;

  constructor(credentials: ProviderCredentials, options: GatewayOptions = {}, client?: AnthropicMessagesClient) {
    super(credentials.model, options);
    if (client) {
      this.messages = client;
    } else {
      const sdk = new Anthropic({
        apiKey: credentials.apiKey,
        timeout: credentials.timeoutMs ?? DEFAULT_TIMEOUT_MS,
        maxRetries: 0,
      });
      this.messages = { create: (params) => sdk.messages.create(params) };
    }
  }

  protected override async complete(system: string, user: string, maxTokens: number): Promise<string> {
    const response = await this.messages.create({
      model: this.model,
      max_tokens: maxTokens,
      system,
      messages: [{ role: 'user', content: user }],
    });
    const textBlock = response.content.find((block) => block.type === 'text');
    if (!textBlock || textBlock.text === undefined) {
      throw new Error('No text content in Anthropic response');
    }
    return textBlock.text;
  }
}

// ============================================================================
// OpenAI
// ============================================================================

export interface OpenAIChatClient {
  create(params: {
    model: string;
    max_tokens: number;
    messages: [{ role: 'system'; content: string }, { role: 'user'; content: string }];
  }): Promise<{ choices: Array<{ message: { content: string | null } }> }>;
}

export class OpenAIGateway extends PromptGateway {
  override readonly provider = 'openai' as const;
  private readonly chat: OpenAIChatClient;

  constructor(credentials: ProviderCredentials, options: GatewayOptions = {}, client?: OpenAIChatClient) {
    super(credentials.model, options);
    if (client) {
      this.chat = client;
    } else {
      const sdk = new OpenAI({
        apiKey: credentials.apiKey,
        timeout: credentials.timeoutMs ?? DEFAULT_TIMEOUT_MS,
        maxRetries: 0,
      });
      this.chat = { create: (params) => sdk.chat.completions.create(params) };
    }
  }

  protected override async complete(system: string, user: string, maxTokens: number): Promise<string> {
    const response = await this.chat.create({
      model: this.model,
      max_tokens: maxTokens,
      messages: [
        { role: 'system', content: system },
        { role: 'user', content: user },
      ],
    });
    const content = response.choices[0]?.message.content;
    if (!content) {
      throw new Error('No message content in OpenAI response');
    }
    return content;
  }
}

// ============================================================================
// Google
// ============================================================================

export interface GoogleModelClient {
  generateContent(request: {
    systemInstruction: string;
    contents: Array<{ role: 'user'; parts: Array<{ text: string }> }>;
    generationConfig: { maxOutputTokens: number };
  }): Promise<{ response: { text(): string } }>;
}

export class GoogleGateway extends PromptGateway {
  override readonly provider = 'google' as const;
  private readonly generative: GoogleModelClient;

  constructor(credentials: ProviderCredentials, options: GatewayOptions = {}, client?: GoogleModelClient) {
    super(credentials.model, options);
    if (client) {
      this.generative = client;
    } else {
      const sdk = new GoogleGenerativeAI(credentials.apiKey).getGenerativeModel(
        { model: credentials.model },
        { timeout: credentials.timeoutMs ?? DEFAULT_TIMEOUT_MS }
      );
      this.generative = { generateContent: (request) => sdk.generateContent(request) };
    }
  }

  protected override async complete(system: string, user: string, maxTokens: number): Promise<string> {
    const result = await this.generative.generateContent({
      systemInstruction: system,
      contents: [{ role: 'user', parts: [{ text: user }] }],
      generationConfig: { maxOutputTokens: maxTokens },
    });
    const text = result.response.text();
    if (!text) {
      throw new Error('No text in Google response');
    }
    return text;
  }
}
