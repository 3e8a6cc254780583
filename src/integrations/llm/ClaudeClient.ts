/**
 * Claude Client - LLM integration for the matching funnel
 *
 * Dedicated Claude integration (no abstraction layer).
 * Used for the two model-backed stages:
 * - Profile extraction (one call per candidate/job document)
 * - Deep evaluation (one call per candidate-job pair)
 *
 * Every call is a single attempt with a fixed timeout. SDK failures are
 * translated into ExternalServiceError so callers can record them per item.
 */

import Anthropic from '@anthropic-ai/sdk';
import { getConfig } from '../../config/index.js';
import { ExternalServiceError } from '../../domain/errors.js';
import { CLAUDE_MODELS, CLAUDE_PRICING, type ClaudeModel } from './models.js';

export { CLAUDE_MODELS, CLAUDE_PRICING, type ClaudeModel };

// =============================================================================
// CONFIGURATION
// =============================================================================

export interface ClaudeClientConfig {
  apiKey: string;
  defaultModel: ClaudeModel;
  maxRetries: number;
  timeoutMs: number;
}

const DEFAULT_CONFIG: Omit<ClaudeClientConfig, 'apiKey'> = {
  defaultModel: 'claude-sonnet-4-20250514',
  maxRetries: 0,
  timeoutMs: 60000,
};

// =============================================================================
// REQUEST/RESPONSE TYPES
// =============================================================================

export interface ClaudeRequest {
  prompt: string;
  systemPrompt?: string;
  model?: ClaudeModel;
  maxTokens?: number;
  temperature?: number;
  stopSequences?: string[];
}

export interface ClaudeResponse {
  content: string;
  model: ClaudeModel;
  usage: {
    inputTokens: number;
    outputTokens: number;
    totalTokens: number;
  };
  stopReason: string | null;
  latencyMs: number;
}

/**
 * The slice of the client the matching services depend on
 */
export interface ChatClient {
  chat(request: ClaudeRequest): Promise<ClaudeResponse>;
}

// =============================================================================
// CLAUDE CLIENT
// =============================================================================

export class ClaudeClient implements ChatClient {
  private client: Anthropic;
  private config: ClaudeClientConfig;

  constructor(config: Partial<ClaudeClientConfig>) {
    this.config = {
      apiKey: config.apiKey || process.env.ANTHROPIC_API_KEY || '',
      defaultModel: config.defaultModel ?? DEFAULT_CONFIG.defaultModel,
      maxRetries: config.maxRetries ?? DEFAULT_CONFIG.maxRetries,
      timeoutMs: config.timeoutMs ?? DEFAULT_CONFIG.timeoutMs,
    };

    if (!this.config.apiKey) {
      throw new Error('ANTHROPIC_API_KEY is required');
    }

    this.client = new Anthropic({
      apiKey: this.config.apiKey,
      maxRetries: this.config.maxRetries,
      timeout: this.config.timeoutMs,
    });
  }

  // ===========================================================================
  // CORE API
  // ===========================================================================

  async chat(request: ClaudeRequest): Promise<ClaudeResponse> {
    const startTime = Date.now();
    const model = request.model || this.config.defaultModel;

    const messages: Anthropic.MessageParam[] = [
      {
        role: 'user',
        content: request.prompt,
      },
    ];

    let response: Anthropic.Message;
    try {
      response = await this.client.messages.create({
        model,
        max_tokens: request.maxTokens || 4096,
        system: request.systemPrompt,
        messages,
        temperature: request.temperature,
        stop_sequences: request.stopSequences,
      });
    } catch (error) {
      throw toExternalServiceError(error);
    }

    const textContent = response.content
      .filter((block): block is Anthropic.TextBlock => block.type === 'text')
      .map((block) => block.text)
      .join('');

    return {
      content: textContent,
      model,
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
        totalTokens: response.usage.input_tokens + response.usage.output_tokens,
      },
      stopReason: response.stop_reason,
      latencyMs: Date.now() - startTime,
    };
  }
}

// =============================================================================
// UTILITY FUNCTIONS
// =============================================================================

function toExternalServiceError(error: unknown): ExternalServiceError {
  if (error instanceof Anthropic.APIConnectionTimeoutError) {
    return new ExternalServiceError('Claude request timed out', 'llm', 'timeout');
  }
  if (error instanceof Anthropic.APIConnectionError) {
    return new ExternalServiceError(`Claude connection failed: ${error.message}`, 'llm', 'connection');
  }
  if (error instanceof Anthropic.APIError) {
    return new ExternalServiceError(`Claude API error: ${error.message}`, 'llm', 'http', error.status);
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ExternalServiceError(`Claude request failed: ${message}`, 'llm', 'connection');
}

/**
 * Parse JSON from Claude's response, handling common issues
 *
 * Throws ExternalServiceError(malformed_response) when the content is not
 * a JSON object.
 */
export function parseJsonResponse(response: Pick<ClaudeResponse, 'content'>): Record<string, unknown> {
  let content = response.content.trim();

  // Handle markdown code blocks
  if (content.startsWith('```json')) {
    content = content.slice(7);
  } else if (content.startsWith('```')) {
    content = content.slice(3);
  }
  if (content.endsWith('```')) {
    content = content.slice(0, -3);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content.trim());
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ExternalServiceError(`Invalid JSON from model: ${reason}`, 'llm', 'malformed_response');
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ExternalServiceError('Model returned JSON that is not an object', 'llm', 'malformed_response');
  }
  return { ...parsed };
}

// =============================================================================
// SINGLETON INSTANCE
// =============================================================================

let clientInstance: ClaudeClient | null = null;

export function getClaudeClient(config?: Partial<ClaudeClientConfig>): ClaudeClient {
  if (!clientInstance) {
    const { llm } = getConfig();
    clientInstance = new ClaudeClient({
      apiKey: llm.apiKey,
      defaultModel: llm.evaluationModel,
      timeoutMs: llm.timeoutMs,
      ...config,
    });
  }
  return clientInstance;
}

export function resetClaudeClient(): void {
  clientInstance = null;
}
