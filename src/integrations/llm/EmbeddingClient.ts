/**
 * Embedding Client - OpenAI embeddings for semantic retrieval
 *
 * One request per document, fixed output dimensions, single attempt.
 */

import OpenAI from 'openai';
import { getConfig } from '../../config/index.js';
import { ExternalServiceError } from '../../domain/errors.js';

// =============================================================================
// CONFIGURATION
// =============================================================================

export interface EmbeddingClientConfig {
  apiKey: string;
  model: string;
  dimensions: number;
  timeoutMs: number;
}

const DEFAULT_CONFIG: Omit<EmbeddingClientConfig, 'apiKey'> = {
  model: 'text-embedding-3-small',
  dimensions: 1536,
  timeoutMs: 60000,
};

/**
 * USD per million tokens
 */
export const EMBEDDING_PRICE_PER_MILLION = 0.02;

// =============================================================================
// TYPES
// =============================================================================

export interface EmbeddingResponse {
  vector: number[];
  model: string;
  usage: {
    totalTokens: number;
  };
  latencyMs: number;
}

export interface EmbeddingProvider {
  readonly dimensions: number;
  embed(text: string): Promise<EmbeddingResponse>;
}

// =============================================================================
// EMBEDDING CLIENT
// =============================================================================

export class EmbeddingClient implements EmbeddingProvider {
  private client: OpenAI;
  private config: EmbeddingClientConfig;

  constructor(config: Partial<EmbeddingClientConfig>) {
    this.config = {
      apiKey: config.apiKey || process.env.OPENAI_API_KEY || '',
      model: config.model ?? DEFAULT_CONFIG.model,
      dimensions: config.dimensions ?? DEFAULT_CONFIG.dimensions,
      timeoutMs: config.timeoutMs ?? DEFAULT_CONFIG.timeoutMs,
    };

    if (!this.config.apiKey) {
      throw new Error('OPENAI_API_KEY is required');
    }

    this.client = new OpenAI({
      apiKey: this.config.apiKey,
      maxRetries: 0,
      timeout: this.config.timeoutMs,
    });
  }

  get dimensions(): number {
    return this.config.dimensions;
  }

  async embed(text: string): Promise<EmbeddingResponse> {
    const startTime = Date.now();

    const response = await this.client.embeddings
      .create({
        model: this.config.model,
        input: text,
        dimensions: this.config.dimensions,
      })
      .catch((error: unknown) => {
        throw toExternalServiceError(error);
      });

    const vector = response.data[0]?.embedding;
    if (!Array.isArray(vector) || vector.length !== this.config.dimensions) {
      throw new ExternalServiceError(
        `Expected a ${this.config.dimensions}-dimensional embedding, got ${Array.isArray(vector) ? vector.length : 'none'}`,
        'embedding',
        'malformed_response'
      );
    }

    return {
      vector,
      model: response.model,
      usage: {
        totalTokens: response.usage.total_tokens,
      },
      latencyMs: Date.now() - startTime,
    };
  }
}

function toExternalServiceError(error: unknown): ExternalServiceError {
  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return new ExternalServiceError('Embedding request timed out', 'embedding', 'timeout');
  }
  if (error instanceof OpenAI.APIConnectionError) {
    return new ExternalServiceError(`Embedding connection failed: ${error.message}`, 'embedding', 'connection');
  }
  if (error instanceof OpenAI.APIError) {
    return new ExternalServiceError(`Embedding API error: ${error.message}`, 'embedding', 'http', error.status);
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ExternalServiceError(`Embedding request failed: ${message}`, 'embedding', 'connection');
}

// =============================================================================
// SINGLETON INSTANCE
// =============================================================================

let clientInstance: EmbeddingClient | null = null;

export function getEmbeddingClient(config?: Partial<EmbeddingClientConfig>): EmbeddingClient {
  if (!clientInstance) {
    const { embedding } = getConfig();
    clientInstance = new EmbeddingClient({
      apiKey: embedding.apiKey,
      model: embedding.model,
      dimensions: embedding.dimensions,
      timeoutMs: embedding.timeoutMs,
      ...config,
    });
  }
  return clientInstance;
}

export function resetEmbeddingClient(): void {
  clientInstance = null;
}
