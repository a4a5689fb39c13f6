// ============================================================================
// OPENAI EMBEDDINGS — default scoring oracle
// ============================================================================

import { EmbeddingError, errorMessage } from "../shared";
import { resolveEmbeddingConfig } from "./config";
import type { EmbeddingProvider } from "./types";

/**
 * The part of the OpenAI SDK this provider uses. Lets tests inject a fake
 * client without importing the SDK.
 */
export interface EmbeddingsClient {
  embeddings: {
    create(params: { model: string; input: string[] }): Promise<{
      data: Array<{ embedding: number[]; index: number }>;
    }>;
  };
}

export interface OpenAIEmbeddingProviderConfig {
  client?: EmbeddingsClient;
  model?: string;
  apiKey?: string;
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly model: string;
  private readonly apiKey: string | undefined;
  private client: EmbeddingsClient | null;

  constructor(config: OpenAIEmbeddingProviderConfig = {}) {
    const fromEnv = resolveEmbeddingConfig();
    this.model = config.model ?? fromEnv.model;
    this.apiKey = config.apiKey ?? fromEnv.apiKey;
    this.client = config.client ?? null;
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    let response: Awaited<ReturnType<EmbeddingsClient["embeddings"]["create"]>>;
    try {
      const client = await this.getClient();
      response = await client.embeddings.create({ model: this.model, input: texts });
    } catch (error) {
      throw new EmbeddingError(`Embedding request to ${this.model} failed: ${errorMessage(error)}`, { cause: error });
    }

    if (response.data.length !== texts.length) {
      throw new EmbeddingError(
        `Embedding request to ${this.model} returned ${response.data.length} vectors for ${texts.length} texts`
      );
    }
    return [...response.data].sort((a, b) => a.index - b.index).map(item => item.embedding);
  }

  private async getClient(): Promise<EmbeddingsClient> {
    if (!this.client) {
      const { default: OpenAI } = await import("openai");
      this.client = new OpenAI({ apiKey: this.apiKey });
    }
    return this.client;
  }
}
