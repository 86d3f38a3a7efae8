import { z } from 'zod';
import type { EmbedderConfig } from '../config/index.js';
import type { Logger } from '../util/logger.js';
import { silentLogger } from '../util/logger.js';

// Width of the built-in hashing embedder
export const LOCAL_EMBEDDING_DIM = 384;

export const DEFAULT_OLLAMA_URL = 'http://127.0.0.1:11434';
export const DEFAULT_OPENAI_URL = 'https://api.openai.com/v1';

export interface Embedder {
  readonly name: string;
  readonly model: string;
  /** 0 until the first successful call when the width was not configured. */
  readonly dimensions: number;
  embed(text: string, signal?: AbortSignal): Promise<Float32Array>;
  embedBatch(texts: string[], signal?: AbortSignal): Promise<Float32Array[]>;
}

export type DimensionCallback = (dim: number) => void | Promise<void>;

export class EmbeddingError extends Error {
  constructor(message: string, readonly status?: number, cause?: unknown) {
    super(message, { cause });
    this.name = 'EmbeddingError';
  }
}

export interface EmbedderOptions {
  /** Called once, the first time a call reveals the vector width. */
  onDimensionDiscovered?: DimensionCallback;
  logger?: Logger;
}

/**
 * Tracks the vector width across providers. When the width starts unknown
 * the first successful response fixes it and the callback fires exactly once;
 * later responses of another width are rejected.
 */
abstract class BaseEmbedder implements Embedder {
  abstract readonly name: string;

  private dim: number;
  private readonly onDimensionDiscovered?: DimensionCallback;
  protected readonly logger: Logger;

  constructor(readonly model: string, dim: number, options: EmbedderOptions) {
    this.dim = dim;
    this.onDimensionDiscovered = options.onDimensionDiscovered;
    this.logger = options.logger ?? silentLogger;
  }

  get dimensions(): number {
    return this.dim;
  }

  async embed(text: string, signal?: AbortSignal): Promise<Float32Array> {
    const [embedding] = await this.embedBatch([text], signal);
    return embedding;
  }

  async embedBatch(texts: string[], signal?: AbortSignal): Promise<Float32Array[]> {
    signal?.throwIfAborted();
    if (texts.length === 0) return [];

    const embeddings = await this.compute(texts, signal);
    if (embeddings.length !== texts.length || embeddings.some((e) => e.length === 0)) {
      throw new EmbeddingError(`${this.name} returned an empty embedding`);
    }

    await this.recordDimension(embeddings[0].length);
    return embeddings;
  }

  protected abstract compute(texts: string[], signal?: AbortSignal): Promise<Float32Array[]>;

  private async recordDimension(width: number): Promise<void> {
    if (this.dim === width) return;
    if (this.dim !== 0) {
      throw new EmbeddingError(
        `${this.name} returned ${width}-dim embeddings, expected ${this.dim}`
      );
    }

    this.dim = width;
    this.logger.debug(`${this.name}/${this.model} embedding width is ${width}`);
    try {
      await this.onDimensionDiscovered?.(width);
    } catch (error) {
      this.logger.warn(`failed to record embedding dimension ${width}: ${errorMessage(error)}`);
    }
  }
}

// Character-level hashing embedder. Deterministic and offline; similarity is
// lexical rather than semantic.
export class LocalEmbedder extends BaseEmbedder {
  readonly name = 'local';

  constructor(model: string = 'hash', dim: number = 0, options: EmbedderOptions = {}) {
    super(model, dim, options);
  }

  protected async compute(texts: string[]): Promise<Float32Array[]> {
    return texts.map((text) => hashToEmbedding(text));
  }
}

const OllamaResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())),
});

export class OllamaEmbedder extends BaseEmbedder {
  readonly name = 'ollama';

  constructor(
    private readonly baseUrl: string = DEFAULT_OLLAMA_URL,
    model: string = 'nomic-embed-text',
    dim: number = 0,
    options: EmbedderOptions = {}
  ) {
    super(model, dim, options);
  }

  protected async compute(texts: string[], signal?: AbortSignal): Promise<Float32Array[]> {
    const data = await postJson(
      `${trimSlash(this.baseUrl)}/api/embed`,
      { model: this.model, input: texts },
      { 'Content-Type': 'application/json' },
      'Ollama',
      signal
    );

    const parsed = OllamaResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new EmbeddingError('Ollama returned an unexpected embedding response');
    }
    return parsed.data.embeddings.map((e) => new Float32Array(e));
  }
}

const OpenAIResponseSchema = z.object({
  data: z.array(z.object({ embedding: z.array(z.number()), index: z.number() })),
});

export class OpenAIEmbedder extends BaseEmbedder {
  readonly name = 'openai';

  constructor(
    private readonly apiKey: string,
    model: string = 'text-embedding-3-small',
    private readonly baseUrl: string = DEFAULT_OPENAI_URL,
    dim: number = 0,
    options: EmbedderOptions = {}
  ) {
    super(model, dim, options);
  }

  protected async compute(texts: string[], signal?: AbortSignal): Promise<Float32Array[]> {
    const data = await postJson(
      `${trimSlash(this.baseUrl)}/embeddings`,
      { model: this.model, input: texts },
      {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${this.apiKey}`,
      },
      'OpenAI',
      signal
    );

    const parsed = OpenAIResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new EmbeddingError('OpenAI returned an unexpected embedding response');
    }

    // Sort by index to maintain order
    const sorted = parsed.data.data.sort((a, b) => a.index - b.index);
    return sorted.map((d) => new Float32Array(d.embedding));
  }
}

export function createEmbedder(config: EmbedderConfig, options: EmbedderOptions = {}): Embedder {
  switch (config.provider) {
    case 'local':
      return new LocalEmbedder(config.model, config.dim, options);

    case 'ollama':
      return new OllamaEmbedder(config.baseUrl ?? DEFAULT_OLLAMA_URL, config.model, config.dim, options);

    case 'openai':
      if (!config.apiKey) {
        throw new EmbeddingError('OpenAI API key required for OpenAI embeddings (set OPENAI_API_KEY)');
      }
      return new OpenAIEmbedder(
        config.apiKey,
        config.model,
        config.baseUrl ?? DEFAULT_OPENAI_URL,
        config.dim,
        options
      );
  }
}

async function postJson(
  url: string,
  body: unknown,
  headers: Record<string, string>,
  provider: string,
  signal?: AbortSignal
): Promise<unknown> {
  let response: Response;
  try {
    response = await fetch(url, {
      method: 'POST',
      headers,
      body: JSON.stringify(body),
      signal,
    });
  } catch (error) {
    if (signal?.aborted) throw error;
    throw new EmbeddingError(`${provider} request to ${url} failed: ${errorMessage(error)}`, undefined, error);
  }

  if (!response.ok) {
    const detail = await response.text();
    throw new EmbeddingError(
      `${provider} embedding failed (${response.status}): ${detail}`,
      response.status
    );
  }

  return response.json();
}

/**
 * Unit-length vector built from character and word hashes of the
 * lower-cased, trimmed text.
 */
export function hashToEmbedding(text: string, dimensions: number = LOCAL_EMBEDDING_DIM): Float32Array {
  const embedding = new Float32Array(dimensions);
  const normalized = text.toLowerCase().trim();

  for (let i = 0; i < dimensions; i++) {
    embedding[i] = Math.sin(i * 0.1 + normalized.length * 0.01) * 0.01;
  }

  // Character contributions
  for (let i = 0; i < normalized.length; i++) {
    const charCode = normalized.charCodeAt(i);
    const position = i % dimensions;

    embedding[position] += Math.sin(charCode * 0.1) * 0.1;
    embedding[(position + 1) % dimensions] += Math.cos(charCode * 0.1) * 0.1;
    embedding[charCode % dimensions] += 0.05;
  }

  // Word-level features
  for (const word of normalized.split(/\s+/)) {
    embedding[stringHash(word) % dimensions] += 0.1;
  }

  let norm = 0;
  for (let i = 0; i < dimensions; i++) {
    norm += embedding[i] * embedding[i];
  }
  norm = Math.sqrt(norm);

  if (norm > 0) {
    for (let i = 0; i < dimensions; i++) {
      embedding[i] /= norm;
    }
  }

  return embedding;
}

function stringHash(str: string): number {
  let hash = 0;
  for (let i = 0; i < str.length; i++) {
    hash = ((hash << 5) - hash) + str.charCodeAt(i);
    hash = hash & hash; // Convert to 32bit integer
  }
  return Math.abs(hash);
}

function trimSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
