import OpenAI from 'openai';
import type { Logger } from 'pino';
import type { Config } from '../config/index.js';
import type {
  ChatRequest,
  ChatResponse,
  CompletionRequest,
  CompletionResponse,
  EmbeddingRequest,
  EmbeddingResponse,
  ImageRequest,
  ImageResponse,
  ModelsResponse,
} from '../models/openai.js';
import { UpstreamError, UpstreamUnavailableError } from './errors.js';

export * from './errors.js';

type ClientOptions = NonNullable<ConstructorParameters<typeof OpenAI>[0]>;

/** Client options that callers may override, e.g. `fetch` in tests */
export type ClientOverrides = Pick<ClientOptions, 'fetch'>;

export type UpstreamModel = OpenAI.Model;

/**
 * Pass-through to the OpenAI API. Each operation makes a single SDK call and
 * reshapes the result into the gateway's response documents.
 */
export class OpenAIService {
  private readonly client: OpenAI | null;
  private readonly imageModel: Config['openai']['image_model'];
  private readonly logger: Logger;

  constructor(config: Config['openai'], logger: Logger, overrides: ClientOverrides = {}) {
    this.logger = logger;
    this.imageModel = config.image_model;
    this.client = config.api_key
      ? new OpenAI({
          apiKey: config.api_key,
          baseURL: config.base_url,
          timeout: config.timeout_ms,
          maxRetries: config.max_retries,
          ...overrides,
        })
      : null;

    if (!this.client) {
      logger.warn('OpenAI API key not configured, upstream operations will be unavailable');
    }
  }

  get isAvailable(): boolean {
    return this.client !== null;
  }

  private requireClient(): OpenAI {
    if (!this.client) {
      throw new UpstreamUnavailableError();
    }
    return this.client;
  }

  private async call<T>(operation: string, fn: (client: OpenAI) => Promise<T>): Promise<T> {
    const client = this.requireClient();
    try {
      return await fn(client);
    } catch (err) {
      this.logger.error({ err, operation }, 'OpenAI request failed');
      const message = err instanceof Error ? err.message : String(err);
      throw new UpstreamError(`OpenAI API error: ${message}`, { cause: err });
    }
  }

  async chatCompletion(request: ChatRequest): Promise<ChatResponse> {
    return this.call('chat', async (client) => {
      const response = await client.chat.completions.create({
        model: request.model,
        messages: request.messages.map((msg) => ({ role: msg.role, content: msg.content })),
        temperature: request.temperature,
        max_tokens: request.max_tokens,
      });

      return {
        message: response.choices[0]?.message.content ?? null,
        model: request.model,
        usage: response.usage ?? null,
        id: response.id,
      };
    });
  }

  async textCompletion(request: CompletionRequest): Promise<CompletionResponse> {
    return this.call('completion', async (client) => {
      const response = await client.completions.create({
        model: request.model,
        prompt: request.prompt,
        temperature: request.temperature,
        max_tokens: request.max_tokens,
      });

      return {
        text: response.choices[0]?.text ?? '',
        model: request.model,
        usage: response.usage ?? null,
        id: response.id,
      };
    });
  }

  async generateImage(request: ImageRequest): Promise<ImageResponse> {
    return this.call('images.generate', async (client) => {
      const response = await client.images.generate({
        model: this.imageModel,
        prompt: request.prompt,
        size: request.size,
        quality: request.quality,
        n: request.n,
      });

      const image = response.data?.[0];
      return {
        url: image?.url ?? null,
        prompt: request.prompt,
        size: request.size,
        quality: request.quality,
        revised_prompt: image?.revised_prompt ?? null,
      };
    });
  }

  async createEmbeddings(request: EmbeddingRequest): Promise<EmbeddingResponse> {
    return this.call('embeddings', async (client) => {
      const response = await client.embeddings.create({
        model: request.model,
        input: request.input,
        encoding_format: 'float',
      });

      return {
        embeddings: response.data.map((item) => item.embedding),
        model: request.model,
        usage: response.usage ?? null,
      };
    });
  }

  async listModels(): Promise<ModelsResponse<UpstreamModel>> {
    return this.call('models', async (client) => {
      const models: UpstreamModel[] = [];
      for await (const model of client.models.list()) {
        models.push(model);
      }
      return { models, count: models.length };
    });
  }
}
