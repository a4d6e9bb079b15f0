/**
 * Request bodies accepted by the gateway's OpenAI routes, and the response
 * documents it returns. Defaults mirror what the frontend expects.
 */
import { z } from 'zod';

const Temperature = z.number().min(0).max(2);
const MaxTokens = z.number().int().positive();

export const ChatMessageSchema = z.object({
  role: z.enum(['system', 'user', 'assistant']),
  content: z.string(),
});

export const ChatRequestSchema = z.object({
  model: z.string().min(1).default('gpt-3.5-turbo'),
  messages: z.array(ChatMessageSchema).min(1),
  temperature: Temperature.default(0.7),
  max_tokens: MaxTokens.default(1000),
});

export const CompletionRequestSchema = z.object({
  model: z.string().min(1).default('gpt-3.5-turbo-instruct'),
  prompt: z.string(),
  temperature: Temperature.default(0.7),
  max_tokens: MaxTokens.default(100),
});

export const IMAGE_SIZES = ['256x256', '512x512', '1024x1024', '1792x1024', '1024x1792'] as const;
export const IMAGE_QUALITIES = ['standard', 'hd'] as const;

export const ImageRequestSchema = z.object({
  prompt: z.string().min(1),
  size: z.enum(IMAGE_SIZES).default('1024x1024'),
  quality: z.enum(IMAGE_QUALITIES).default('standard'),
  n: z.number().int().min(1).max(4).default(1),
});

export const EmbeddingRequestSchema = z.object({
  model: z.string().min(1).default('text-embedding-ada-002'),
  input: z.union([z.string(), z.array(z.string()).min(1)]),
});

export type ChatRequest = z.infer<typeof ChatRequestSchema>;
export type CompletionRequest = z.infer<typeof CompletionRequestSchema>;
export type ImageRequest = z.infer<typeof ImageRequestSchema>;
export type EmbeddingRequest = z.infer<typeof EmbeddingRequestSchema>;

export interface TokenUsage {
  prompt_tokens: number;
  completion_tokens?: number;
  total_tokens: number;
}

export interface ChatResponse {
  message: string | null;
  model: string;
  usage: TokenUsage | null;
  id: string;
}

export interface CompletionResponse {
  text: string;
  model: string;
  usage: TokenUsage | null;
  id: string;
}

export interface ImageResponse {
  url: string | null;
  prompt: string;
  size: ImageRequest['size'];
  quality: ImageRequest['quality'];
  revised_prompt: string | null;
}

export interface EmbeddingResponse {
  embeddings: number[][];
  model: string;
  usage: TokenUsage | null;
}

export interface ModelsResponse<TModel = unknown> {
  models: TModel[];
  count: number;
}
