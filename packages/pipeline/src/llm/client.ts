import OpenAI from 'openai';
import { z } from 'zod';
import {
  CallTimeoutError,
  CompletionError,
  errorMessage,
  type CompletionErrorKind,
  type CompletionUsage,
} from '../errors.js';
import type { Env } from '../env.js';
import { estimateTokens } from './pricing.js';

export const DEFAULT_MODEL = 'gpt-4o-mini';
export const DEFAULT_PROVIDER = 'openai';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface CompletionRequest {
  messages: ChatMessage[];
  model: string;
  maxTokens: number;
  temperature?: number;
}

export interface CompletionResponse {
  text: string;
  tokensIn: number;
  tokensOut: number;
  model: string;
}

export interface CompletionClient {
  readonly provider: string;
  complete(request: CompletionRequest, options?: { signal?: AbortSignal }): Promise<CompletionResponse>;
}

export interface LlmEndpointSettings {
  baseUrl?: string;
  model?: string;
}

export interface ResolvedLlmEndpoint {
  /** Undefined means the provider default. */
  baseUrl?: string;
  model: string;
}

/**
 * Precedence per setting: explicit override > environment > config file > provider default.
 */
export function resolveLlmEndpoint(input: {
  override?: LlmEndpointSettings;
  env?: Env;
  config?: LlmEndpointSettings;
}): ResolvedLlmEndpoint {
  const pick = (...values: Array<string | undefined>): string | undefined =>
    values.map((value) => value?.trim()).find((value): value is string => Boolean(value));

  return {
    baseUrl: pick(input.override?.baseUrl, input.env?.LLM_BASE_URL, input.config?.baseUrl),
    model: pick(input.override?.model, input.env?.LLM_MODEL, input.config?.model) ?? DEFAULT_MODEL,
  };
}

export function classifyStatus(status: number | undefined): CompletionErrorKind {
  if (status === undefined) return 'server_error';
  if (status === 401 || status === 403) return 'auth_error';
  if (status === 429) return 'rate_limit';
  if (status === 408) return 'timeout';
  if (status >= 500) return 'server_error';
  return 'invalid_request';
}

function parseRetryAfter(value: string | null | undefined): number | undefined {
  if (!value) return undefined;

  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds < 0) {
    return undefined;
  }

  return Math.round(seconds * 1000);
}

const billedErrorSchema = z.object({
  usage: z.object({
    prompt_tokens: z.number().int().nonnegative(),
    completion_tokens: z.number().int().nonnegative().default(0),
  }),
});

// Some OpenAI-compatible servers report the tokens a rejected call consumed.
function usageOf(body: unknown): CompletionUsage | undefined {
  const parsed = billedErrorSchema.safeParse(body);
  if (!parsed.success) {
    return undefined;
  }

  return { tokensIn: parsed.data.usage.prompt_tokens, tokensOut: parsed.data.usage.completion_tokens };
}

/**
 * Map SDK and transport errors onto the completion error kinds.
 */
export function toCompletionError(error: unknown): CompletionError {
  if (error instanceof CompletionError) {
    return error;
  }

  if (error instanceof OpenAI.APIConnectionTimeoutError || error instanceof OpenAI.APIUserAbortError) {
    return new CompletionError('timeout', error.message, { cause: error });
  }

  if (error instanceof OpenAI.APIConnectionError) {
    return new CompletionError('server_error', `connection error: ${error.message}`, { cause: error });
  }

  if (error instanceof OpenAI.APIError) {
    return new CompletionError(classifyStatus(error.status), error.message, {
      status: error.status,
      retryAfterMs: parseRetryAfter(error.headers?.['retry-after']),
      usage: usageOf(error.error),
      cause: error,
    });
  }

  return new CompletionError('server_error', errorMessage(error), { cause: error });
}

export function isRetryableCompletionError(error: unknown): boolean {
  if (error instanceof CallTimeoutError) {
    return true;
  }

  if (error instanceof CompletionError) {
    return error.kind === 'timeout' || error.kind === 'rate_limit' || error.kind === 'server_error';
  }

  return false;
}

export function completionRetryAfterMs(error: unknown): number | undefined {
  return error instanceof CompletionError ? error.retryAfterMs : undefined;
}

function toMessageParam(message: ChatMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    default:
      return { role: 'user', content: message.content };
  }
}

export interface OpenAiCompletionClientOptions {
  apiKey?: string;
  baseUrl?: string;
  timeoutMs?: number;
  provider?: string;
  client?: OpenAI;
}

/**
 * Chat completions over the OpenAI SDK; also serves OpenAI-compatible endpoints via `baseUrl`.
 * SDK-level retries are off: callers own the retry policy.
 */
export class OpenAiCompletionClient implements CompletionClient {
  readonly provider: string;
  private readonly client: OpenAI;

  constructor(options: OpenAiCompletionClientOptions = {}) {
    this.provider = options.provider ?? DEFAULT_PROVIDER;
    this.client =
      options.client ??
      new OpenAI({
        // OpenAI-compatible local servers accept any key.
        apiKey: options.apiKey ?? 'no-key',
        baseURL: options.baseUrl,
        timeout: options.timeoutMs,
        maxRetries: 0,
      });
  }

  async complete(request: CompletionRequest, options: { signal?: AbortSignal } = {}): Promise<CompletionResponse> {
    let response: OpenAI.Chat.ChatCompletion;

    try {
      response = await this.client.chat.completions.create(
        {
          model: request.model,
          messages: request.messages.map(toMessageParam),
          max_tokens: request.maxTokens,
          temperature: request.temperature,
        },
        { signal: options.signal },
      );
    } catch (error) {
      throw toCompletionError(error);
    }

    const text = response.choices[0]?.message.content ?? '';
    const prompt = request.messages.map((message) => message.content).join('\n');

    return {
      text,
      tokensIn: response.usage?.prompt_tokens ?? estimateTokens(prompt),
      tokensOut: response.usage?.completion_tokens ?? estimateTokens(text),
      model: response.model,
    };
  }
}
