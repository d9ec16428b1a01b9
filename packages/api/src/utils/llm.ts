import Groq from 'groq-sdk';
import OpenAI from 'openai';
import type { GenerationErrorKind, GenerationRequest } from '@groundwork/shared';
import type { AppConfig } from '../config';
import { ConfigError, GenerationError } from './errors';
import { logger } from './logger';

/**
 * GenerationClient Interface
 *
 * Vendor-agnostic capability the pipeline depends on: one call, raw text
 * back, or a GenerationError with one of four kinds. Implementations keep
 * no mutable state between calls, so one instance serves every worker.
 */

export interface CallOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface GenerationClient {
  readonly name: string;
  generate(request: GenerationRequest, options: CallOptions): Promise<string>;
}

export function classifyStatus(status: number | undefined): GenerationErrorKind {
  if (status === 401 || status === 403) return 'AuthError';
  if (status === 429) return 'RateLimited';
  if (status === 408) return 'Timeout';
  return 'BackendUnavailable';
}

/**
 * Retry-After as delay in ms. Accepts delta-seconds or an HTTP date.
 */
export function parseRetryAfter(value: string | null | undefined, now: number = Date.now()): number | undefined {
  if (!value) return undefined;
  const seconds = Number(value);
  if (Number.isFinite(seconds)) {
    return Math.max(0, seconds * 1000);
  }
  const date = Date.parse(value);
  return Number.isNaN(date) ? undefined : Math.max(0, date - now);
}

export interface ApiErrorLike {
  status?: number;
  headers?: Record<string, string | null | undefined>;
  message: string;
}

function fromApiError(provider: string, error: ApiErrorLike): GenerationError {
  const kind = classifyStatus(error.status);
  return new GenerationError(kind, `${provider} request failed (${error.status ?? 'no status'}): ${error.message}`, {
    cause: error,
    retryAfterMs: kind === 'RateLimited' ? parseRetryAfter(error.headers?.['retry-after']) : undefined,
  });
}

export type ChatMessageParam =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string };

/**
 * System prompt, few-shot examples, the prompt, then the prefilled
 * opening of the reply for the backend to continue.
 */
export function buildMessages(request: GenerationRequest): ChatMessageParam[] {
  const messages: ChatMessageParam[] = [];
  if (request.system) {
    messages.push({ role: 'system', content: request.system });
  }
  for (const example of request.examples ?? []) {
    messages.push(
      example.role === 'user' ? { role: 'user', content: example.content } : { role: 'assistant', content: example.content }
    );
  }
  messages.push({ role: 'user', content: request.prompt });
  if (request.prefill) {
    messages.push({ role: 'assistant', content: request.prefill });
  }
  return messages;
}

type ErrorClass<T> = new (...args: never[]) => T;

/**
 * The error classes both SDKs expose as statics on their client class.
 */
export interface SdkErrorClasses {
  APIUserAbortError: ErrorClass<Error>;
  APIConnectionTimeoutError: ErrorClass<Error>;
  APIConnectionError: ErrorClass<Error>;
  APIError: ErrorClass<ApiErrorLike>;
}

/**
 * SDK error → GenerationError. Aborts and unknown errors pass through
 * unchanged. Subclasses are checked before APIError.
 */
export function toGenerationError(
  provider: string,
  error: unknown,
  errors: SdkErrorClasses,
  timeoutMs: number
): unknown {
  if (error instanceof errors.APIUserAbortError) {
    return error;
  }
  if (error instanceof errors.APIConnectionTimeoutError) {
    return new GenerationError('Timeout', `${provider} request timed out after ${timeoutMs}ms`, { cause: error });
  }
  if (error instanceof errors.APIConnectionError) {
    return new GenerationError('BackendUnavailable', `${provider} connection failed: ${error.message}`, {
      cause: error,
    });
  }
  if (error instanceof errors.APIError) {
    return fromApiError(provider, error);
  }
  return error;
}

export interface CompletionBody {
  model: string;
  messages: ChatMessageParam[];
  temperature: number;
  max_tokens: number;
  top_p?: number;
  stop?: string[];
}

export interface SdkCallOptions {
  timeout: number;
  signal?: AbortSignal;
  maxRetries: number;
}

interface CompletionLike {
  choices: Array<{ message?: { content?: string | null } }>;
}

type CreateCompletion = (body: CompletionBody, options: SdkCallOptions) => Promise<CompletionLike>;

/**
 * One chat completion through either SDK. SDK retries are disabled:
 * retry policy belongs to the pipeline, which counts retries per run.
 */
export async function completeChat(
  provider: string,
  model: string,
  create: CreateCompletion,
  errors: SdkErrorClasses,
  request: GenerationRequest,
  options: CallOptions
): Promise<string> {
  const startTime = Date.now();

  try {
    const response = await create(
      {
        model,
        messages: buildMessages(request),
        temperature: request.params.temperature,
        max_tokens: request.params.maxOutputTokens,
        top_p: request.params.topP,
        stop: request.params.stop,
      },
      { timeout: options.timeoutMs, signal: options.signal, maxRetries: 0 }
    );

    const result = response.choices[0]?.message?.content ?? '';
    logger.debug({ latency: Date.now() - startTime, provider, model, lens: request.lensName }, 'LLM generation completed');
    return result;
  } catch (error) {
    throw toGenerationError(provider, error, errors, options.timeoutMs);
  }
}

/**
 * GroqClient Implementation
 *
 * Default backend.
 */
export class GroqClient implements GenerationClient {
  readonly name = 'groq';
  private readonly client: Groq;

  constructor(apiKey: string, private readonly model: string) {
    if (!apiKey || apiKey.trim() === '') {
      throw new ConfigError(
        'GROQ_API_KEY is not configured. Set GROQ_API_KEY in .env file or as environment variable.'
      );
    }
    this.client = new Groq({ apiKey });
    logger.info({ model: this.model }, 'GroqClient initialized');
  }

  generate(request: GenerationRequest, options: CallOptions): Promise<string> {
    return completeChat(
      this.name,
      this.model,
      (body, callOptions) => this.client.chat.completions.create(body, callOptions),
      Groq,
      request,
      options
    );
  }
}

/**
 * OpenAIClient Implementation
 *
 * Also serves OpenAI-compatible servers through `baseUrl`.
 */
export class OpenAIClient implements GenerationClient {
  readonly name = 'openai';
  private readonly client: OpenAI;

  constructor(apiKey: string, private readonly model: string, baseUrl?: string) {
    if (!apiKey || apiKey.trim() === '') {
      throw new ConfigError(
        'OPENAI_API_KEY is not configured. Set OPENAI_API_KEY in .env file or as environment variable.'
      );
    }
    this.client = new OpenAI({ apiKey, baseURL: baseUrl });
    logger.info({ model: this.model, baseUrl }, 'OpenAIClient initialized');
  }

  generate(request: GenerationRequest, options: CallOptions): Promise<string> {
    return completeChat(
      this.name,
      this.model,
      (body, callOptions) => this.client.chat.completions.create(body, callOptions),
      OpenAI,
      request,
      options
    );
  }
}

export function createGenerationClient(generation: AppConfig['generation']): GenerationClient {
  switch (generation.provider) {
    case 'openai':
      return new OpenAIClient(generation.openai.apiKey, generation.openai.model, generation.openai.baseUrl);
    case 'groq':
      return new GroqClient(generation.groq.apiKey, generation.groq.model);
  }
}
