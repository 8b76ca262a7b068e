/**
 * OpenAI provider for schema narration and SQL generation.
 * Reads OPENAI_API_KEY (and optionally OPENAI_BASE_URL) from the environment.
 *
 * Transient failures are retried by the SDK itself (maxRetries) and never
 * count against the repair loop's revision budget.
 */

import OpenAI from 'openai';
import { GenerationEmptyError, GenerationUnavailableError, errorMessage, type GenerationFailureReason } from '../errors.js';
import type { GenerationProvider, ModelConfig, PromptMessage } from './types.js';

export interface ChatCompletionRequest {
  model: string;
  messages: OpenAI.ChatCompletionMessageParam[];
  temperature: number;
  max_tokens: number;
}

export interface ChatCompletionReply {
  choices: Array<{ message?: { content?: string | null } }>;
}

export type ChatCompletionFn = (request: ChatCompletionRequest) => Promise<ChatCompletionReply>;

export interface OpenAIProviderOpts {
  apiKey?: string;
  baseURL?: string;
  /** SDK-level retries for connection errors, 408/409/429 and 5xx */
  maxRetries?: number;
  timeoutMs?: number;
  /** Replaces the SDK call; used by tests */
  createCompletion?: ChatCompletionFn;
}

function getApiKey(): string {
  const key = process.env.OPENAI_API_KEY;
  if (!key) {
    throw new GenerationUnavailableError(
      'auth',
      'OpenAI API key is not configured. Set OPENAI_API_KEY in your shell.',
    );
  }
  return key;
}

function toChatMessage(message: PromptMessage): OpenAI.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
  }
}

function readStatus(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return undefined;
}

/**
 * Map a provider failure onto the generation error taxonomy.
 */
export function toGenerationError(err: unknown): GenerationUnavailableError {
  const status = readStatus(err);
  let reason: GenerationFailureReason = 'provider';
  if (err instanceof OpenAI.APIConnectionError) {
    reason = 'network';
  } else if (status === 401 || status === 403) {
    reason = 'auth';
  } else if (status === 429) {
    reason = 'quota';
  } else if (status === undefined && err instanceof Error && /ECONN|ETIMEDOUT|ENOTFOUND|fetch failed/i.test(err.message)) {
    reason = 'network';
  }
  return new GenerationUnavailableError(reason, `OpenAI request failed: ${errorMessage(err)}`, { status, cause: err });
}

export class OpenAIProvider implements GenerationProvider {
  private createCompletion: ChatCompletionFn;

  constructor(opts: OpenAIProviderOpts = {}) {
    if (opts.createCompletion) {
      this.createCompletion = opts.createCompletion;
      return;
    }
    const client = new OpenAI({
      apiKey: opts.apiKey ?? getApiKey(),
      baseURL: opts.baseURL ?? process.env.OPENAI_BASE_URL,
      maxRetries: opts.maxRetries ?? 2,
      timeout: opts.timeoutMs ?? 60_000,
    });
    this.createCompletion = (request) => client.chat.completions.create({ ...request, stream: false });
  }

  async complete(messages: PromptMessage[], config: ModelConfig): Promise<string> {
    let reply: ChatCompletionReply;
    try {
      reply = await this.createCompletion({
        model: config.model,
        messages: messages.map(toChatMessage),
        temperature: config.temperature,
        max_tokens: config.maxOutputTokens,
      });
    } catch (err: unknown) {
      throw toGenerationError(err);
    }

    const content = reply.choices[0]?.message?.content;
    if (!content?.trim()) {
      throw new GenerationEmptyError('OpenAI returned an empty response.');
    }
    return content;
  }
}
