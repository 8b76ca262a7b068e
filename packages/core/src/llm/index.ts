/**
 * LLM module barrel export.
 */

export type { PromptMessage, ModelConfig, GenerationProvider } from './types.js';
export { OpenAIProvider, toGenerationError } from './openai.js';
export type { OpenAIProviderOpts, ChatCompletionFn, ChatCompletionRequest, ChatCompletionReply } from './openai.js';
export { summarizeSchema } from './schema.js';
export type { SchemaDescription, SchemaStyle, SummarizeOpts } from './schema.js';
export { buildNarrationPrompt, buildGenerationPrompt, renderPrompt } from './prompt.js';
export type { PriorAttempt, GenerationPromptOpts } from './prompt.js';
export { extractQuery, NO_STATEMENT_FOUND } from './extract.js';
export type { ExtractionResult } from './extract.js';
