/**
 * LLM-facing types.
 */

export interface PromptMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ModelConfig {
  /** Model identifier passed to the provider */
  model: string;
  /** 0 favours deterministic output, higher values more varied output */
  temperature: number;
  /** Hard cap on completion length */
  maxOutputTokens: number;
}

/**
 * A text-generation provider: prompt in, completion out.
 * Implementations own their transient retry and timeout policy and throw
 * GenerationUnavailableError or GenerationEmptyError on failure.
 */
export interface GenerationProvider {
  complete(messages: PromptMessage[], config: ModelConfig): Promise<string>;
}
