/** A prompt split into its instruction and user parts. */
export interface PromptMessages {
  system?: string;
  user: string;
}

/** Options for a single generation call. */
export interface GenerateOptions {
  temperature?: number;
  maxTokens?: number;
  /**
   * Ask the provider for a JSON object instead of prose, where supported.
   * The pi-ai provider ignores it; callers still parse replies leniently.
   */
  responseFormat?: 'text' | 'json';
  signal?: AbortSignal;
}

/**
 * Provider-agnostic text generation capability.
 * Implementations wrap a specific backend (OpenAI, Azure OpenAI) or
 * compose several of them.
 */
export interface TextGenerator {
  readonly id: string;
  generate(prompt: string | PromptMessages, options?: GenerateOptions): Promise<string>;
}

/** Normalise a prompt argument into its parts. */
export function toPromptMessages(prompt: string | PromptMessages): PromptMessages {
  return typeof prompt === 'string' ? { user: prompt } : prompt;
}
