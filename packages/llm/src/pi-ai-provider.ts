import type { GenerateOptions, PromptMessages, TextGenerator } from '@agentnet/core';
import { ProviderError, toPromptMessages } from '@agentnet/core';
import { stream } from '@mariozechner/pi-ai';
import type { Api, Context as PiContext, Model } from '@mariozechner/pi-ai';

export interface PiAiTextGeneratorOptions {
  model: Model<Api>;
  id?: string;
  /** Environment variable holding the API key. Default: `OPENAI_API_KEY`. */
  apiKeyEnv?: string;
  env?: Record<string, string | undefined>;
}

/**
 * TextGenerator wrapping pi-ai's `stream()` function.
 * `responseFormat` is not passed on: pi-ai's stream options have no JSON mode.
 * The API key is resolved per call; a missing key is an initialisation
 * failure and surfaces as a ProviderError before any request is made.
 */
export class PiAiTextGenerator implements TextGenerator {
  readonly id: string;

  private readonly model: Model<Api>;
  private readonly apiKeyEnv: string;
  private readonly env: Record<string, string | undefined>;

  constructor(options: PiAiTextGeneratorOptions) {
    this.model = options.model;
    this.id = options.id ?? `pi-ai:${options.model.provider}`;
    this.apiKeyEnv = options.apiKeyEnv ?? 'OPENAI_API_KEY';
    this.env = options.env ?? process.env;
  }

  async generate(prompt: string | PromptMessages, options: GenerateOptions = {}): Promise<string> {
    const apiKey = this.env[this.apiKeyEnv];
    if (!apiKey) {
      throw new ProviderError(
        this.id,
        `Missing API key: environment variable ${this.apiKeyEnv} is not set`,
      );
    }

    const eventStream = stream(this.model, this.buildContext(toPromptMessages(prompt)), {
      apiKey,
      temperature: options.temperature,
      maxTokens: options.maxTokens,
      signal: options.signal,
    });

    let text = '';
    try {
      for await (const event of eventStream) {
        if (event.type === 'text_delta') {
          text += event.delta;
        } else if (event.type === 'error') {
          throw new ProviderError(
            this.id,
            event.error.errorMessage ?? 'Completion stream ended with an error event',
          );
        }
        // Ignore: start, text_start, text_end, thinking_*, toolcall_*, done
      }
    } catch (err) {
      if (err instanceof ProviderError) throw err;
      throw new ProviderError(this.id, 'Completion request failed', err);
    }
    return text;
  }

  /** Convert a prompt into a pi-ai Context. */
  private buildContext(prompt: PromptMessages): PiContext {
    return {
      systemPrompt: prompt.system,
      messages: [
        {
          role: 'user',
          content: [{ type: 'text', text: prompt.user }],
          timestamp: Date.now(),
        },
      ],
    };
  }
}
