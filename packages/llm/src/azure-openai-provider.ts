import type { GenerateOptions, PromptMessages, TextGenerator } from '@agentnet/core';
import { ProviderError, toPromptMessages } from '@agentnet/core';
import { AzureOpenAI } from 'openai';

export interface AzureOpenAITextGeneratorOptions {
  deployment: string;
  apiKeyEnv: string;
  endpointEnv: string;
  apiVersionEnv: string;
  id?: string;
  env?: Record<string, string | undefined>;
}

/** Azure OpenAI chat completions through the `openai` SDK's AzureOpenAI client. */
export class AzureOpenAITextGenerator implements TextGenerator {
  readonly id: string;

  private readonly options: AzureOpenAITextGeneratorOptions;
  private readonly env: Record<string, string | undefined>;
  private client: AzureOpenAI | null = null;

  constructor(options: AzureOpenAITextGeneratorOptions) {
    this.options = options;
    this.id = options.id ?? 'azure-openai';
    this.env = options.env ?? process.env;
  }

  async generate(prompt: string | PromptMessages, options: GenerateOptions = {}): Promise<string> {
    const client = this.getClient();
    const { system, user } = toPromptMessages(prompt);

    try {
      const completion = await client.chat.completions.create(
        {
          model: this.options.deployment,
          messages: [
            ...(system ? [{ role: 'system' as const, content: system }] : []),
            { role: 'user' as const, content: user },
          ],
          temperature: options.temperature,
          max_tokens: options.maxTokens,
          ...(options.responseFormat === 'json'
            ? { response_format: { type: 'json_object' as const } }
            : {}),
        },
        { signal: options.signal },
      );
      return completion.choices[0]?.message.content ?? '';
    } catch (err) {
      throw new ProviderError(this.id, 'Chat completion request failed', err);
    }
  }

  /** Build the client on first use so missing settings fail the call, not startup. */
  private getClient(): AzureOpenAI {
    if (this.client) return this.client;

    const missing = [this.options.apiKeyEnv, this.options.endpointEnv, this.options.apiVersionEnv]
      .filter((name) => !this.env[name]);
    if (missing.length > 0) {
      throw new ProviderError(
        this.id,
        `Missing configuration: environment variable(s) ${missing.join(', ')} not set`,
      );
    }

    try {
      this.client = new AzureOpenAI({
        apiKey: this.env[this.options.apiKeyEnv],
        endpoint: this.env[this.options.endpointEnv],
        apiVersion: this.env[this.options.apiVersionEnv],
        deployment: this.options.deployment,
      });
    } catch (err) {
      throw new ProviderError(this.id, 'Failed to initialise client', err);
    }
    return this.client;
  }
}
