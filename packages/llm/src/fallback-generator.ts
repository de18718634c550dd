import type {
  GenerateOptions,
  Logger,
  PromptMessages,
  ProviderFailure,
  TextGenerator,
} from '@agentnet/core';
import { ProviderUnavailableError, errorMessage, noopLogger } from '@agentnet/core';

export interface FallbackTextGeneratorOptions {
  primary: TextGenerator;
  secondary?: TextGenerator;
  logger?: Logger;
  id?: string;
}

/**
 * Single-level provider fallback. Each call tries the primary once and,
 * only if it throws, the secondary once. A returned string is final even
 * when it is unhelpful. No state carries over between calls.
 */
export class FallbackTextGenerator implements TextGenerator {
  readonly id: string;

  private readonly providers: TextGenerator[];
  private readonly logger: Logger;

  constructor(options: FallbackTextGeneratorOptions) {
    this.providers = options.secondary ? [options.primary, options.secondary] : [options.primary];
    this.logger = options.logger ?? noopLogger;
    this.id = options.id ?? this.providers.map((p) => p.id).join('>');
  }

  async generate(prompt: string | PromptMessages, options: GenerateOptions = {}): Promise<string> {
    const failures: ProviderFailure[] = [];

    for (const provider of this.providers) {
      try {
        const text = await provider.generate(prompt, options);
        if (failures.length > 0) {
          this.logger.info(`Provider "${provider.id}" succeeded after fallback`);
        }
        return text;
      } catch (err) {
        // Cancellation belongs to the caller, not to the provider.
        if (options.signal?.aborted) throw err;

        failures.push({ provider: provider.id, error: err });
        this.logger.warn(`Provider "${provider.id}" failed: ${errorMessage(err)}`);
      }
    }

    throw new ProviderUnavailableError(failures);
  }
}
