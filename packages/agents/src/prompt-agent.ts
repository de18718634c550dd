import type {
  AgentDescriptor,
  AgentEndpoint,
  GenerateOptions,
  Logger,
  TaskRequest,
  TaskResponse,
  TextGenerator,
} from '@agentnet/core';
import { EmptyCompletionError, noopLogger } from '@agentnet/core';
import type { SkillTemplate } from './skill-templates.js';

export interface PromptAgentOptions {
  descriptor: AgentDescriptor;
  template: SkillTemplate;
  /** Usually a FallbackTextGenerator, so provider fallback is applied per call. */
  generator: TextGenerator;
  logger?: Logger;
  temperature?: number;
  maxTokens?: number;
}

/**
 * Agent endpoint whose whole behaviour is one prompt template forwarded
 * to a text generator. One outbound generation call per task.
 */
export class PromptAgent implements AgentEndpoint {
  readonly descriptor: AgentDescriptor;

  private readonly template: SkillTemplate;
  private readonly generator: TextGenerator;
  private readonly logger: Logger;
  private readonly generateOptions: GenerateOptions;

  constructor(options: PromptAgentOptions) {
    this.descriptor = options.descriptor;
    this.template = options.template;
    this.generator = options.generator;
    this.logger = options.logger ?? noopLogger;
    this.generateOptions = { temperature: options.temperature, maxTokens: options.maxTokens };
  }

  get name(): string {
    return this.descriptor.name;
  }

  async handle(request: TaskRequest, signal?: AbortSignal): Promise<TaskResponse> {
    const hasInput = this.template.hasInput
      ? this.template.hasInput(request)
      : request.query.trim() !== '';
    if (!hasInput) {
      return {
        id: request.id,
        agent: this.name,
        state: 'input-required',
        text: this.template.missingInputMessage,
      };
    }

    this.logger.debug(`Agent "${this.name}" handling task ${request.id} with template "${this.template.id}"`);

    const text = await this.generator.generate(this.template.build(request), {
      ...this.generateOptions,
      signal,
    });

    const trimmed = text.trim();
    if (trimmed === '') {
      throw new EmptyCompletionError(this.name);
    }

    return { id: request.id, agent: this.name, state: 'completed', text: trimmed };
  }
}
