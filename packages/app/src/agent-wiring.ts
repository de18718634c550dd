import type { AgentConfigEntry, AgentDescriptor, Logger, ProvidersConfig, TextGenerator } from '@agentnet/core';
import { ConfigError } from '@agentnet/core';
import { PromptAgent, getCatalogueEntry, getSkillTemplate } from '@agentnet/agents';
import type { SkillTemplate } from '@agentnet/agents';

/** Template backing an agent: its own, or its skills'. Validated config never mixes templates. */
export function resolveTemplateId(entry: AgentConfigEntry): string | undefined {
  return entry.template ?? entry.skills?.find((skill) => skill.template !== undefined)?.template;
}

function resolveTemplate(entry: AgentConfigEntry): SkillTemplate {
  const templateId = resolveTemplateId(entry);
  if (templateId === undefined) {
    throw new ConfigError(`Agent "${entry.name}" is hosted locally but has no template`);
  }
  const template = getSkillTemplate(templateId);
  if (!template) {
    throw new ConfigError(`Agent "${entry.name}" uses unknown template "${templateId}"`);
  }
  return template;
}

/**
 * Turn a config entry into a descriptor, taking description and skills
 * from the built-in catalogue where the entry leaves them out.
 */
export function buildAgentDescriptor(entry: AgentConfigEntry): AgentDescriptor {
  const catalogue = entry.template !== undefined ? getCatalogueEntry(entry.template) : undefined;
  if (entry.template !== undefined && !catalogue) {
    throw new ConfigError(`Agent "${entry.name}" uses unknown template "${entry.template}"`);
  }

  const skills = entry.skills ?? catalogue?.skills ?? [];
  const description = entry.description ?? catalogue?.description;
  return {
    name: entry.name,
    address: entry.address,
    ...(description !== undefined ? { description } : {}),
    skills,
  };
}

export interface PromptAgentWiringOptions {
  entry: AgentConfigEntry;
  descriptor: AgentDescriptor;
  generator: TextGenerator;
  providers: ProvidersConfig;
  logger: Logger;
}

/** Endpoint for an agent hosted in this process. */
export function createPromptAgent(options: PromptAgentWiringOptions): PromptAgent {
  return new PromptAgent({
    descriptor: options.descriptor,
    template: resolveTemplate(options.entry),
    generator: options.generator,
    logger: options.logger,
    temperature: options.providers.temperature,
    maxTokens: options.providers.maxTokens,
  });
}
