// Agent endpoint
export { PromptAgent } from './prompt-agent.js';
export type { PromptAgentOptions } from './prompt-agent.js';

// Skill templates
export {
  summarizeTemplate,
  translateTemplate,
  sqlGenerationTemplate,
  nlqReconstructionTemplate,
  productDescriptionTemplate,
  gatingTemplate,
  dynamicFewshotsTemplate,
  DEFAULT_FEWSHOT_COUNT,
  getSkillTemplate,
  SKILL_TEMPLATE_IDS,
} from './skill-templates.js';
export type { SkillTemplate } from './skill-templates.js';
export { extractTargetLanguage, DEFAULT_TARGET_LANGUAGE } from './language.js';
export type { TranslationInstruction } from './language.js';

// Built-in catalogue
export { getCatalogueEntry } from './catalogue.js';
export type { CatalogueEntry } from './catalogue.js';
