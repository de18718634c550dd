export { bootstrap } from './bootstrap.js';
export type { AppServer, BootstrapOptions } from './bootstrap.js';
export { buildAgentDescriptor, createPromptAgent, resolveTemplateId } from './agent-wiring.js';
export type { PromptAgentWiringOptions } from './agent-wiring.js';
