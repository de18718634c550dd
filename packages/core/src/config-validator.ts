import JSON5 from 'json5';
import { readFileSync } from 'node:fs';
import type { InputField, Skill } from './agent.js';
import type {
  AgentConfigEntry,
  AgentNetConfig,
  LoggingConfig,
  NetworkConfig,
  ProviderConfig,
  ProvidersConfig,
  RouterConfig,
  ServerConfig,
} from './config.js';
import {
  DEFAULT_LOGGING_CONFIG,
  DEFAULT_NETWORK_CONFIG,
  DEFAULT_ROUTER_CONFIG,
} from './config.js';
import { applyEnvOverrides } from './config-env-overlay.js';
import { LOG_LEVELS } from './logger.js';
import { isNonEmptyString, isRecord } from './utils.js';

/** Sections that must exist at the top level of the config. */
const REQUIRED_SECTIONS = ['server', 'providers', 'agents'] as const;

/** All valid top-level keys (required + optional). */
const VALID_TOP_LEVEL_KEYS = new Set<string>([...REQUIRED_SECTIONS, 'router', 'network', 'logging']);

export interface ConfigValidationError {
  path: string;
  message: string;
}

export interface ConfigValidationResult {
  valid: boolean;
  errors: ConfigValidationError[];
  config?: AgentNetConfig;
}

export interface ValidateConfigOptions {
  /** Env map applied as `AGENTNET_*` overrides before validation. */
  env?: Record<string, string | undefined>;
}

/**
 * Parse and validate a JSON5 config string into a typed config.
 * Rejects unknown top-level keys (strict mode) and reports every
 * violation with its path.
 */
export function validateConfig(
  json5String: string,
  options: ValidateConfigOptions = {},
): ConfigValidationResult {
  let parsed: unknown;
  try {
    parsed = JSON5.parse(json5String);
  } catch (err) {
    return {
      valid: false,
      errors: [{ path: '', message: `Invalid JSON5: ${String(err)}` }],
    };
  }

  if (isRecord(parsed) && options.env) {
    applyEnvOverrides(parsed, options.env);
  }

  return validateConfigObject(parsed);
}

/** Validate an already-parsed config value. */
export function validateConfigObject(parsed: unknown): ConfigValidationResult {
  if (!isRecord(parsed)) {
    return {
      valid: false,
      errors: [{ path: '', message: 'Config must be an object' }],
    };
  }

  const v = new Validator();

  for (const key of Object.keys(parsed)) {
    if (!VALID_TOP_LEVEL_KEYS.has(key)) {
      v.fail(key, `Unknown top-level key: "${key}"`);
    }
  }

  for (const section of REQUIRED_SECTIONS) {
    if (!(section in parsed)) {
      v.fail(section, `Missing required section: "${section}"`);
    }
  }

  const server = 'server' in parsed ? v.server(parsed['server'], 'server') : undefined;
  const providers = 'providers' in parsed ? v.providers(parsed['providers'], 'providers') : undefined;
  const agents = 'agents' in parsed ? v.agents(parsed['agents'], 'agents') : undefined;
  const router = v.router(parsed['router'], 'router');
  const network = v.network(parsed['network'], 'network');
  const logging = v.logging(parsed['logging'], 'logging');

  if (v.errors.length > 0 || !server || !providers || !agents) {
    return { valid: false, errors: v.errors };
  }

  return {
    valid: true,
    errors: [],
    config: { server, providers, agents, router, network, logging },
  };
}

/**
 * Load, overlay with `AGENTNET_*` env vars, and validate a JSON5 config file.
 */
export function loadConfig(
  filePath: string,
  env: Record<string, string | undefined> = process.env,
): ConfigValidationResult {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (err) {
    return {
      valid: false,
      errors: [{ path: '', message: `Cannot read config file: ${String(err)}` }],
    };
  }
  return validateConfig(content, { env });
}

function join(path: string, key: string | number): string {
  if (typeof key === 'number') return `${path}[${key}]`;
  return path ? `${path}.${key}` : key;
}

class Validator {
  readonly errors: ConfigValidationError[] = [];

  fail(path: string, message: string): void {
    this.errors.push({ path, message });
  }

  server(value: unknown, path: string): ServerConfig | undefined {
    if (!isRecord(value)) {
      this.fail(path, 'Must be an object');
      return undefined;
    }
    const port = this.number(value, 'port', path, { min: 0, max: 65_535, integer: true });
    const host = this.string(value, 'host', path, false);
    if (port === undefined) return undefined;
    return host === undefined ? { port } : { port, host };
  }

  providers(value: unknown, path: string): ProvidersConfig | undefined {
    if (!isRecord(value)) {
      this.fail(path, 'Must be an object');
      return undefined;
    }
    const primary = this.provider(value['primary'], join(path, 'primary'));
    const secondary = value['secondary'] === undefined
      ? undefined
      : this.provider(value['secondary'], join(path, 'secondary'));
    const temperature = this.number(value, 'temperature', path, { min: 0, max: 2 }, false);
    const maxTokens = this.number(value, 'maxTokens', path, { min: 1, integer: true }, false);
    if (!primary) return undefined;

    const result: ProvidersConfig = { primary };
    if (secondary) result.secondary = secondary;
    if (temperature !== undefined) result.temperature = temperature;
    if (maxTokens !== undefined) result.maxTokens = maxTokens;
    return result;
  }

  provider(value: unknown, path: string): ProviderConfig | undefined {
    if (!isRecord(value)) {
      this.fail(path, 'Must be an object');
      return undefined;
    }
    switch (value['type']) {
      case 'openai': {
        const model = this.string(value, 'model', path);
        const apiKeyEnv = this.string(value, 'apiKeyEnv', path, false) ?? 'OPENAI_API_KEY';
        return model === undefined ? undefined : { type: 'openai', model, apiKeyEnv };
      }
      case 'azure-openai': {
        const deployment = this.string(value, 'deployment', path);
        if (deployment === undefined) return undefined;
        return {
          type: 'azure-openai',
          deployment,
          apiKeyEnv: this.string(value, 'apiKeyEnv', path, false) ?? 'AZURE_OPENAI_API_KEY',
          endpointEnv: this.string(value, 'endpointEnv', path, false) ?? 'AZURE_OPENAI_ENDPOINT',
          apiVersionEnv:
            this.string(value, 'apiVersionEnv', path, false) ?? 'AZURE_OPENAI_API_VERSION',
        };
      }
      default:
        this.fail(join(path, 'type'), 'Must be "openai" or "azure-openai"');
        return undefined;
    }
  }

  router(value: unknown, path: string): RouterConfig {
    if (value === undefined) return { ...DEFAULT_ROUTER_CONFIG };
    if (!isRecord(value)) {
      this.fail(path, 'Must be an object');
      return { ...DEFAULT_ROUTER_CONFIG };
    }
    const mode = value['mode'];
    if (mode !== undefined && mode !== 'llm' && mode !== 'lexical') {
      this.fail(join(path, 'mode'), 'Must be "llm" or "lexical"');
    }
    const tagWeight =
      this.number(value, 'tagWeight', path, { min: 0 }, false) ?? DEFAULT_ROUTER_CONFIG.tagWeight;
    const textWeight =
      this.number(value, 'textWeight', path, { min: 0 }, false) ?? DEFAULT_ROUTER_CONFIG.textWeight;
    // Tag matches must never score below description matches.
    if (tagWeight <= 0) {
      this.fail(join(path, 'tagWeight'), 'Must be greater than 0');
    } else if (textWeight > tagWeight) {
      this.fail(join(path, 'textWeight'), `Must not exceed tagWeight (${tagWeight})`);
    }
    return {
      mode: mode === 'lexical' ? 'lexical' : 'llm',
      minConfidence:
        this.number(value, 'minConfidence', path, { min: 0, max: 1 }, false)
        ?? DEFAULT_ROUTER_CONFIG.minConfidence,
      tagWeight,
      textWeight,
    };
  }

  network(value: unknown, path: string): NetworkConfig {
    if (value === undefined) return { ...DEFAULT_NETWORK_CONFIG };
    if (!isRecord(value)) {
      this.fail(path, 'Must be an object');
      return { ...DEFAULT_NETWORK_CONFIG };
    }
    return {
      requestTimeoutMs:
        this.number(value, 'requestTimeoutMs', path, { min: 1, integer: true }, false)
        ?? DEFAULT_NETWORK_CONFIG.requestTimeoutMs,
    };
  }

  logging(value: unknown, path: string): LoggingConfig {
    if (value === undefined) return { ...DEFAULT_LOGGING_CONFIG };
    if (!isRecord(value)) {
      this.fail(path, 'Must be an object');
      return { ...DEFAULT_LOGGING_CONFIG };
    }
    const level = value['level'];
    if (level === undefined) return { ...DEFAULT_LOGGING_CONFIG };
    const known = LOG_LEVELS.find((l) => l === level);
    if (!known) {
      this.fail(join(path, 'level'), `Must be one of: ${LOG_LEVELS.join(', ')}`);
      return { ...DEFAULT_LOGGING_CONFIG };
    }
    return { level: known };
  }

  agents(value: unknown, path: string): AgentConfigEntry[] | undefined {
    if (!Array.isArray(value)) {
      this.fail(path, 'Must be an array');
      return undefined;
    }
    if (value.length === 0) {
      this.fail(path, 'At least one agent is required');
      return undefined;
    }

    const entries: AgentConfigEntry[] = [];
    const seen = new Set<string>();
    value.forEach((raw: unknown, i) => {
      const entry = this.agent(raw, join(path, i));
      if (!entry) return;
      if (seen.has(entry.name)) {
        this.fail(join(join(path, i), 'name'), `Duplicate agent name: "${entry.name}"`);
        return;
      }
      seen.add(entry.name);
      entries.push(entry);
    });
    return entries;
  }

  agent(value: unknown, path: string): AgentConfigEntry | undefined {
    if (!isRecord(value)) {
      this.fail(path, 'Must be an object');
      return undefined;
    }
    const name = this.string(value, 'name', path);
    const address = this.string(value, 'address', path);
    if (address !== undefined && !URL.canParse(address)) {
      this.fail(join(path, 'address'), `Not a valid URL: "${address}"`);
    }
    const description = this.string(value, 'description', path, false);
    const template = this.string(value, 'template', path, false);

    let skills: Skill[] | undefined;
    if (value['skills'] !== undefined) {
      const rawSkills = value['skills'];
      if (!Array.isArray(rawSkills)) {
        this.fail(join(path, 'skills'), 'Must be an array');
      } else {
        skills = [];
        // One agent runs one template; skills may repeat it but not name another.
        let agentTemplate = template;
        rawSkills.forEach((s: unknown, i) => {
          const skillPath = join(join(path, 'skills'), i);
          const skill = this.skill(s, skillPath);
          if (!skill) return;
          skills?.push(skill);
          if (skill.template === undefined) return;
          if (agentTemplate === undefined) {
            agentTemplate = skill.template;
          } else if (skill.template !== agentTemplate) {
            this.fail(
              join(skillPath, 'template'),
              `Conflicts with template "${agentTemplate}"; an agent runs a single template`,
            );
          }
        });
      }
    }
    if (template === undefined && (skills === undefined || skills.length === 0)) {
      this.fail(path, 'Agent needs either "skills" or a "template"');
    }


    const listen = value['listen'] === undefined
      ? undefined
      : this.server(value['listen'], join(path, 'listen'));

    if (name === undefined || address === undefined) return undefined;
    const entry: AgentConfigEntry = { name, address };
    if (description !== undefined) entry.description = description;
    if (template !== undefined) entry.template = template;
    if (skills !== undefined) entry.skills = skills;
    if (listen !== undefined) entry.listen = listen;
    return entry;
  }

  skill(value: unknown, path: string): Skill | undefined {
    if (!isRecord(value)) {
      this.fail(path, 'Must be an object');
      return undefined;
    }
    const name = this.string(value, 'name', path);
    const description = this.string(value, 'description', path);
    const template = this.string(value, 'template', path, false);

    const tags: string[] = [];
    const rawTags = value['tags'];
    if (!Array.isArray(rawTags)) {
      this.fail(join(path, 'tags'), 'Must be an array of strings');
    } else {
      rawTags.forEach((t: unknown, i) => {
        if (isNonEmptyString(t)) tags.push(t);
        else this.fail(join(join(path, 'tags'), i), 'Must be a non-empty string');
      });
    }

    const expectedInputs: InputField[] = [];
    const rawInputs = value['expectedInputs'];
    if (rawInputs !== undefined) {
      if (!Array.isArray(rawInputs)) {
        this.fail(join(path, 'expectedInputs'), 'Must be an array');
      } else {
        rawInputs.forEach((input: unknown, i) => {
          const field = this.inputField(input, join(join(path, 'expectedInputs'), i));
          if (field) expectedInputs.push(field);
        });
      }
    }

    if (name === undefined || description === undefined) return undefined;
    const skill: Skill = { name, description, tags, expectedInputs };
    if (template !== undefined) skill.template = template;
    return skill;
  }

  inputField(value: unknown, path: string): InputField | undefined {
    if (isNonEmptyString(value)) return { name: value };
    if (!isRecord(value)) {
      this.fail(path, 'Must be a field name or an object');
      return undefined;
    }
    const name = this.string(value, 'name', path);
    const description = this.string(value, 'description', path, false);
    const required = value['required'];
    if (required !== undefined && typeof required !== 'boolean') {
      this.fail(join(path, 'required'), 'Must be a boolean');
    }
    if (name === undefined) return undefined;
    const field: InputField = { name };
    if (description !== undefined) field.description = description;
    if (typeof required === 'boolean') field.required = required;
    return field;
  }

  private string(
    source: Record<string, unknown>,
    key: string,
    path: string,
    required = true,
  ): string | undefined {
    const value = source[key];
    if (value === undefined) {
      if (required) this.fail(join(path, key), 'Required');
      return undefined;
    }
    if (!isNonEmptyString(value)) {
      this.fail(join(path, key), 'Must be a non-empty string');
      return undefined;
    }
    return value;
  }

  private number(
    source: Record<string, unknown>,
    key: string,
    path: string,
    bounds: { min?: number; max?: number; integer?: boolean },
    required = true,
  ): number | undefined {
    const value = source[key];
    if (value === undefined) {
      if (required) this.fail(join(path, key), 'Required');
      return undefined;
    }
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      this.fail(join(path, key), 'Must be a number');
      return undefined;
    }
    if (bounds.integer && !Number.isInteger(value)) {
      this.fail(join(path, key), 'Must be an integer');
      return undefined;
    }
    if ((bounds.min !== undefined && value < bounds.min) || (bounds.max !== undefined && value > bounds.max)) {
      this.fail(join(path, key), `Must be between ${bounds.min ?? '-∞'} and ${bounds.max ?? '∞'}`);
      return undefined;
    }
    return value;
  }
}
