import type { AgentNetConfig, Logger, TextGenerator } from '@agentnet/core';
import { ConfigError, createConsoleLogger, loadConfig } from '@agentnet/core';
import { createTextGenerator } from '@agentnet/llm';
import {
  AgentDescriptorRegistry,
  AgentRouter,
  HttpAgentConnection,
  LocalAgentConnection,
  NetworkManager,
} from '@agentnet/orchestrator';
import type { AgentConnection } from '@agentnet/orchestrator';
import { AgentServer, GatewayServer } from '@agentnet/gateway';
import { buildAgentDescriptor, createPromptAgent } from './agent-wiring.js';

export interface BootstrapOptions {
  /** JSON5 config file. Ignored when `config` is given. */
  configPath?: string;
  config?: AgentNetConfig;
  logger?: Logger;
  env?: Record<string, string | undefined>;
  /** Replaces the configured providers (e.g. for testing with a fake). */
  generator?: TextGenerator;
  /** Start the HTTP servers. Default: true. */
  listen?: boolean;
}

export interface AppServer {
  config: AgentNetConfig;
  registry: AgentDescriptorRegistry;
  network: NetworkManager;
  gateway: GatewayServer;
  agentServers: AgentServer[];
  logger: Logger;
  shutdown: () => Promise<void>;
}

function resolveConfig(options: BootstrapOptions): AgentNetConfig {
  if (options.config) return options.config;
  if (!options.configPath) {
    throw new ConfigError('Either "config" or "configPath" is required');
  }

  const result = loadConfig(options.configPath, options.env);
  if (!result.valid || !result.config) {
    const errorMessages = result.errors.map((e) => `${e.path}: ${e.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${errorMessages}`);
  }
  return result.config;
}

/**
 * Bootstrap the agent network:
 * 1. Load and validate config
 * 2. Build descriptors and the registry
 * 3. Wire locally hosted agents and connections to remote ones
 * 4. Wire router, network manager and gateway
 * 5. Start the agent servers, then the gateway
 */
export async function bootstrap(options: BootstrapOptions): Promise<AppServer> {
  const config = resolveConfig(options);
  const logger = options.logger ?? createConsoleLogger(config.logging.level);
  const generator =
    options.generator ?? createTextGenerator(config.providers, { logger, env: options.env });

  const registry = new AgentDescriptorRegistry();
  const connections = new Map<string, AgentConnection>();
  const agentServers: AgentServer[] = [];

  for (const entry of config.agents) {
    const descriptor = registry.register(buildAgentDescriptor(entry));

    if (entry.listen) {
      const endpoint = createPromptAgent({
        entry,
        descriptor,
        generator,
        providers: config.providers,
        logger,
      });
      connections.set(descriptor.name, new LocalAgentConnection(endpoint));
      agentServers.push(new AgentServer({ endpoint, ...entry.listen, logger }));
    } else {
      connections.set(
        descriptor.name,
        new HttpAgentConnection({ agentName: descriptor.name, address: descriptor.address, logger }),
      );
    }
  }
  logger.info(`${registry.size} agent(s) registered, ${agentServers.length} hosted locally`);

  const router = new AgentRouter({
    generator: config.router.mode === 'llm' ? generator : undefined,
    logger,
    minConfidence: config.router.minConfidence,
    weights: { tagWeight: config.router.tagWeight, textWeight: config.router.textWeight },
  });
  const network = new NetworkManager({
    registry,
    router,
    connections,
    logger,
    requestTimeoutMs: config.network.requestTimeoutMs,
  });
  const gateway = new GatewayServer({ network, ...config.server, logger });

  const shutdown = async (): Promise<void> => {
    logger.info('Shutting down...');
    await gateway.stop();
    await Promise.all(agentServers.map((server) => server.stop()));
    logger.info('Shutdown complete');
  };

  if (options.listen !== false) {
    try {
      for (const server of agentServers) {
        await server.start();
      }
      await gateway.start();
    } catch (err) {
      await shutdown();
      throw err;
    }
  }

  return { config, registry, network, gateway, agentServers, logger, shutdown };
}
