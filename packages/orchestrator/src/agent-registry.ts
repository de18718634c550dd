import type { AgentDescriptor } from '@agentnet/core';
import { DuplicateAgentError, UnknownAgentError, deepFreeze } from '@agentnet/core';

/**
 * Append-only catalogue of agent descriptors, keyed by name and kept in
 * insertion order. Descriptors are frozen copies, so the registry can be
 * shared across concurrent requests without locking.
 */
export class AgentDescriptorRegistry {
  private readonly descriptors = new Map<string, AgentDescriptor>();

  /** Build a registry from descriptors, registering them in order. */
  static from(descriptors: Iterable<AgentDescriptor>): AgentDescriptorRegistry {
    const registry = new AgentDescriptorRegistry();
    for (const descriptor of descriptors) {
      registry.register(descriptor);
    }
    return registry;
  }

  /** Register a descriptor. Returns the stored, frozen copy. */
  register(descriptor: AgentDescriptor): AgentDescriptor {
    if (this.descriptors.has(descriptor.name)) {
      throw new DuplicateAgentError(descriptor.name);
    }
    const stored = deepFreeze(structuredClone(descriptor));
    this.descriptors.set(stored.name, stored);
    return stored;
  }

  lookup(name: string): AgentDescriptor {
    const descriptor = this.descriptors.get(name);
    if (!descriptor) {
      throw new UnknownAgentError(name);
    }
    return descriptor;
  }

  find(name: string): AgentDescriptor | undefined {
    return this.descriptors.get(name);
  }

  has(name: string): boolean {
    return this.descriptors.has(name);
  }

  /** All descriptors in registration order. */
  all(): AgentDescriptor[] {
    return [...this.descriptors.values()];
  }

  get size(): number {
    return this.descriptors.size;
  }
}
