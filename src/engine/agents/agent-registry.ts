/**
 * Agent Registry - maps agent identifiers to translator backends.
 *
 * Every agent is a TranslationAgent around one ITranslator; the registry
 * supplies the backend, the per-agent retry/timeout settings and the shared
 * hooks. Identifiers are case-insensitive.
 */

import type { ITranslator } from '../interfaces/translator.js';
import type { AgentSettings } from '../types/common.js';
import { DEFAULT_AGENT_SETTINGS } from '../types/common.js';
import { UnknownAgentError } from '../errors.js';
import { TranslationAgent } from './translation-agent.js';
import type { AgentHooks } from './hooks.js';
import type { Sleep } from '../utils/retry.js';

export type TranslatorFactory = () => ITranslator;

interface Registration {
  factory: TranslatorFactory;
  settings: Partial<AgentSettings>;
}

export interface AgentRegistryOptions {
  /** Settings applied to every agent unless its registration overrides them */
  defaults?: Partial<AgentSettings>;
  hooks?: AgentHooks[];
  sleep?: Sleep;
}

export class AgentRegistry {
  private registrations = new Map<string, Registration>();
  private defaults: AgentSettings;
  private hooks: AgentHooks[];
  private sleep?: Sleep;

  constructor(options: AgentRegistryOptions = {}) {
    this.defaults = { ...DEFAULT_AGENT_SETTINGS, ...options.defaults };
    this.hooks = options.hooks ?? [];
    this.sleep = options.sleep;
  }

  /**
   * Register (or replace) an agent type
   */
  register(id: string, factory: TranslatorFactory, settings: Partial<AgentSettings> = {}): this {
    const key = id.trim().toLowerCase();
    if (!key) {
      throw new Error('Agent id cannot be empty');
    }
    this.registrations.set(key, { factory, settings });
    return this;
  }

  has(id: string): boolean {
    return this.registrations.has(id.trim().toLowerCase());
  }

  ids(): string[] {
    return [...this.registrations.keys()];
  }

  /**
   * Throws UnknownAgentError for every id that is not registered
   */
  assertKnown(ids: readonly string[]): void {
    for (const id of ids) {
      if (!this.has(id)) {
        throw new UnknownAgentError(id, this.ids());
      }
    }
  }

  /**
   * Ask each backend whether it can translate right now (binary present,
   * endpoint reachable). Unknown ids throw before any backend is asked.
   */
  async checkAvailability(ids: readonly string[] = this.ids()): Promise<Record<string, boolean>> {
    this.assertKnown(ids);
    const keys = [...new Set(ids.map((id) => id.trim().toLowerCase()))];
    const results = await Promise.all(keys.map((key) => this.create(key).translator.isAvailable()));
    return Object.fromEntries(keys.map((key, i) => [key, results[i]]));
  }

  create(id: string): TranslationAgent {
    const key = id.trim().toLowerCase();
    const registration = this.registrations.get(key);
    if (!registration) {
      throw new UnknownAgentError(id, this.ids());
    }

    return new TranslationAgent({
      id: key,
      translator: registration.factory(),
      settings: { ...this.defaults, ...registration.settings },
      hooks: this.hooks,
      sleep: this.sleep,
    });
  }
}
