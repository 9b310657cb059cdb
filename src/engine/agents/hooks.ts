/**
 * Agent lifecycle hooks - observers only.
 *
 * Hooks receive frozen values and anything they throw is logged and dropped,
 * so they cannot alter the text or the control flow of a translation call.
 */

import type { TranslationCall, TranslationOutcome } from '../types/translation.js';
import { errorMessage } from '../errors.js';

export interface AgentHooks {
  beforeCall?(call: TranslationCall): void;
  afterCall?(outcome: TranslationOutcome): void;
  onFailure?(error: Error, call: TranslationCall): void;
}

export type HookName = keyof AgentHooks;

/**
 * Invoke one hook on every observer, isolating observers from each other
 */
export function notifyHooks(
  hooks: readonly AgentHooks[],
  name: HookName,
  invoke: (observer: AgentHooks) => void
): void {
  for (const observer of hooks) {
    try {
      invoke(observer);
    } catch (error) {
      console.warn(`[AgentHooks] ${name} hook threw, ignoring: ${errorMessage(error)}`);
    }
  }
}

/**
 * Console instrumentation for agent calls
 */
export function createLoggingHooks(options: { verbose?: boolean } = {}): AgentHooks {
  return {
    beforeCall(call) {
      if (options.verbose) {
        console.log(
          `[Agent:${call.agentId}] ${call.sourceLang} → ${call.targetLang} (${call.text.length} chars)`
        );
      }
    },
    afterCall(outcome) {
      console.log(
        `[Agent:${outcome.agentId}] ✅ ${outcome.sourceLang} → ${outcome.targetLang} in ${outcome.duration}ms` +
          (outcome.attempts > 1 ? ` (attempt ${outcome.attempts})` : '')
      );
    },
    onFailure(error, call) {
      console.error(
        `[Agent:${call.agentId}] ❌ ${call.sourceLang} → ${call.targetLang} failed: ${error.message}`
      );
    },
  };
}
