/**
 * Test doubles shared by the suites
 */

import type { ITranslator, TranslatorRequest, TranslatorResponse } from '../src/engine/interfaces/translator.js';
import type { AgentHooks } from '../src/engine/agents/hooks.js';
import type { TranslationCall, TranslationOutcome } from '../src/engine/types/translation.js';

export type ScriptStep = string | Error;

export type TranslateHandler = (
  request: TranslatorRequest,
  call: number,
  signal?: AbortSignal
) => Promise<TranslatorResponse> | TranslatorResponse;

/**
 * Translator driven by a handler; records every request it receives
 */
export class ScriptedTranslator implements ITranslator {
  readonly name = 'scripted';
  readonly requests: TranslatorRequest[] = [];

  private handler: TranslateHandler;

  constructor(handler: TranslateHandler) {
    this.handler = handler;
  }

  /**
   * Replays `steps` in order: strings are returned, errors thrown.
   * Past the end of the script the last step repeats.
   */
  static fromSteps(steps: ScriptStep[]): ScriptedTranslator {
    return new ScriptedTranslator((_request, call) => {
      const step = steps[Math.min(call, steps.length) - 1];
      if (step instanceof Error) throw step;
      return { text: step };
    });
  }

  /** Tags text with the target language, like the echo translator */
  static echo(): ScriptedTranslator {
    return new ScriptedTranslator((request) => ({ text: `[${request.targetLang}] ${request.text}` }));
  }

  get calls(): number {
    return this.requests.length;
  }

  async translate(request: TranslatorRequest, signal?: AbortSignal): Promise<TranslatorResponse> {
    this.requests.push(request);
    return this.handler(request, this.requests.length, signal);
  }

  async isAvailable(): Promise<boolean> {
    return true;
  }
}

/**
 * Never answers; rejects once the agent aborts the attempt
 */
export class HangingTranslator implements ITranslator {
  readonly name = 'hanging';
  calls = 0;

  translate(_request: TranslatorRequest, signal?: AbortSignal): Promise<TranslatorResponse> {
    this.calls++;
    return new Promise((_resolve, reject) => {
      signal?.addEventListener('abort', () => reject(new Error('aborted')));
    });
  }

  async isAvailable(): Promise<boolean> {
    return true;
  }
}

/**
 * Hook set that remembers what it saw
 */
export class HookRecorder implements AgentHooks {
  readonly before: TranslationCall[] = [];
  readonly after: TranslationOutcome[] = [];
  readonly failures: Array<{ error: Error; call: TranslationCall }> = [];

  beforeCall(call: TranslationCall): void {
    this.before.push(call);
  }

  afterCall(outcome: TranslationOutcome): void {
    this.after.push(outcome);
  }

  onFailure(error: Error, call: TranslationCall): void {
    this.failures.push({ error, call });
  }
}

export const noSleep = async (): Promise<void> => {};
