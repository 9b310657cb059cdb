/**
 * Echo translator - offline stand-in that tags text with the target language.
 * "Hello" en→fr becomes "[fr] Hello". Used when no backend is configured.
 */

import type {
  ITranslator,
  TranslatorRequest,
  TranslatorResponse,
} from '../interfaces/translator.js';

export class EchoTranslator implements ITranslator {
  readonly name = 'echo';

  async translate(request: TranslatorRequest): Promise<TranslatorResponse> {
    return {
      text: `[${request.targetLang}] ${request.text}`,
      metadata: { offline: true },
    };
  }

  async isAvailable(): Promise<boolean> {
    return true;
  }
}
