import * as deepl from 'deepl-node';
import { ConfigurationError } from '../utils/errors';
import { DEEPL_LANGUAGE_MAP, Translator } from '../types/index';

/**
 * Translation service using DeepL API. Failed requests are not retried:
 * the caller records them and a later run picks them up.
 */
export class TranslationService implements Translator {
  private translator: deepl.Translator;

  constructor(apiKey?: string) {
    if (!apiKey) {
      throw new ConfigurationError('DEEPL_API_KEY environment variable is required');
    }
    this.translator = new deepl.Translator(apiKey);
  }

  /**
   * Translate text to target language. The source language is detected by
   * DeepL.
   */
  async translate(text: string, targetLanguage: string): Promise<string> {
    const deeplTargetLang = toDeepLLanguage(targetLanguage);

    try {
      const result = await this.translator.translateText(
        text,
        null,
        deeplTargetLang as deepl.TargetLanguageCode,
        { preserveFormatting: true }
      );

      return result.text;
    } catch (error) {
      throw new Error(
        `DeepL translation failed: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }
}

/**
 * Map a project language code to the code DeepL expects
 */
export function toDeepLLanguage(language: string): string {
  const normalized = language.trim().toLowerCase();
  return DEEPL_LANGUAGE_MAP[normalized] ?? normalized;
}
