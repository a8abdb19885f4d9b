import OpenAI, { APIConnectionTimeoutError } from 'openai';
import type { ITextTranslator, TranslationRequest, TranslationResponse } from '@/types/translation';
import { TranslationError } from '@/types/pipeline-errors';
import { createProcessingFailedError } from '@/utils/error-handling';
import { createLogger, type Logger } from '@/utils/logger';
import { getLanguageName, normalizeLanguage } from './languages';

type ChatRole = 'system' | 'user';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

/** The slice of the OpenAI client the translator calls. */
export interface ChatCompletionClient {
  chat: {
    completions: {
      create(
        body: { model: string; temperature: number; messages: ChatMessage[] },
        options?: { signal?: AbortSignal }
      ): Promise<{ choices: Array<{ message: { content: string | null } }> }>;
    };
  };
}

export interface OpenAiTranslatorOptions {
  client?: ChatCompletionClient;
  apiKey?: string;
  model?: string;
  logger?: Logger;
}

export const DEFAULT_TRANSLATION_MODEL = 'gpt-4o-mini';

export function buildTranslationMessages(text: string, from: string, to: string): ChatMessage[] {
  return [
    {
      role: 'system',
      content:
        `You translate comic and manga dialogue from ${getLanguageName(from)} to ${getLanguageName(to)}. ` +
        'Keep the tone and brevity of speech bubbles. Reply with the translation only, without quotes or notes.',
    },
    { role: 'user', content: text },
  ];
}

/**
 * Chat-completion backed translator. Runs at temperature 0 so repeated
 * requests for the same text come back identical.
 */
export class OpenAiTranslator implements ITextTranslator {
  private client: ChatCompletionClient | null;
  private readonly apiKey?: string;
  private readonly model: string;
  private readonly logger: Logger;

  constructor(options: OpenAiTranslatorOptions = {}) {
    this.client = options.client ?? null;
    this.apiKey = options.apiKey;
    this.model = options.model ?? DEFAULT_TRANSLATION_MODEL;
    this.logger = options.logger ?? createLogger('translator');
  }

  async translate(request: TranslationRequest): Promise<TranslationResponse> {
    const from = normalizeLanguage(request.from);
    const to = normalizeLanguage(request.to);
    if (!from || !to) {
      throw new TranslationError(
        `Unsupported language pair: ${request.from} -> ${request.to}`,
        'UNSUPPORTED_LANGUAGE_PAIR'
      );
    }

    const text = request.text.trim();
    if (!text || from === to) {
      return { text };
    }

    try {
      const completion = await this.getClient().chat.completions.create(
        { model: this.model, temperature: 0, messages: buildTranslationMessages(text, from, to) },
        { signal: request.signal }
      );
      const translated = completion.choices[0]?.message?.content?.trim();
      if (!translated) {
        throw createProcessingFailedError('Translation provider returned no text.');
      }
      return { text: translated };
    } catch (error) {
      if (error instanceof APIConnectionTimeoutError) {
        throw new TranslationError('Translation request timed out.', 'TIMEOUT');
      }
      this.logger.error('translate failed', error, { from, to, chars: text.length });
      throw error;
    }
  }

  destroy(): void {
    this.client = null;
  }

  private getClient(): ChatCompletionClient {
    if (!this.client) {
      const apiKey = this.apiKey ?? process.env.OPENAI_API_KEY;
      if (!apiKey) {
        throw new Error('OPENAI_API_KEY is required for translation.');
      }
      this.client = new OpenAI({ apiKey });
    }
    return this.client;
  }
}
