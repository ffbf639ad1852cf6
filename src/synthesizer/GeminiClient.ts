// src/synthesizer/GeminiClient.ts

import { GoogleGenAI, type GenerateContentResponse } from '@google/genai';
import type { TextGenerator } from './types';
import type { GeminiSettings } from '../config/ConfigValidator';
import type { Logger } from '../observability/Logger';
import { UpstreamError, errorMessage } from '../utils/errors';
import { withSpan } from '../observability/tracing';

/**
 * Google Gemini text generator (one generateContent call per prompt)
 */
export class GeminiClient implements TextGenerator {
  readonly model: string;
  private ai: GoogleGenAI;

  constructor(
    settings: GeminiSettings,
    private logger: Logger
  ) {
    this.model = settings.model;
    this.ai = new GoogleGenAI({ apiKey: settings.apiKey });
  }

  async generate(prompt: string): Promise<string> {
    return withSpan(
      'Gemini generateContent',
      async () => {
        const startTime = Date.now();

        let response: GenerateContentResponse;
        try {
          response = await this.ai.models.generateContent({
            model: this.model,
            contents: prompt,
          });
        } catch (error: unknown) {
          this.logger.error('Gemini request failed', { model: this.model, error: errorMessage(error) });
          throw new UpstreamError(`Gemini request failed: ${errorMessage(error)}`, { model: this.model });
        }

        const text = response.text;
        const finishReason = response.candidates?.[0]?.finishReason;

        this.logger.debug('Gemini response', {
          model: this.model,
          durationMs: Date.now() - startTime,
          finishReason,
          textLength: text?.length ?? 0,
        });

        if (!text) {
          throw new UpstreamError('Gemini returned no text', {
            model: this.model,
            finishReason,
            blockReason: response.promptFeedback?.blockReason,
          });
        }

        return text;
      },
      { 'gen_ai.request.model': this.model }
    );
  }
}
