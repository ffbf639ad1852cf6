// src/synthesizer/PersonaSynthesizer.ts

import type { SourceItem } from '../core/normalizer/types';
import type { Logger } from '../observability/Logger';
import type { TextGenerator } from './types';
import { buildPrompt } from './PromptBuilder';
import { EmptyInputError, UpstreamError, errorMessage } from '../utils/errors';

export class PersonaSynthesizer {
  constructor(
    private generator: TextGenerator,
    private logger: Logger
  ) {}

  /**
   * Turn collected items into a markdown persona with one generator call
   *
   * @returns The generator's text, unmodified
   * @throws {EmptyInputError} If `items` is empty (the generator is not called)
   * @throws {UpstreamError} If generation fails or yields only whitespace
   */
  async synthesize(username: string, items: readonly SourceItem[]): Promise<string> {
    if (items.length === 0) {
      throw new EmptyInputError(`No posts or comments found for u/${username}`, { username });
    }

    const prompt = buildPrompt(username, items);

    this.logger.info('Synthesizing persona', {
      username,
      model: this.generator.model,
      itemCount: items.length,
      promptLength: prompt.length,
    });

    let text: string;
    try {
      text = await this.generator.generate(prompt);
    } catch (error: unknown) {
      if (error instanceof UpstreamError) throw error;
      throw new UpstreamError(`Text generation failed: ${errorMessage(error)}`, {
        model: this.generator.model,
      });
    }

    if (!text.trim()) {
      throw new UpstreamError('Text generator returned an empty response', {
        model: this.generator.model,
      });
    }

    return text;
  }
}
