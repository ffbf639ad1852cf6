// src/synthesizer/types.ts

/**
 * Single-shot prompt completion. Implementations return the model's text
 * unchanged.
 */
export interface TextGenerator {
  readonly model: string;
  generate(prompt: string): Promise<string>;
}
