// tests/unit/GeminiClient.test.ts

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { GeminiClient } from '../../src/synthesizer/GeminiClient';
import { UpstreamError } from '../../src/utils/errors';
import { createSilentLogger } from '../fixtures/reddit';

const { generateContent, constructed } = vi.hoisted(() => ({
  generateContent: vi.fn(),
  constructed: vi.fn(),
}));

vi.mock('@google/genai', () => ({
  GoogleGenAI: class {
    models = { generateContent };

    constructor(options: unknown) {
      constructed(options);
    }
  },
}));

describe('GeminiClient', () => {
  const settings = { apiKey: 'test-key', model: 'test-model' };
  let client: GeminiClient;

  beforeEach(() => {
    vi.clearAllMocks();
    client = new GeminiClient(settings, createSilentLogger());
  });

  it('should create the SDK client with the API key', () => {
    expect(constructed).toHaveBeenCalledWith({ apiKey: 'test-key' });
    expect(client.model).toBe('test-model');
  });

  it('should send the prompt to the configured model and return its text', async () => {
    generateContent.mockResolvedValue({
      text: '# User Persona: u/alice\n',
      candidates: [{ finishReason: 'STOP' }],
    });

    await expect(client.generate('prompt text')).resolves.toBe('# User Persona: u/alice\n');
    expect(generateContent).toHaveBeenCalledWith({ model: 'test-model', contents: 'prompt text' });
  });

  it('should raise UpstreamError when the request fails', async () => {
    generateContent.mockRejectedValue(new Error('API key not valid'));

    await expect(client.generate('prompt')).rejects.toThrow(UpstreamError);
    await expect(client.generate('prompt')).rejects.toThrow('Gemini request failed: API key not valid');
  });

  it('should raise UpstreamError when the response has no text', async () => {
    generateContent.mockResolvedValue({
      text: undefined,
      candidates: [],
      promptFeedback: { blockReason: 'SAFETY' },
    });

    await expect(client.generate('prompt')).rejects.toMatchObject({
      message: 'Gemini returned no text',
      code: 'UPSTREAM_ERROR',
      details: { model: 'test-model', finishReason: undefined, blockReason: 'SAFETY' },
    });
  });
});
