import { describe, it, expect, jest, beforeEach } from '@jest/globals';
import { GoogleGenerativeAIFetchError } from '@google/generative-ai';
import { UpstreamUnavailableError } from '../src/agents/errors';
import { GeminiTextGenerator, toGeminiSchema } from '../src/llm/gemini';

const mockGenerateContent = jest.fn<(...args: unknown[]) => Promise<unknown>>();

jest.mock('@google/generative-ai', () => {
  const actual = jest.requireActual<typeof import('@google/generative-ai')>('@google/generative-ai');
  return {
    ...actual,
    GoogleGenerativeAI: jest.fn(() => ({
      getGenerativeModel: () => ({ generateContent: mockGenerateContent }),
    })),
  };
});

describe('toGeminiSchema', () => {
  it('drops keywords the API rejects and turns empty objects into strings', () => {
    expect(
      toGeminiSchema({
        type: 'object',
        properties: {
          relevance: { type: 'number' },
          extra: { type: 'object' },
          tags: { type: 'array' },
        },
        required: ['relevance'],
      })
    ).toEqual({
      type: 'object',
      properties: {
        relevance: { type: 'number' },
        extra: { type: 'string' },
        tags: { type: 'array', items: { type: 'string' } },
      },
      required: ['relevance'],
    });
  });
});

describe('GeminiTextGenerator', () => {
  beforeEach(() => {
    mockGenerateContent.mockReset();
  });

  it('requests JSON output constrained by the response schema', async () => {
    mockGenerateContent.mockResolvedValueOnce({ response: { text: () => '{"keywords": ["gnn"]}' } });
    const generator = new GeminiTextGenerator('test-secret', 'gemini-test');

    const text = await generator.generate({
      prompt: 'Extract keywords',
      responseSchema: {
        type: 'object',
        properties: { keywords: { type: 'array', items: { type: 'string' }, minItems: 1 } },
        required: ['keywords'],
        additionalProperties: false,
      },
    });

    expect(text).toBe('{"keywords": ["gnn"]}');
    expect(mockGenerateContent.mock.calls[0]?.[0]).toMatchObject({
      contents: [{ role: 'user', parts: [{ text: 'Extract keywords' }] }],
      generationConfig: {
        temperature: 0,
        responseMimeType: 'application/json',
        responseSchema: {
          type: 'object',
          properties: { keywords: { type: 'array', items: { type: 'string' } } },
          required: ['keywords'],
        },
      },
    });
  });

  it('maps overload and network failures to UpstreamUnavailableError', async () => {
    const generator = new GeminiTextGenerator('test-secret', 'gemini-test');

    mockGenerateContent.mockRejectedValueOnce(new GoogleGenerativeAIFetchError('overloaded', 503));
    await expect(generator.generate({ prompt: 'p' })).rejects.toBeInstanceOf(UpstreamUnavailableError);

    mockGenerateContent.mockRejectedValueOnce(new TypeError('fetch failed'));
    await expect(generator.generate({ prompt: 'p' })).rejects.toBeInstanceOf(UpstreamUnavailableError);
  });

  it('passes client errors through unchanged', async () => {
    const generator = new GeminiTextGenerator('test-secret', 'gemini-test');
    const badRequest = new GoogleGenerativeAIFetchError('invalid argument', 400);
    mockGenerateContent.mockRejectedValueOnce(badRequest);

    await expect(generator.generate({ prompt: 'p' })).rejects.toBe(badRequest);
  });

  it('refuses to start without an API key', () => {
    expect(() => new GeminiTextGenerator('', 'gemini-test')).toThrow('GOOGLE_API_KEY environment variable is not set');
  });
});
