import { describe, it, expect, vi, afterEach } from 'vitest';

const mocks = vi.hoisted(() => {
  const constructed: unknown[] = [];
  return { generateContent: vi.fn(), constructed };
});

vi.mock('@google/genai', () => ({
  GoogleGenAI: class {
    models = { generateContent: mocks.generateContent };
    constructor(options: unknown) {
      mocks.constructed.push(options);
    }
  },
}));

import {
  AnthropicAdapter,
  GeminiAdapter,
  MockAdapter,
  OpenAIAdapter,
  autoDetectAdapter,
  config,
} from '../../src';

function jsonResponse(body: unknown, status = 200) {
  return { ok: status >= 200 && status < 300, status, json: async () => body };
}

describe('OpenAIAdapter', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('posts the prompt and returns the first choice', async () => {
    const fetchMock = vi.fn(async () => jsonResponse({ choices: [{ message: { content: 'review text' } }] }));
    vi.stubGlobal('fetch', fetchMock);
    const controller = new AbortController();

    const reply = await new OpenAIAdapter('test-key', 'gpt-test').complete('audit this', { signal: controller.signal });

    expect(reply).toBe('review text');
    expect(fetchMock).toHaveBeenCalledWith('https://api.openai.com/v1/chat/completions', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', 'Authorization': 'Bearer test-key' },
      body: JSON.stringify({
        model: 'gpt-test',
        messages: [{ role: 'user', content: 'audit this' }],
        temperature: 0.2,
      }),
      signal: controller.signal,
    });
  });

  it('rejects on HTTP errors', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({}, 500)));
    await expect(new OpenAIAdapter('test-key').complete('x')).rejects.toThrow('OpenAI API error: 500');
  });

  it('rejects responses without choices', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({ choices: [] })));
    await expect(new OpenAIAdapter('test-key').complete('x')).rejects.toThrow();
  });
});

describe('AnthropicAdapter', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('joins the text blocks of the reply', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({
      content: [{ type: 'text', text: 'part one, ' }, { type: 'tool_use' }, { type: 'text', text: 'part two' }],
    })));
    expect(await new AnthropicAdapter('test-key').complete('x')).toBe('part one, part two');
  });

  it('rejects on HTTP errors', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({}, 429)));
    await expect(new AnthropicAdapter('test-key').complete('x')).rejects.toThrow('Anthropic API error: 429');
  });
});

describe('GeminiAdapter', () => {
  afterEach(() => {
    mocks.generateContent.mockReset();
    mocks.constructed.length = 0;
  });

  it('calls generateContent with the prompt and abort signal', async () => {
    mocks.generateContent.mockResolvedValue({ text: 'gemini says hi' });
    const controller = new AbortController();

    const reply = await new GeminiAdapter('test-key').complete('audit this', { signal: controller.signal });

    expect(reply).toBe('gemini says hi');
    expect(mocks.constructed).toEqual([{ apiKey: 'test-key' }]);
    expect(mocks.generateContent).toHaveBeenCalledWith({
      model: 'gemini-1.5-flash',
      contents: 'audit this',
      config: { temperature: 0.2, abortSignal: controller.signal },
    });
  });

  it('returns an empty string when the response has no text', async () => {
    mocks.generateContent.mockResolvedValue({ text: undefined });
    expect(await new GeminiAdapter('test-key').complete('x')).toBe('');
  });
});

describe('autoDetectAdapter', () => {
  const saved = { ...config };

  afterEach(() => {
    Object.assign(config, saved);
  });

  it('prefers Gemini, then OpenAI, then Anthropic', () => {
    Object.assign(config, { geminiKey: 'test-gemini', openaiKey: 'test-openai', anthropicKey: 'test-anthropic' });
    expect(autoDetectAdapter()).toBeInstanceOf(GeminiAdapter);
    config.geminiKey = '';
    expect(autoDetectAdapter()).toBeInstanceOf(OpenAIAdapter);
    config.openaiKey = '';
    expect(autoDetectAdapter()).toBeInstanceOf(AnthropicAdapter);
  });

  it('falls back to the mock adapter without credentials', () => {
    Object.assign(config, { geminiKey: '', openaiKey: '', anthropicKey: '' });
    expect(autoDetectAdapter()).toBeInstanceOf(MockAdapter);
  });

  it('refuses to build a real adapter without a key', () => {
    Object.assign(config, { geminiKey: '', openaiKey: '', anthropicKey: '' });
    expect(() => new OpenAIAdapter()).toThrow('OPENAI_API_KEY not set');
    expect(() => new AnthropicAdapter()).toThrow('ANTHROPIC_API_KEY not set');
    expect(() => new GeminiAdapter()).toThrow('GEMINI_API_KEY not set');
  });
});
