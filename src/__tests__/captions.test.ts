import { describe, it, expect } from '@jest/globals';
import {
  DEFAULT_HASHTAGS,
  LlmCaptionService,
  fallbackCaptions,
  formatCaptionText,
  padCaptions,
  parseCaptionContent,
  renderTemplate,
} from '../connector/llm/captions.js';
import { CaptionServiceError } from '../shared/errors.js';
import { defaultConfig } from '../workspace/config.js';
import { queuedFetch } from './fakes.js';

const LIMITS = { count: 3, hashtagCount: 2 };

describe('parseCaptionContent', () => {
  it('reads a fenced captions object and trims hashtags', () => {
    const content = '```json\n{"captions":[{"caption":"Hi","hashtags":["#a","#b","#c"]}]}\n```';
    expect(parseCaptionContent(content, LIMITS)).toEqual([{ caption: 'Hi', hashtags: ['#a', '#b'] }]);
  });

  it('accepts a bare array of strings', () => {
    expect(parseCaptionContent('["one","two"]', LIMITS)).toEqual([
      { caption: 'one', hashtags: [] },
      { caption: 'two', hashtags: [] },
    ]);
  });

  it('accepts a single caption object with hashtags as a string', () => {
    expect(parseCaptionContent('{"caption":"Solo","hashtags":"#x #y notag"}', LIMITS)).toEqual([
      { caption: 'Solo', hashtags: ['#x', '#y'] },
    ]);
  });

  it('salvages quoted caption fields from non-JSON text', () => {
    const content = 'Here you go: "caption": "First one", "hashtags": ["#a", "#b"] and "caption": "Second"';
    expect(parseCaptionContent(content, LIMITS)).toEqual([
      { caption: 'First one', hashtags: ['#a', '#b'] },
      { caption: 'Second', hashtags: [] },
    ]);
  });

  it('falls back to one caption per line', () => {
    const content = 'Line one #fun #wow\n\n#only\nLine three';
    expect(parseCaptionContent(content, { count: 2, hashtagCount: 5 })).toEqual([
      { caption: 'Line one', hashtags: ['#fun', '#wow'] },
      { caption: 'Amazing content! 🔥', hashtags: ['#only'] },
    ]);
  });

  it('returns nothing for JSON of an unknown shape', () => {
    expect(parseCaptionContent('{"foo": 1}', LIMITS)).toEqual([]);
  });
});

describe('caption helpers', () => {
  it('pads to the requested count', () => {
    const padded = padCaptions([{ caption: 'A', hashtags: [] }], 3);
    expect(padded).toHaveLength(3);
    expect(padded[2]).toEqual({ caption: 'Check out this amazing content! 🔥', hashtags: DEFAULT_HASHTAGS });
  });

  it('truncates long descriptions in templates', () => {
    const description = 'x'.repeat(60);
    expect(renderTemplate('{topic}: {description}', { topic: 'gaming', description })).toBe(
      `gaming: ${'x'.repeat(50)}...`,
    );
  });

  it('renders the configured fallback captions', () => {
    const templates = defaultConfig().captions.fallback;
    const captions = fallbackCaptions(templates, { topic: 'gaming', description: 'alice - Big Day' }, 2);
    expect(captions.map((c) => c.caption)).toEqual([
      'Wait for it... 🔥 This gaming content is INSANE!',
      "You won't believe this! 😱 alice - Big Day",
    ]);
    expect(captions[0]?.hashtags).toEqual(['#viral', '#trending', '#reels', '#fyp', '#foryou']);
  });

  it('formats caption text for posting', () => {
    expect(formatCaptionText({ caption: 'Hi', hashtags: ['#a', '#b'] })).toBe('Hi\n\n#a #b');
    expect(formatCaptionText({ caption: 'Hi', hashtags: [] })).toBe('Hi');
    expect(formatCaptionText(undefined)).toBe('');
  });
});

describe('LlmCaptionService', () => {
  const request = { description: 'alice - Big Day', topic: 'gaming', context: '', count: 2 };

  function service(apiKey: string | null, fetchFn?: ReturnType<typeof queuedFetch>['fetch']) {
    return new LlmCaptionService({
      apiBase: 'https://llm.test/v1/',
      model: 'test-model',
      apiKey,
      maxLength: 150,
      count: 2,
      hashtagCount: 5,
      fetch: fetchFn,
    });
  }

  it('requires an API key', async () => {
    const { fetch, calls } = queuedFetch([]);
    await expect(service(null, fetch).generate(request)).rejects.toThrow(CaptionServiceError);
    expect(calls).toHaveLength(0);
  });

  it('requests completions and pads the result', async () => {
    const content = '{"captions":[{"caption":"A","hashtags":["#x"]}]}';
    const { fetch, calls } = queuedFetch([{ body: { choices: [{ message: { content } }] } }]);

    const captions = await service('test-secret', fetch).generate(request);

    expect(captions).toEqual([
      { caption: 'A', hashtags: ['#x'] },
      { caption: 'Check out this amazing content! 🔥', hashtags: DEFAULT_HASHTAGS },
    ]);
    expect(calls[0]?.url).toBe('https://llm.test/v1/chat/completions');
    expect(new Headers(calls[0]?.init?.headers).get('Authorization')).toBe('Bearer test-secret');
    const body: unknown = JSON.parse(String(calls[0]?.init?.body));
    expect(body).toMatchObject({ model: 'test-model', temperature: 0.8, max_tokens: 2000 });
  });

  it('reports API errors with the status', async () => {
    const { fetch } = queuedFetch([{ status: 500, body: 'boom' }]);
    await expect(service('test-secret', fetch).generate(request)).rejects.toThrow('LLM API error 500: boom');
  });

  it('fails when the model returns nothing usable', async () => {
    const { fetch } = queuedFetch([{ body: { choices: [{ message: { content: '{"foo": 1}' } }] } }]);
    await expect(service('test-secret', fetch).generate(request)).rejects.toThrow('LLM returned no usable captions');
  });
});
