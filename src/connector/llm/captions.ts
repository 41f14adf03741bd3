/**
 * Caption generation against an OpenAI-compatible chat completion endpoint.
 *
 * The model is asked for JSON; when it answers with something else the
 * quoted caption fields, then plain lines, are salvaged before giving up.
 */
import { z } from 'zod';
import { CaptionServiceError } from '../../shared/errors.js';
import { errorMessage, logger } from '../../shared/logger.js';
import type { CaptionCandidate } from '../../workspace/types.js';
import type { CaptionRequest, CaptionService, FetchLike } from '../types.js';

export const DEFAULT_HASHTAGS = ['#viral', '#trending', '#reels', '#fyp', '#foryou'];
const PADDING_CAPTION = 'Check out this amazing content! 🔥';

export interface CaptionLimits {
  count: number;
  hashtagCount: number;
}

export interface LlmCaptionOptions extends CaptionLimits {
  apiBase: string;
  model: string;
  apiKey: string | null;
  maxLength: number;
  fetch?: FetchLike;
  timeoutMs?: number;
}

const SYSTEM_PROMPT =
  'You are a viral content strategist specializing in Instagram Reels. ' +
  'Your captions maximize engagement, shares, and comments. ' +
  'You understand trending formats, hooks, and hashtag strategies. ' +
  'Always return valid JSON format.';

export function buildCaptionPrompt(req: CaptionRequest, maxLength: number, hashtagCount: number): string {
  const contextLine = req.context ? `\nAdditional Context: ${req.context}` : '';
  return [
    `Generate exactly ${req.count} viral, highly engaging Instagram Reel captions.`,
    '',
    `Video Description: ${req.description}`,
    `Topic/Category: ${req.topic}${contextLine}`,
    '',
    'Requirements for each caption:',
    '1. Hook the viewer in the first 3-5 words',
    `2. Keep main caption under ${maxLength} characters (excluding hashtags)`,
    `3. Include ${hashtagCount} relevant, trending hashtags`,
    '4. Use 2-4 strategic emojis',
    '5. Include a call-to-action (question, tag someone, save/share prompt)',
    '',
    'Return JSON with this exact structure:',
    '{"captions": [{"caption": "text with emojis", "hashtags": ["#one", "#two"]}]}',
  ].join('\n');
}

function toHashtags(value: unknown, hashtagCount: number): string[] {
  let tags: string[] = [];
  if (typeof value === 'string') {
    tags = value.split(/\s+/).filter((t) => t.startsWith('#'));
  } else if (Array.isArray(value)) {
    tags = value.filter((t): t is string => typeof t === 'string');
  }
  return tags.slice(0, hashtagCount);
}

/** Coerce loosely shaped model output into candidates, at most `count`. */
export function normalizeCaptions(items: readonly unknown[], limits: CaptionLimits): CaptionCandidate[] {
  const out: CaptionCandidate[] = [];
  for (const item of items) {
    if (out.length >= limits.count) break;
    if (typeof item === 'string') {
      out.push({ caption: item, hashtags: [] });
    } else if (item && typeof item === 'object') {
      const caption = 'caption' in item && typeof item.caption === 'string' ? item.caption : '';
      const hashtags = 'hashtags' in item ? toHashtags(item.hashtags, limits.hashtagCount) : [];
      out.push({ caption, hashtags });
    }
  }
  return out;
}

const CaptionEnvelopeSchema = z.union([
  z.array(z.unknown()),
  z.object({ captions: z.array(z.unknown()) }).transform((o) => o.captions),
  z.object({ data: z.array(z.unknown()) }).transform((o) => o.data),
  z.object({ caption: z.string() }).passthrough().transform((o) => [o]),
]);

function stripCodeFence(content: string): string {
  const fenced = content.trim().match(/^```(?:json)?\s*([\s\S]*?)\s*```$/);
  return fenced?.[1] ?? content.trim();
}

function salvageCaptions(content: string, limits: CaptionLimits): CaptionCandidate[] {
  const captionMatches = [...content.matchAll(/"caption":\s*"([^"]+)"/g)];
  const hashtagMatches = [...content.matchAll(/"hashtags":\s*\[(.*?)\]/gs)];
  if (captionMatches.length > 0) {
    return captionMatches.slice(0, limits.count).map((m, i) => ({
      caption: m[1] ?? '',
      hashtags: [...(hashtagMatches[i]?.[1] ?? '').matchAll(/"(#\w+)"/g)]
        .map((h) => h[1] ?? '')
        .slice(0, limits.hashtagCount),
    }));
  }

  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean)
    .slice(0, limits.count)
    .map((line) => ({
      caption: line.replace(/#\w+/g, '').trim() || 'Amazing content! 🔥',
      hashtags: (line.match(/#\w+/g) ?? []).slice(0, limits.hashtagCount),
    }));
}

export function parseCaptionContent(content: string, limits: CaptionLimits): CaptionCandidate[] {
  const body = stripCodeFence(content);
  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch {
    logger.warn('Caption response is not JSON; salvaging text');
    return salvageCaptions(body, limits);
  }
  const parsed = CaptionEnvelopeSchema.safeParse(raw);
  return parsed.success ? normalizeCaptions(parsed.data, limits) : [];
}

/** Top up to exactly `count` candidates with a generic caption. */
export function padCaptions(captions: readonly CaptionCandidate[], count: number): CaptionCandidate[] {
  const out = captions.slice(0, count);
  while (out.length < count) {
    out.push({ caption: PADDING_CAPTION, hashtags: [...DEFAULT_HASHTAGS] });
  }
  return out;
}

export function renderTemplate(template: string, values: { topic: string; description: string }): string {
  const description =
    values.description.length > 50 ? `${values.description.slice(0, 50)}...` : values.description;
  return template.replaceAll('{topic}', values.topic).replaceAll('{description}', description);
}

/** Configured template captions, used whenever the caption service fails. */
export function fallbackCaptions(
  templates: readonly CaptionCandidate[],
  values: { topic: string; description: string },
  count: number,
): CaptionCandidate[] {
  return templates.slice(0, count).map((t) => ({
    caption: renderTemplate(t.caption, values),
    hashtags: [...t.hashtags],
  }));
}

/** Caption body and hashtags as they appear in a post. */
export function formatCaptionText(candidate: CaptionCandidate | undefined): string {
  if (!candidate) return '';
  const tags = candidate.hashtags.join(' ');
  return tags ? `${candidate.caption}\n\n${tags}` : candidate.caption;
}

const CompletionSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullish() }) }))
    .default([]),
});

export class LlmCaptionService implements CaptionService {
  constructor(private readonly opts: LlmCaptionOptions) {}

  async generate(req: CaptionRequest): Promise<CaptionCandidate[]> {
    const { apiBase, model, apiKey, maxLength, hashtagCount } = this.opts;
    if (!apiKey) {
      throw new CaptionServiceError(
        'LLM API key not configured. Run: reelrunner env set LLM_API_KEY <key> or set LLM_API_KEY.',
      );
    }

    const http = this.opts.fetch ?? fetch;
    let resp: Response;
    try {
      resp = await http(`${apiBase.replace(/\/$/, '')}/chat/completions`, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          model,
          messages: [
            { role: 'system', content: SYSTEM_PROMPT },
            { role: 'user', content: buildCaptionPrompt(req, maxLength, hashtagCount) },
          ],
          temperature: 0.8,
          max_tokens: 2000,
        }),
        signal: AbortSignal.timeout(this.opts.timeoutMs ?? 60_000),
      });
    } catch (err) {
      throw new CaptionServiceError(`LLM request failed: ${errorMessage(err)}`, { cause: err });
    }

    if (!resp.ok) {
      const body = await resp.text();
      throw new CaptionServiceError(`LLM API error ${resp.status}: ${body.slice(0, 200)}`);
    }

    let payload: unknown;
    try {
      payload = await resp.json();
    } catch (err) {
      throw new CaptionServiceError(`LLM returned invalid JSON: ${errorMessage(err)}`, { cause: err });
    }
    const data = CompletionSchema.safeParse(payload);
    const content = data.success ? (data.data.choices[0]?.message.content ?? '') : '';
    const captions = parseCaptionContent(content, { count: req.count, hashtagCount });
    if (captions.length === 0) {
      throw new CaptionServiceError('LLM returned no usable captions');
    }
    logger.info('Captions generated', { count: captions.length });
    return padCaptions(captions, req.count);
  }
}
