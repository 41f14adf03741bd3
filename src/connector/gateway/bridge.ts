import { existsSync } from 'node:fs';
import { basename, resolve } from 'node:path';
import { GatewayError } from '../../shared/errors.js';
import { errorMessage, logger } from '../../shared/logger.js';
import type { ClipMetadata } from '../../workspace/types.js';
import type { ApprovalMessage, FetchLike, MessagingGateway } from '../types.js';

export interface GatewayBridgeOptions {
  /** Full message endpoint, e.g. http://127.0.0.1:18789/api/message */
  url: string;
  recipient: string;
  token?: string | null;
  fetch?: FetchLike;
  timeoutMs?: number;
}

export interface GatewayReceipt {
  message_id: string | null;
  timestamp: string | null;
  response: unknown;
}

export function formatApprovalMessage(clipId: string, caption: string, metadata: ClipMetadata): string {
  const lines = ['🎬 *Content Approval Request*', '', `*Clip:* ${clipId}`, '', `*Caption:*\n${caption}`, ''];
  if (metadata.creator_name) lines.push(`*Creator:* ${metadata.creator_name}`);
  if (metadata.source_url) lines.push(`*Source:* ${metadata.source_url}`);
  lines.push(`*Duration:* ${metadata.duration.toFixed(1)}s`);
  lines.push(`*Action Score:* ${metadata.score.toFixed(2)}`);
  lines.push('');
  lines.push('📋 *Reply with:*', `✅ approve ${clipId}`, `❌ reject ${clipId}`);
  return lines.join('\n');
}

function stringField(body: unknown, ...keys: string[]): string | null {
  if (!body || typeof body !== 'object') return null;
  for (const key of keys) {
    const value: unknown = Reflect.get(body, key);
    if (typeof value === 'string' || typeof value === 'number') return String(value);
  }
  return null;
}

/**
 * HTTP bridge to the chat messaging gateway that relays approval requests
 * (clip file plus caption) to a human reviewer.
 */
export class GatewayBridge implements MessagingGateway {
  constructor(private readonly opts: GatewayBridgeOptions) {}

  async sendApprovalRequest(msg: ApprovalMessage): Promise<GatewayReceipt> {
    const videoPath = resolve(msg.videoPath);
    if (!existsSync(videoPath)) {
      throw new GatewayError(`Video file not found: ${videoPath}`);
    }
    logger.info('Sending approval request', { clip_id: msg.clipId, recipient: this.opts.recipient });
    return this.post({
      phone: this.opts.recipient,
      message: formatApprovalMessage(msg.clipId, msg.caption, msg.metadata),
      media: videoPath,
      media_type: 'video',
      filename: basename(videoPath),
      metadata: { ...msg.metadata, clip_id: msg.clipId },
    });
  }

  async sendText(message: string): Promise<GatewayReceipt> {
    return this.post({ phone: this.opts.recipient, message });
  }

  /** The gateway serves /health beside /api/message. */
  healthUrl(): string {
    const url = new URL(this.opts.url);
    url.pathname = url.pathname.replace(/\/api\/message\/?$/, '') + '/health';
    url.pathname = url.pathname.replace(/\/{2,}/g, '/');
    return url.toString();
  }

  async checkHealth(): Promise<boolean> {
    const http = this.opts.fetch ?? fetch;
    try {
      const resp = await http(this.healthUrl(), { signal: AbortSignal.timeout(5_000) });
      return resp.ok;
    } catch (err) {
      logger.warn('Gateway health check failed', { error: errorMessage(err) });
      return false;
    }
  }

  private async post(payload: Record<string, unknown>): Promise<GatewayReceipt> {
    if (!this.opts.recipient) {
      throw new GatewayError('No approval recipient configured (approval.recipient)');
    }
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.opts.token) headers['Authorization'] = `Bearer ${this.opts.token}`;

    const http = this.opts.fetch ?? fetch;
    let resp: Response;
    try {
      resp = await http(this.opts.url, {
        method: 'POST',
        headers,
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.opts.timeoutMs ?? 30_000),
      });
    } catch (err) {
      throw new GatewayError(`Gateway request failed: ${errorMessage(err)}`, null, { cause: err });
    }

    const text = await resp.text();
    if (!resp.ok) {
      throw new GatewayError(`Gateway returned status ${resp.status}: ${text.slice(0, 200)}`, resp.status);
    }

    let body: unknown = null;
    if (text) {
      try {
        body = JSON.parse(text);
      } catch {
        body = text;
      }
    }
    return {
      message_id: stringField(body, 'id', 'messageId'),
      timestamp: stringField(body, 'timestamp'),
      response: body,
    };
  }
}
