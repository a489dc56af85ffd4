/**
 * ntfy push notifications. Publishing is fire-and-forget: failures are
 * logged, never thrown, so a push outage cannot fail a build.
 */
import { HTTP_TIMEOUT_MS } from '../config.js';
import { logger } from '../utils/logger.js';

export type NtfyPriority = 1 | 2 | 3 | 4 | 5;

export interface NtfyMessage {
  title: string;
  message: string;
  priority?: NtfyPriority;
  tags?: string[];
}

export interface NtfyOptions {
  url: string;
  token?: string;
  fetchImpl?: typeof fetch;
}

/** Header values must be ASCII; anything else is replaced. */
function headerSafe(value: string): string {
  return value.replace(/[^\x20-\x7e]/g, '?');
}

export async function publishNtfy(topic: string, msg: NtfyMessage, opts: NtfyOptions): Promise<boolean> {
  const doFetch = opts.fetchImpl ?? fetch;
  const headers: Record<string, string> = {
    Title: headerSafe(msg.title),
    Priority: String(msg.priority ?? 3),
  };
  if (msg.tags?.length) headers['Tags'] = headerSafe(msg.tags.join(','));
  if (opts.token) headers['Authorization'] = `Bearer ${opts.token}`;

  try {
    const res = await doFetch(`${opts.url.replace(/\/+$/, '')}/${encodeURIComponent(topic)}`, {
      method: 'POST',
      headers,
      body: msg.message,
      signal: AbortSignal.timeout(HTTP_TIMEOUT_MS),
    });
    if (!res.ok) {
      logger.warn('ntfy: publish failed', { status: res.status, topic });
      return false;
    }
    return true;
  } catch (err) {
    logger.warn('ntfy: unreachable', { error: err });
    return false;
  }
}
