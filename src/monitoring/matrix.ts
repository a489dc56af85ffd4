/**
 * Matrix chat over the client-server API.
 *
 * Inbound messages arrive through a `/sync` long-poll loop; outbound replies
 * are `m.notice` events with an optional HTML body. Only unencrypted rooms
 * are supported.
 */
import { randomUUID } from 'crypto';
import { z } from 'zod';
import { HTTP_TIMEOUT_MS, MATRIX_RETRY_DELAY_MS, MATRIX_SYNC_TIMEOUT_MS } from '../config.js';
import { TransportError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface ChatMessage {
  text: string;
  html?: string;
}

/** Where replies and build notifications go. */
export interface ChatChannel {
  send(msg: ChatMessage): Promise<void>;
}

export interface InboundMessage {
  eventId: string;
  roomId: string;
  sender: string;
  body: string;
}

export interface MatrixOptions {
  homeserver: string;
  accessToken: string;
  roomId: string;
  fetchImpl?: typeof fetch;
}

// ── Sync parsing ──────────────────────────────────────────────────────────────

const EventSchema = z.object({
  type: z.string(),
  event_id: z.string().default(''),
  sender: z.string(),
  content: z.object({ msgtype: z.string().optional(), body: z.unknown() }).passthrough(),
});

const RoomSchema = z.object({
  timeline: z.object({ events: z.array(z.unknown()).default([]) }).default({}),
});

export const SyncSchema = z.object({
  next_batch: z.string(),
  rooms: z.object({ join: z.record(RoomSchema).default({}) }).default({}),
});

export type SyncResponse = z.infer<typeof SyncSchema>;

/**
 * Text messages from joined rooms' timelines, in arrival order. Events of
 * other types, or that do not match the expected shape, are skipped.
 */
export function extractMessages(sync: SyncResponse): InboundMessage[] {
  const out: InboundMessage[] = [];
  for (const [roomId, room] of Object.entries(sync.rooms.join)) {
    for (const raw of room.timeline.events) {
      const parsed = EventSchema.safeParse(raw);
      if (!parsed.success) continue;
      const event = parsed.data;
      if (event.type !== 'm.room.message' || event.content.msgtype !== 'm.text') continue;
      if (typeof event.content.body !== 'string') continue;
      out.push({ eventId: event.event_id, roomId, sender: event.sender, body: event.content.body });
    }
  }
  return out;
}

// ── Client ────────────────────────────────────────────────────────────────────

export class MatrixClient implements ChatChannel {
  private readonly base: string;
  private readonly doFetch: typeof fetch;

  constructor(private readonly opts: MatrixOptions) {
    this.base = `${opts.homeserver.replace(/\/+$/, '')}/_matrix/client/v3`;
    this.doFetch = opts.fetchImpl ?? fetch;
  }

  get roomId(): string {
    return this.opts.roomId;
  }

  /**
   * One API request. `timeoutMs` bounds the whole exchange, body included,
   * and applies alongside any caller `signal`.
   */
  private async call(
    method: string,
    path: string,
    body?: unknown,
    signal?: AbortSignal,
    timeoutMs: number = HTTP_TIMEOUT_MS,
  ): Promise<unknown> {
    const endpoint = `Matrix ${method} ${path.split('?')[0]}`;
    const deadline = new AbortController();
    const timer = setTimeout(() => deadline.abort(new Error(`timed out after ${timeoutMs}ms`)), timeoutMs);
    const forward = () => deadline.abort(signal?.reason);
    if (signal?.aborted) forward();
    signal?.addEventListener('abort', forward);
    try {
      let res: Response;
      try {
        res = await this.doFetch(`${this.base}${path}`, {
          method,
          headers: {
            Authorization: `Bearer ${this.opts.accessToken}`,
            'Content-Type': 'application/json',
          },
          body: body === undefined ? undefined : JSON.stringify(body),
          signal: deadline.signal,
        });
      } catch (err) {
        throw new TransportError(`${endpoint} failed: ${errorMessage(err)}`, { cause: err, retryable: true });
      }
      if (!res.ok) {
        throw new TransportError(`${endpoint} returned ${res.status}`, {
          status: res.status,
          retryable: res.status >= 500 || res.status === 429,
        });
      }
      try {
        return await res.json();
      } catch (err) {
        throw new TransportError(`${endpoint} sent an unreadable body: ${errorMessage(err)}`, { cause: err, retryable: true });
      }
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', forward);
    }
  }

  async whoami(): Promise<string> {
    const data = z.object({ user_id: z.string() }).parse(await this.call('GET', '/account/whoami'));
    return data.user_id;
  }

  async join(): Promise<void> {
    await this.call('POST', `/join/${encodeURIComponent(this.opts.roomId)}`, {});
  }

  async send(msg: ChatMessage): Promise<void> {
    const content: Record<string, string> = { msgtype: 'm.notice', body: msg.text };
    if (msg.html) {
      content['format'] = 'org.matrix.custom.html';
      content['formatted_body'] = msg.html;
    }
    const room = encodeURIComponent(this.opts.roomId);
    await this.call('PUT', `/rooms/${room}/send/m.room.message/${randomUUID()}`, content);
  }

  /** Long-poll for up to `timeoutMs`; a server that holds on longer than that plus HTTP_TIMEOUT_MS is abandoned. */
  async sync(since: string | undefined, timeoutMs: number, signal?: AbortSignal): Promise<SyncResponse> {
    const params = new URLSearchParams({ timeout: String(timeoutMs) });
    if (since) params.set('since', since);
    const data = await this.call('GET', `/sync?${params.toString()}`, undefined, signal, timeoutMs + HTTP_TIMEOUT_MS);
    return SyncSchema.parse(data);
  }

  /**
   * Long-poll until `signal` aborts, handing every new text message to
   * `onMessage`. History from before the first sync is skipped.
   */
  async listen(onMessage: (msg: InboundMessage) => Promise<void>, signal: AbortSignal): Promise<void> {
    let since: string | undefined;
    while (!signal.aborted) {
      try {
        const first = since === undefined;
        const sync = await this.sync(since, first ? 0 : MATRIX_SYNC_TIMEOUT_MS, signal);
        since = sync.next_batch;
        if (first) continue;
        for (const msg of extractMessages(sync)) {
          try {
            await onMessage(msg);
          } catch (err) {
            logger.error('Matrix: message handler failed', { error: err, eventId: msg.eventId });
          }
        }
      } catch (err) {
        if (signal.aborted) break;
        logger.warn(`Matrix: sync failed, retrying in ${MATRIX_RETRY_DELAY_MS / 1000}s`, { error: err });
        await sleep(MATRIX_RETRY_DELAY_MS, signal);
      }
    }
    logger.info('Matrix: listener stopped');
  }
}

function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const timer = setTimeout(done, ms);
    function done() {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    }
    signal.addEventListener('abort', done);
  });
}
