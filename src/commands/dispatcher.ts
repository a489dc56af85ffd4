/**
 * Chat command handling.
 *
 * Messages from the bot itself, from other rooms, and from senders outside
 * the allow list are dropped before any parsing; unauthorized senders get no
 * reply at all. Handlers never throw: failures become a reply.
 */
import { unquote } from '../config.js';
import type { ChatChannel, ChatMessage, InboundMessage } from '../monitoring/matrix.js';
import type { OrchestratorStatus, SubmitResult } from '../pipeline/orchestrator.js';
import type { BuildTrigger } from '../pipeline/types.js';
import { isSettingKey, type MediaSource } from '../settings/keys.js';
import { sourceOf, type ConfigResolver } from '../settings/resolver.js';
import { ValidationError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { VERSION } from '../version.js';
import {
  formatAllSettings,
  formatHelp,
  formatOverrides,
  formatSetting,
  formatStatus,
  formatTime,
  shortId,
} from './format.js';

/** The orchestrator surface commands use. */
export interface BuildControl {
  submit(trigger: BuildTrigger, requestedBy?: string): SubmitResult;
  status(): OrchestratorStatus;
  reschedule(): void;
  nextScheduledRun(): Date | null;
  heartbeatActive(): boolean;
}

export interface DispatcherOptions {
  control: BuildControl;
  resolver: ConfigResolver;
  chat: ChatChannel;
  health: { uptimeSeconds(): number; lastSuccessAt(): Date | null };
  storage?: { ping(): Promise<Partial<Record<MediaSource, boolean>>> };
  roomId: string;
  allowedUsers: readonly string[];
  botUserId?: string;
}

export interface ParsedCommand {
  verb: string;
  args: string;
}

/** `!verb rest…` → verb and the trimmed remainder; null for anything else. */
export function parseCommand(body: string): ParsedCommand | null {
  const text = body.trim();
  if (!text.startsWith('!')) return null;
  const match = text.match(/^(\S+)\s*([\s\S]*)$/);
  if (!match) return null;
  return { verb: match[1] ?? '', args: (match[2] ?? '').trim() };
}

export class CommandDispatcher {
  private readonly allowed: ReadonlySet<string>;

  constructor(private readonly opts: DispatcherOptions) {
    this.allowed = new Set(opts.allowedUsers);
  }

  async handle(msg: InboundMessage): Promise<void> {
    if (msg.roomId !== this.opts.roomId) return;
    if (this.opts.botUserId && msg.sender === this.opts.botUserId) return;

    const command = parseCommand(msg.body);
    if (!command) return;

    if (!this.allowed.has(msg.sender)) {
      logger.warn('Dispatcher: ignoring command from unauthorized sender', { sender: msg.sender, verb: command.verb });
      return;
    }

    logger.info('Dispatcher: command', { sender: msg.sender, verb: command.verb });
    let reply: ChatMessage | string;
    try {
      reply = await this.dispatch(command, msg.sender);
    } catch (err) {
      logger.error('Dispatcher: command failed', { verb: command.verb, error: err });
      reply = `❌ ${command.verb} failed: ${errorMessage(err)}`;
    }
    await this.opts.chat.send(typeof reply === 'string' ? { text: reply } : reply);
  }

  private async dispatch(cmd: ParsedCommand, sender: string): Promise<ChatMessage | string> {
    switch (cmd.verb) {
      case '!rebuild': return this.rebuild(sender);
      case '!status':  return this.status();
      case '!set':     return this.set(cmd.args);
      case '!unset':   return this.unset(cmd.args);
      case '!get':     return this.get(cmd.args);
      case '!config':  return formatOverrides(this.opts.resolver.listOverrides());
      case '!defaults': return this.defaults();
      case '!help':    return formatHelp();
      default:         return `Unknown command ${cmd.verb}. Send !help for the list.`;
    }
  }

  private rebuild(sender: string): string {
    const result = this.opts.control.submit('manual', sender);
    if (result.accepted) {
      return `🔨 Build ${shortId(result.build.id)} started. I'll report here when it finishes.`;
    }
    const active = result.active;
    return `⏳ A build is already running (${active.stage}, started ${formatTime(active.startedAt)}).`;
  }

  private async status(): Promise<ChatMessage> {
    const { control, health, storage } = this.opts;
    return formatStatus({
      version: VERSION,
      uptimeSeconds: health.uptimeSeconds(),
      lastSuccessAt: health.lastSuccessAt(),
      heartbeatActive: control.heartbeatActive(),
      orchestrator: control.status(),
      nextRun: control.nextScheduledRun(),
      storage: storage ? await storage.ping() : {},
    });
  }

  private set(args: string): string {
    const match = args.match(/^(\S+)\s+([\s\S]+)$/);
    if (!match) return 'Usage: !set KEY VALUE';
    const [, key = '', rawValue = ''] = match;
    try {
      const record = this.opts.resolver.setOverride(key, unquote(rawValue));
      const lines = [`✅ ${formatSetting(record.key, record.value, 'override')}`];
      if (record.key === 'CRON_SCHEDULE') lines.push(this.rearm());
      return lines.join('\n');
    } catch (err) {
      if (err instanceof ValidationError) return `❌ ${err.message}`;
      throw err;
    }
  }

  private unset(args: string): string {
    if (!args) return 'Usage: !unset KEY';
    try {
      const removed = this.opts.resolver.clearOverride(args);
      const key = args.trim().toUpperCase();
      if (!removed) return `${key} has no override.`;
      const lines = [`✅ Override for ${key} removed.`];
      if (key === 'CRON_SCHEDULE') lines.push(this.rearm());
      return lines.join('\n');
    } catch (err) {
      if (err instanceof ValidationError) return `❌ ${err.message}`;
      throw err;
    }
  }

  private get(args: string): ChatMessage | string {
    if (!args) return 'Usage: !get KEY or !get all';
    if (args.toLowerCase() === 'all') return formatAllSettings(this.opts.resolver.resolveAll());
    const key = args.toUpperCase();
    const config = this.opts.resolver.resolveAll();
    if (!isSettingKey(key)) return `❌ Unknown setting: ${args}`;
    return formatSetting(key, config.values[key], sourceOf(config, key));
  }

  private defaults(): string {
    const removed = this.opts.resolver.clearAll();
    return [`✅ Removed ${removed} override${removed === 1 ? '' : 's'}; defaults restored.`, this.rearm()].join('\n');
  }

  private rearm(): string {
    try {
      this.opts.control.reschedule();
      return `Next scheduled run: ${formatTime(this.opts.control.nextScheduledRun())}`;
    } catch (err) {
      logger.error('Dispatcher: reschedule failed', { error: err });
      return `⚠️ Schedule not updated: ${errorMessage(err)}`;
    }
  }
}
