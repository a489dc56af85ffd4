/**
 * Build outcome notifications to chat and ntfy.
 *
 * Chat delivery failures are logged and swallowed, and ntfy publishing
 * never throws.
 */
import type { SettingValues } from '../settings/keys.js';
import type { BuildOutput, BuildRecord } from '../pipeline/types.js';
import type { BuildStage } from '../pipeline/progress.js';
import { logger } from '../utils/logger.js';
import type { ChatChannel, ChatMessage } from './matrix.js';
import { publishNtfy, type NtfyMessage, type NtfyOptions } from './ntfy.js';

export type NotifySettings = Pick<SettingValues, 'ENABLE_NTFY' | 'NTFY_TOPIC'>;

/** What the executor needs to report a build's start, progress and result. */
export interface BuildNotifications {
  started(record: BuildRecord, settings: NotifySettings): Promise<void>;
  stage(record: BuildRecord, stage: BuildStage, detail: string, settings: NotifySettings): Promise<void>;
  succeeded(record: BuildRecord, output: BuildOutput, settings: NotifySettings): Promise<void>;
  failed(record: BuildRecord, stage: BuildStage, reason: string, settings: NotifySettings): Promise<void>;
}

function formatDuration(seconds: number): string {
  const total = Math.round(seconds);
  const m = Math.floor(total / 60);
  const s = total % 60;
  return `${m}:${String(s).padStart(2, '0')}`;
}

function who(record: BuildRecord): string {
  return record.trigger === 'manual' && record.requestedBy
    ? `manual, requested by ${record.requestedBy}`
    : record.trigger;
}

export function successMessage(record: BuildRecord, output: BuildOutput): ChatMessage {
  const lines = [
    `✅ Slideshow ready: ${output.videoName} (${formatDuration(output.durationSeconds)}, ${who(record)})`,
    `Delivered to: ${output.destinations.join(', ')}`,
    `Slides (${output.includedSlides.length}): ${output.includedSlides.join(', ')}`,
  ];
  if (output.omittedSlides.length > 0) {
    lines.push(`Left out (${output.omittedSlides.length}): ${output.omittedSlides.join(', ')}`);
  }
  if (output.music) {
    lines.push(`Music: ${output.music.name}`);
    if (output.music.attribution) lines.push(output.music.attribution);
  }
  return { text: lines.join('\n') };
}

export function stageMessage(record: BuildRecord, stage: BuildStage, detail: string): ChatMessage {
  return { text: `⏳ Build ${record.id.slice(0, 8)}: ${stage}${detail ? ` (${detail})` : ''}` };
}

export function failureMessage(record: BuildRecord, stage: BuildStage, reason: string): ChatMessage {
  return { text: `❌ Build ${record.id.slice(0, 8)} failed during ${stage}: ${reason}` };
}

export interface BuildNotifier extends BuildNotifications {
  /** Post to chat, if configured. */
  announce(msg: ChatMessage): Promise<void>;
}

export function createNotifier(chat: ChatChannel | undefined, ntfy: NtfyOptions): BuildNotifier {
  async function announce(msg: ChatMessage): Promise<void> {
    if (!chat) return;
    try {
      await chat.send(msg);
    } catch (err) {
      logger.warn('Notifier: chat message failed', { error: err });
    }
  }

  async function push(settings: NotifySettings, msg: NtfyMessage): Promise<void> {
    if (!settings.ENABLE_NTFY || !settings.NTFY_TOPIC) return;
    await publishNtfy(settings.NTFY_TOPIC, msg, ntfy);
  }

  return {
    announce,

    async started(_record, settings) {
      await push(settings, {
        title: 'Rebuild Started',
        message: 'Starting slideshow production...',
        priority: 2,
        tags: ['rocket', 'running'],
      });
    },

    async stage(record, stage, detail, settings) {
      await Promise.all([
        announce(stageMessage(record, stage, detail)),
        push(settings, {
          title: `Update: ${stage}`,
          message: detail ? `${stage}: ${detail}` : stage,
          tags: ['information_source'],
        }),
      ]);
    },

    async succeeded(record, output, settings) {
      await Promise.all([
        announce(successMessage(record, output)),
        push(settings, {
          title: 'Slideshow ready',
          message: `${output.videoName}: ${output.includedSlides.length} slides, ${formatDuration(output.durationSeconds)}`,
          tags: ['white_check_mark'],
        }),
      ]);
    },

    async failed(record, stage, reason, settings) {
      await Promise.all([
        announce(failureMessage(record, stage, reason)),
        push(settings, {
          title: `Slideshow build failed (${stage})`,
          message: reason,
          priority: 4,
          tags: ['x'],
        }),
      ]);
    },
  };
}
