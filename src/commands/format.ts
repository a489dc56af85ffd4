/**
 * Chat reply rendering. Plain text always; HTML for the longer listings,
 * which Matrix clients show as formatted tables of keys.
 */
import type { ChatMessage } from '../monitoring/matrix.js';
import type { OrchestratorStatus } from '../pipeline/orchestrator.js';
import { progressBar } from '../pipeline/progress.js';
import type { BuildRecord } from '../pipeline/types.js';
import type { OverrideRecord } from '../db/overrides.js';
import {
  SETTING_GROUPS,
  SETTING_INFO,
  keysInGroup,
  type MediaSource,
  type SettingSource,
} from '../settings/keys.js';
import { sourceOf, type EffectiveConfig } from '../settings/resolver.js';

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

export function formatTime(date: Date | null | undefined): string {
  if (!date) return 'never';
  return `${date.toISOString().slice(0, 16).replace('T', ' ')} UTC`;
}

export function formatUptime(seconds: number): string {
  const d = Math.floor(seconds / 86_400);
  const h = Math.floor((seconds % 86_400) / 3_600);
  const m = Math.floor((seconds % 3_600) / 60);
  if (d > 0) return `${d}d ${h}h ${m}m`;
  if (h > 0) return `${h}h ${m}m`;
  return `${m}m`;
}

export function displayValue(value: string | number | boolean): string {
  const text = String(value);
  return text === '' ? '(empty)' : text;
}

export function shortId(id: string): string {
  return id.slice(0, 8);
}

// ── Settings ──────────────────────────────────────────────────────────────────

export function formatSetting(key: string, value: string | number | boolean, source: SettingSource): string {
  return `${key} = ${displayValue(value)} (${source})`;
}

export function formatAllSettings(config: EffectiveConfig): ChatMessage {
  const text: string[] = [];
  const html: string[] = [];
  for (const group of SETTING_GROUPS) {
    text.push(`${group}:`);
    html.push(`<h4>${group}</h4><ul>`);
    for (const key of keysInGroup(group)) {
      const value = displayValue(config.values[key]);
      const overridden = sourceOf(config, key) === 'override';
      const mark = overridden ? ' *' : '';
      text.push(`  ${key} = ${value}${mark}`);
      html.push(`<li><code>${key}</code> = ${escapeHtml(value)}${overridden ? ' <b>(override)</b>' : ''}</li>`);
    }
    html.push('</ul>');
  }
  text.push('', '* = set from chat');
  return { text: text.join('\n'), html: html.join('') };
}

export function formatOverrides(overrides: readonly OverrideRecord[]): ChatMessage {
  if (overrides.length === 0) {
    return { text: 'No overrides set; every value comes from the environment or the defaults.' };
  }
  const lines = overrides.map((o) => `  ${o.key} = ${displayValue(o.value)} (since ${formatTime(new Date(o.updatedAt))})`);
  return { text: [`Active overrides (${overrides.length}):`, ...lines].join('\n') };
}

// ── Help ──────────────────────────────────────────────────────────────────────

const COMMANDS: [string, string][] = [
  ['!rebuild', 'Start a build now'],
  ['!status', 'Show the service and build status'],
  ['!set KEY VALUE', 'Override a setting'],
  ['!unset KEY', 'Remove one override'],
  ['!get KEY', 'Show a setting and where it comes from'],
  ['!get all', 'Show every setting'],
  ['!config', 'Show the active overrides'],
  ['!defaults', 'Remove every override'],
  ['!help', 'Show this message'],
];

export function formatHelp(): ChatMessage {
  const text = ['Commands:', ...COMMANDS.map(([cmd, what]) => `  ${cmd}: ${what}`), '', 'Settings:'];
  const html = ['<h4>Commands</h4><ul>', ...COMMANDS.map(([cmd, what]) => `<li><code>${escapeHtml(cmd)}</code>: ${what}</li>`), '</ul>'];
  for (const group of SETTING_GROUPS) {
    text.push(`  ${group}:`);
    html.push(`<h4>${group}</h4><ul>`);
    for (const key of keysInGroup(group)) {
      const info = SETTING_INFO[key];
      text.push(`    ${key} [${info.type}]: ${info.description}`);
      html.push(`<li><code>${key}</code> <i>${escapeHtml(info.type)}</i>: ${escapeHtml(info.description)}</li>`);
    }
    html.push('</ul>');
  }
  return { text: text.join('\n'), html: html.join('') };
}

// ── Status ────────────────────────────────────────────────────────────────────

export interface StatusView {
  version: string;
  uptimeSeconds: number;
  lastSuccessAt: Date | null;
  heartbeatActive: boolean;
  orchestrator: OrchestratorStatus;
  nextRun: Date | null;
  storage: Partial<Record<MediaSource, boolean>>;
}

function describeOutcome(build: BuildRecord): string {
  const outcome = build.outcome;
  if (!outcome) return `${shortId(build.id)} unfinished`;
  if (outcome.status === 'success') {
    return `${shortId(build.id)} succeeded at ${formatTime(build.endedAt)} (${outcome.output.videoName})`;
  }
  return `${shortId(build.id)} failed at ${formatTime(build.endedAt)} during ${outcome.stage}: ${outcome.reason}`;
}

export function formatStatus(view: StatusView): ChatMessage {
  const lines = [
    `Slideshow builder v${view.version}`,
    `Uptime: ${formatUptime(view.uptimeSeconds)}`,
    `Last success: ${formatTime(view.lastSuccessAt)}`,
    `Heartbeat: ${view.heartbeatActive ? 'active' : 'inactive'}`,
  ];

  const { build, progress, lastBuild } = view.orchestrator;
  if (build) {
    lines.push(
      `Current build: ${shortId(build.id)} (${build.trigger}${build.requestedBy ? `, by ${build.requestedBy}` : ''})`,
      `  Stage: ${build.stage}${progress ? ` ${progressBar(progress.fraction)}` : ''}`,
    );
    if (progress?.detail) lines.push(`  ${progress.detail}`);
    lines.push(`  Started: ${formatTime(build.startedAt)}`);
  } else {
    lines.push('Current build: none');
  }

  lines.push(`Last build: ${lastBuild ? describeOutcome(lastBuild) : 'none'}`);
  lines.push(`Next scheduled run: ${formatTime(view.nextRun)}`);

  const storage = Object.entries(view.storage).map(([name, ok]) => `${name} ${ok ? 'ok' : 'unreachable'}`);
  lines.push(`Storage: ${storage.length > 0 ? storage.join(', ') : 'unknown'}`);
  return { text: lines.join('\n') };
}
