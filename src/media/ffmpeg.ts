/**
 * FFmpeg / FFprobe process helpers.
 *
 * Both run as child processes without a shell; arguments are passed as an
 * array so paths never need quoting. Encodes can take many minutes, so the
 * event loop is never blocked waiting on them.
 */
import { spawn } from 'child_process';
import * as readline from 'readline';
import { z } from 'zod';
import { env } from '../config.js';
import { logger } from '../utils/logger.js';

const STDERR_TAIL_BYTES = 4_000;

export class FfmpegError extends Error {
  constructor(message: string, public readonly stderr: string) {
    super(message);
    this.name = 'FfmpegError';
  }
}

interface RunOptions {
  label: string;
  /** Called for every stdout line (ffmpeg writes `-progress pipe:1` here). */
  onLine?: (line: string) => void;
}

function run(bin: string, args: readonly string[], opts: RunOptions): Promise<string> {
  logger.debug(`${bin} [${opts.label}]`, { args: args.join(' ') });
  return new Promise((resolve, reject) => {
    const child = spawn(bin, args, { stdio: ['ignore', 'pipe', 'pipe'] });
    const stdout: string[] = [];
    let stderr = '';

    readline.createInterface({ input: child.stdout }).on('line', (line) => {
      if (opts.onLine) opts.onLine(line);
      else stdout.push(line);
    });
    child.stderr.on('data', (chunk: Buffer) => {
      stderr = (stderr + chunk.toString('utf-8')).slice(-STDERR_TAIL_BYTES);
    });

    child.on('error', (err) => reject(new FfmpegError(`${opts.label}: cannot start ${bin}: ${err.message}`, '')));
    child.on('close', (code) => {
      if (code === 0) resolve(stdout.join('\n'));
      else reject(new FfmpegError(`${opts.label} failed (exit ${code ?? 'signal'}): ${lastLine(stderr)}`, stderr));
    });
  });
}

function lastLine(text: string): string {
  const lines = text.trim().split('\n');
  return lines[lines.length - 1] ?? '';
}

export function runFfmpeg(args: readonly string[], opts: RunOptions): Promise<string> {
  return run(env.FFMPEG_PATH, ['-hide_banner', '-y', ...args], opts);
}

// ── Probing ───────────────────────────────────────────────────────────────────

const ProbeSchema = z.object({
  format: z.object({ duration: z.coerce.number().optional() }).default({}),
  streams: z.array(z.object({ codec_type: z.string() })).default([]),
});

export interface MediaProbe {
  durationSeconds: number;
  hasAudio: boolean;
}

export async function probeMedia(file: string): Promise<MediaProbe> {
  const out = await run(
    env.FFPROBE_PATH,
    ['-v', 'error', '-show_entries', 'format=duration:stream=codec_type', '-of', 'json', file],
    { label: 'probe' },
  );
  const parsed = ProbeSchema.parse(JSON.parse(out));
  const duration = parsed.format.duration;
  if (duration === undefined || !Number.isFinite(duration)) {
    throw new FfmpegError(`probe: no duration reported for ${file}`, out);
  }
  return {
    durationSeconds: duration,
    hasAudio: parsed.streams.some((s) => s.codec_type === 'audio'),
  };
}

/** `ffmpeg -version` first line, or null when the binary is missing. */
export async function ffmpegVersion(bin: string = env.FFMPEG_PATH): Promise<string | null> {
  try {
    const out = await run(bin, ['-version'], { label: 'version' });
    return out.split('\n')[0] ?? null;
  } catch {
    return null;
  }
}
