/**
 * Render a planned slideshow to an H.264/AAC file with one ffmpeg run.
 *
 * Slides enter through the concat demuxer (one entry per displayed slide,
 * repeats expanded), the appended clip and the music track are extra inputs,
 * and everything is joined in a single filter graph.
 */
import * as fs from 'fs';
import { AUDIO_SAMPLE_RATE, VIDEO_SIZE } from '../config.js';
import type { TimerPosition } from '../settings/keys.js';
import { logger } from '../utils/logger.js';
import { runFfmpeg } from './ffmpeg.js';

export interface RenderJob {
  /** One pass of slides; played `repeatCount` times. */
  slides: { file: string; seconds: number }[];
  repeatCount: number;
  sequenceSeconds: number;
  appended?: { file: string; trimSeconds: number; hasAudio: boolean };
  audio?: { file: string; endSeconds: number; fadeStartSeconds: number; fadeSeconds: number };
  overlay?: { startSeconds: number; endSeconds: number; position: TimerPosition };
  totalSeconds: number;
  frameRate: number;
  concatListPath: string;
  outputPath: string;
  fontFile?: string;
}

export type ProgressCallback = (fraction: number) => void;

export interface Compositor {
  render(job: RenderJob, onProgress: ProgressCallback): Promise<void>;
}

// ── Argument building ─────────────────────────────────────────────────────────

/** Seconds as ffmpeg wants them: at most millisecond precision, no trailing zeros. */
export function sec(value: number): string {
  return String(Number(value.toFixed(3)));
}

function quoteConcatPath(p: string): string {
  return `'${p.replace(/'/g, "'\\''")}'`;
}

/**
 * Concat demuxer script. The last file is listed twice: the demuxer ignores
 * the duration of the final entry otherwise.
 */
export function buildConcatList(job: RenderJob): string {
  const lines = ['ffconcat version 1.0'];
  let last: string | undefined;
  for (let r = 0; r < job.repeatCount; r++) {
    for (const slide of job.slides) {
      lines.push(`file ${quoteConcatPath(slide.file)}`, `duration ${sec(slide.seconds)}`);
      last = slide.file;
    }
  }
  if (last !== undefined) lines.push(`file ${quoteConcatPath(last)}`);
  return lines.join('\n') + '\n';
}

const MARGIN = 40;

function overlayXY(position: TimerPosition): { x: string; y: string } {
  const [vertical, horizontal] = position.split('-');
  const x = horizontal === 'left' ? String(MARGIN)
    : horizontal === 'right' ? `w-text_w-${MARGIN}`
    : '(w-text_w)/2';
  const y = vertical === 'bottom' ? `h-text_h-${MARGIN}` : String(MARGIN);
  return { x, y };
}

function escapeFilterValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/'/g, "\\'").replace(/:/g, '\\:');
}

/** mm:ss countdown to `total`, visible between the overlay bounds. */
export function countdownFilter(overlay: NonNullable<RenderJob['overlay']>, total: number, fontFile?: string): string {
  const t = sec(total);
  const text = `%{eif\\:trunc((${t}-t)/60)\\:d\\:2}\\:%{eif\\:mod(trunc(${t}-t)\\,60)\\:d\\:2}`;
  const { x, y } = overlayXY(overlay.position);
  const parts = [
    `text='${text}'`,
    fontFile ? `fontfile='${escapeFilterValue(fontFile)}'` : undefined,
    'fontsize=72',
    'fontcolor=white',
    'box=1',
    'boxcolor=black@0.5',
    'boxborderw=16',
    `x=${x}`,
    `y=${y}`,
    `enable='between(t,${sec(overlay.startSeconds)},${sec(overlay.endSeconds)})'`,
  ];
  return `drawtext=${parts.filter((p) => p !== undefined).join(':')}`;
}

function fitVideo(frameRate: number): string {
  const { width, height } = VIDEO_SIZE;
  return [
    `scale=${width}:${height}:force_original_aspect_ratio=decrease`,
    `pad=${width}:${height}:(ow-iw)/2:(oh-ih)/2:color=black`,
    'setsar=1',
    `fps=${frameRate}`,
    'format=yuv420p',
  ].join(',');
}

const AUDIO_FORMAT = `aresample=${AUDIO_SAMPLE_RATE},aformat=sample_fmts=fltp:channel_layouts=stereo`;

function silence(seconds: number): string {
  return `anullsrc=r=${AUDIO_SAMPLE_RATE}:cl=stereo,atrim=duration=${sec(seconds)}`;
}

export function buildRenderArgs(job: RenderJob): string[] {
  const inputs: string[] = [];
  const filters: string[] = [];
  const segments: string[] = [];
  let next = 0;

  if (job.slides.length > 0) {
    const slideInput = next++;
    inputs.push('-f', 'concat', '-safe', '0', '-i', job.concatListPath);
    filters.push(`[${slideInput}:v]${fitVideo(job.frameRate)},trim=duration=${sec(job.sequenceSeconds)},setpts=PTS-STARTPTS[sv]`);

    if (job.audio) {
      const audioInput = next++;
      inputs.push('-stream_loop', '-1', '-i', job.audio.file);
      filters.push(
        `[${audioInput}:a]atrim=0:${sec(job.audio.endSeconds)},asetpts=PTS-STARTPTS,` +
        `afade=t=out:st=${sec(job.audio.fadeStartSeconds)}:d=${sec(job.audio.fadeSeconds)},` +
        `apad=whole_dur=${sec(job.sequenceSeconds)},${AUDIO_FORMAT}[sa]`,
      );
    } else {
      filters.push(`${silence(job.sequenceSeconds)},${AUDIO_FORMAT}[sa]`);
    }
    segments.push('[sv][sa]');
  }

  if (job.appended) {
    const clipInput = next++;
    const trim = sec(job.appended.trimSeconds);
    inputs.push('-i', job.appended.file);
    filters.push(`[${clipInput}:v]${fitVideo(job.frameRate)},trim=duration=${trim},setpts=PTS-STARTPTS[cv]`);
    filters.push(
      job.appended.hasAudio
        ? `[${clipInput}:a]atrim=duration=${trim},asetpts=PTS-STARTPTS,apad=whole_dur=${trim},${AUDIO_FORMAT}[ca]`
        : `${silence(job.appended.trimSeconds)},${AUDIO_FORMAT}[ca]`,
    );
    segments.push('[cv][ca]');
  }

  if (segments.length === 0) throw new Error('buildRenderArgs: nothing to render');

  const joinedVideo = job.overlay ? '[vjoin]' : '[vout]';
  filters.push(`${segments.join('')}concat=n=${segments.length}:v=1:a=1${joinedVideo}[aout]`);
  if (job.overlay) {
    filters.push(`[vjoin]${countdownFilter(job.overlay, job.totalSeconds, job.fontFile)}[vout]`);
  }

  return [
    ...inputs,
    '-filter_complex', filters.join(';'),
    '-map', '[vout]',
    '-map', '[aout]',
    '-c:v', 'libx264',
    '-preset', 'veryfast',
    '-pix_fmt', 'yuv420p',
    '-r', String(job.frameRate),
    '-c:a', 'aac',
    '-b:a', '192k',
    '-t', sec(job.totalSeconds),
    '-movflags', '+faststart',
    '-progress', 'pipe:1',
    '-nostats',
    job.outputPath,
  ];
}

/** Fraction done from one `-progress` line, or undefined for unrelated keys. */
export function parseProgressLine(line: string, totalSeconds: number): number | undefined {
  const [key, value] = line.split('=', 2);
  if (key === 'progress' && value === 'end') return 1;
  if ((key === 'out_time_us' || key === 'out_time_ms') && value !== undefined) {
    const micros = Number(value);
    if (!Number.isFinite(micros) || micros < 0 || totalSeconds <= 0) return undefined;
    return Math.min(1, micros / 1_000_000 / totalSeconds);
  }
  return undefined;
}

// ── FFmpeg implementation ─────────────────────────────────────────────────────

export class FfmpegCompositor implements Compositor {
  async render(job: RenderJob, onProgress: ProgressCallback): Promise<void> {
    if (job.slides.length > 0) {
      await fs.promises.writeFile(job.concatListPath, buildConcatList(job), 'utf-8');
    }
    logger.info('Compositor: encoding', {
      slides: job.slides.length,
      repeats: job.repeatCount,
      seconds: job.totalSeconds,
      output: job.outputPath,
    });
    await runFfmpeg(buildRenderArgs(job), {
      label: 'render',
      onLine: (line) => {
        const fraction = parseProgressLine(line, job.totalSeconds);
        if (fraction !== undefined) onProgress(fraction);
      },
    });
  }
}
