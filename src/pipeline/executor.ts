/**
 * Runs one build: Validating → Fetching → Assembling → Encoding → Uploading
 * → Notifying.
 *
 * Every missing input is reported together, before anything is downloaded.
 * Work happens in TEMP_DIR/<buildId>, which is removed however the build ends.
 */
import * as fs from 'fs';
import * as path from 'path';
import { env } from '../config.js';
import type { Compositor, RenderJob } from '../media/compositor.js';
import type { MediaProbe } from '../media/ffmpeg.js';
import { toMediaItems, type MediaItem } from '../media/inventory.js';
import type { BuildNotifications } from '../monitoring/notifier.js';
import type { MediaSource, SettingValues } from '../settings/keys.js';
import type { EffectiveConfig } from '../settings/resolver.js';
import type { MediaStore, StoredFile } from '../storage/types.js';
import {
  EmptyInventoryError,
  ResourceNotFoundError,
  ValidationError,
  errorMessage,
} from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { planAssembly, randomIndex, type AssemblyPlan } from './planner.js';
import type { BuildStage, ProgressReporter } from './progress.js';
import type { BuildOutput, BuildRecord } from './types.js';

export interface StoreLookup {
  get(source: MediaSource): MediaStore;
}

export interface ExecutorDeps {
  stores: StoreLookup;
  compositor: Compositor;
  notifier: BuildNotifications;
  probe: (file: string) => Promise<MediaProbe>;
  tempRoot?: string;
  pickIndex?: (poolSize: number) => number;
  fontFile?: string;
}

/** Inputs confirmed to exist during validation. */
interface Inventory {
  imageStore: MediaStore;
  images: MediaItem[];
  musicStore?: MediaStore;
  musicFiles: StoredFile[];
  appendStore?: MediaStore;
}

interface Fetched {
  plan: AssemblyPlan;
  /** Local copies, index-aligned with plan.slides. */
  slideFiles: string[];
  appendedHasAudio: boolean;
}

const DEFAULT_VIDEO_NAME = 'slideshow.mp4';

/** Stages that send a chat and ntfy status update on entry. */
const ANNOUNCED_STAGES: ReadonlySet<BuildStage> = new Set<BuildStage>(['Fetching', 'Assembling', 'Encoding', 'Uploading']);

export function imageFolderOf(s: SettingValues): string {
  return s.IMAGE_SOURCE === 'local' ? s.IMAGE_FOLDER : s.NEXTCLOUD_IMAGE_PATH;
}

export function videoNameOf(s: SettingValues): string {
  const target = s.OUTPUT_FILEPATH || s.NEXTCLOUD_UPLOAD_PATH;
  const name = path.posix.basename(target.replace(/\\/g, '/'));
  return name || DEFAULT_VIDEO_NAME;
}

function parentOf(p: string): string {
  const dir = path.posix.dirname(p.replace(/\\/g, '/'));
  return dir === '.' ? '' : dir;
}

function stem(name: string): string {
  const ext = path.extname(name);
  return ext ? name.slice(0, -ext.length) : name;
}

export class BuildExecutor {
  private readonly tempRoot: string;
  private readonly pickIndex: (poolSize: number) => number;

  constructor(private readonly deps: ExecutorDeps) {
    this.tempRoot = deps.tempRoot ?? env.TEMP_DIR;
    this.pickIndex = deps.pickIndex ?? randomIndex;
  }

  async execute(record: BuildRecord, config: EffectiveConfig, progress: ProgressReporter): Promise<BuildOutput> {
    const s = config.values;
    const workDir = path.join(this.tempRoot, record.id);
    let stage: BuildStage = 'Validating';
    const notify = async (what: string, send: () => Promise<void>): Promise<void> => {
      try {
        await send();
      } catch (err) {
        logger.warn(`Executor: ${what} notification failed`, { buildId: record.id, error: err });
      }
    };
    const enter = async (next: BuildStage, detail = ''): Promise<void> => {
      stage = next;
      progress.enter(next, detail);
      logger.info(`Executor: ${next}`, { buildId: record.id, detail });
      if (ANNOUNCED_STAGES.has(next)) {
        await notify('stage', () => this.deps.notifier.stage(record, next, detail, s));
      }
    };

    try {
      await notify('start', () => this.deps.notifier.started(record, s));
      await enter('Validating', 'checking sources and destinations');
      const inventory = await this.validate(s);

      await enter('Fetching', 'downloading media');
      await fs.promises.mkdir(path.join(workDir, 'slides'), { recursive: true });
      const fetched = await this.fetchAndPlan(s, inventory, workDir, progress);
      const { plan } = fetched;

      await enter('Assembling', 'preparing render');
      const { job, music } = await this.assemble(s, fetched, inventory, workDir);

      await enter('Encoding', `${plan.slides.length} slides × ${plan.repeatCount}`);
      await this.deps.compositor.render(job, (fraction) => progress.update(fraction));

      await enter('Uploading');
      const destinations = await this.deliver(s, job.outputPath);

      await enter('Notifying');
      const output: BuildOutput = {
        videoName: videoNameOf(s),
        destinations,
        durationSeconds: plan.totalSeconds,
        includedSlides: plan.slides.map((sl) => sl.item.name),
        omittedSlides: plan.omitted.map((m) => m.name),
        music,
      };
      await notify('success', () => this.deps.notifier.succeeded(record, output, s));
      return output;
    } catch (err) {
      logger.error(`Executor: build failed during ${stage}`, { buildId: record.id, error: err });
      const failedAt = stage;
      await notify('failure', () => this.deps.notifier.failed(record, failedAt, errorMessage(err), s));
      throw err;
    } finally {
      await fs.promises.rm(workDir, { recursive: true, force: true }).catch((err: unknown) => {
        logger.warn('Executor: temp cleanup failed', { workDir, error: err });
      });
    }
  }

  // ── Validating ──────────────────────────────────────────────────────────────

  private async validate(s: SettingValues): Promise<Inventory> {
    if (!s.OUTPUT_FILEPATH && !s.NEXTCLOUD_UPLOAD_PATH) {
      throw new ValidationError('No output destination: set OUTPUT_FILEPATH or NEXTCLOUD_UPLOAD_PATH');
    }

    const missing: string[] = [];
    const imageFolder = imageFolderOf(s);
    const imageStore = this.deps.stores.get(s.IMAGE_SOURCE);
    const imageFiles = await listOrRecord(imageStore, imageFolder, missing);

    let musicStore: MediaStore | undefined;
    let musicFiles: StoredFile[] = [];
    if (s.ENABLE_MUSIC) {
      musicStore = this.deps.stores.get(s.MUSIC_SOURCE);
      musicFiles = await listOrRecord(musicStore, s.MUSIC_FOLDER, missing);
    }

    let appendStore: MediaStore | undefined;
    if (s.APPEND_VIDEO_PATH) {
      appendStore = this.deps.stores.get(s.APPEND_VIDEO_SOURCE);
      await requireExists(appendStore, s.APPEND_VIDEO_PATH, missing);
    }

    if (s.NEXTCLOUD_UPLOAD_PATH) {
      const parent = parentOf(s.NEXTCLOUD_UPLOAD_PATH);
      if (parent) await requireExists(this.deps.stores.get('nextcloud'), parent, missing);
    }

    if (s.OUTPUT_FILEPATH) {
      await requireExists(this.deps.stores.get('local'), path.dirname(s.OUTPUT_FILEPATH), missing);
    }

    if (missing.length > 0) throw new ResourceNotFoundError(missing);

    const images = toMediaItems(imageFiles, s.IMAGE_SOURCE).filter((m) => m.kind === 'image');
    if (images.length === 0) throw new EmptyInventoryError(imageFolder);

    return { imageStore, images, musicStore, musicFiles, appendStore };
  }

  // ── Fetching ────────────────────────────────────────────────────────────────

  private async fetchAndPlan(
    s: SettingValues,
    inv: Inventory,
    workDir: string,
    progress: ProgressReporter,
  ): Promise<Fetched> {
    let appended: { item: MediaItem; durationSeconds: number } | undefined;
    let appendedHasAudio = false;
    if (inv.appendStore && s.APPEND_VIDEO_PATH) {
      const name = path.posix.basename(s.APPEND_VIDEO_PATH.replace(/\\/g, '/'));
      const local = path.join(workDir, `append${path.extname(name)}`);
      await inv.appendStore.fetch(s.APPEND_VIDEO_PATH, local);
      const probe = await this.deps.probe(local);
      appendedHasAudio = probe.hasAudio;
      appended = {
        item: { path: local, name, kind: 'video', source: s.APPEND_VIDEO_SOURCE, orderKey: { prefix: null, name } },
        durationSeconds: probe.durationSeconds,
      };
    }

    const music = toMediaItems(inv.musicFiles, s.MUSIC_SOURCE).filter((m) => m.kind === 'audio');
    const plan = planAssembly({
      inventory: [...inv.images, ...music],
      appended,
      settings: s,
      pickIndex: this.pickIndex,
      imageFolder: imageFolderOf(s),
    });
    logger.info('Executor: plan ready', {
      slides: plan.slides.length,
      repeats: plan.repeatCount,
      perSlideSeconds: plan.perSlideSeconds,
      omitted: plan.omitted.length,
      totalSeconds: plan.totalSeconds,
    });

    const slideFiles: string[] = [];
    for (const [i, slide] of plan.slides.entries()) {
      const ext = path.extname(slide.item.name).toLowerCase();
      const local = path.join(workDir, 'slides', `${String(i).padStart(4, '0')}${ext}`);
      await inv.imageStore.fetch(slide.item.path, local);
      slideFiles.push(local);
      progress.update((i + 1) / plan.slides.length, `${i + 1}/${plan.slides.length} images`);
    }
    return { plan, slideFiles, appendedHasAudio };
  }

  // ── Assembling ──────────────────────────────────────────────────────────────

  private async assemble(
    s: SettingValues,
    fetched: Fetched,
    inv: Inventory,
    workDir: string,
  ): Promise<{ job: RenderJob; music?: BuildOutput['music'] }> {
    const { plan } = fetched;
    let audio: RenderJob['audio'];
    let music: BuildOutput['music'];

    if (plan.audio && inv.musicStore) {
      const track = plan.audio.item;
      const local = path.join(workDir, `music${path.extname(track.name).toLowerCase()}`);
      await inv.musicStore.fetch(track.path, local);
      audio = {
        file: local,
        endSeconds: plan.audio.endSeconds,
        fadeStartSeconds: plan.audio.fadeStartSeconds,
        fadeSeconds: plan.audio.fadeSeconds,
      };
      music = { name: track.name, attribution: await this.attribution(inv.musicStore, inv.musicFiles, track, workDir) };
    }

    const job: RenderJob = {
      slides: plan.slides.map((slide, i) => ({ file: fetched.slideFiles[i] ?? slide.item.path, seconds: slide.displaySeconds })),
      repeatCount: plan.repeatCount,
      sequenceSeconds: plan.sequenceSeconds,
      appended: plan.appended
        ? { file: plan.appended.item.path, trimSeconds: plan.appended.trimSeconds, hasAudio: fetched.appendedHasAudio }
        : undefined,
      audio,
      overlay: plan.overlay,
      totalSeconds: plan.totalSeconds,
      frameRate: plan.frameRate,
      concatListPath: path.join(workDir, 'slides.ffconcat'),
      outputPath: path.join(workDir, videoNameOf(s)),
      fontFile: this.deps.fontFile,
    };
    return { job, music };
  }

  /** `<track>.md` beside the track, if present. A missing or unreadable note is not an error. */
  private async attribution(
    store: MediaStore,
    files: StoredFile[],
    track: MediaItem,
    workDir: string,
  ): Promise<string | undefined> {
    const wanted = `${stem(track.name)}.md`;
    const note = files.find((f) => f.name === wanted);
    if (!note) return undefined;
    const local = path.join(workDir, 'attribution.md');
    try {
      await store.fetch(note.path, local);
      const text = (await fs.promises.readFile(local, 'utf-8')).trim();
      return text || undefined;
    } catch (err) {
      logger.warn('Executor: attribution note unreadable', { note: note.path, error: err });
      return undefined;
    }
  }

  // ── Uploading ───────────────────────────────────────────────────────────────

  private async deliver(s: SettingValues, rendered: string): Promise<string[]> {
    const destinations: string[] = [];
    if (s.OUTPUT_FILEPATH) {
      await this.deps.stores.get('local').upload(rendered, s.OUTPUT_FILEPATH);
      destinations.push(`local:${s.OUTPUT_FILEPATH}`);
    }
    if (s.NEXTCLOUD_UPLOAD_PATH) {
      await this.deps.stores.get('nextcloud').upload(rendered, s.NEXTCLOUD_UPLOAD_PATH);
      destinations.push(`nextcloud:${s.NEXTCLOUD_UPLOAD_PATH}`);
    }
    return destinations;
  }
}

async function listOrRecord(store: MediaStore, dir: string, missing: string[]): Promise<StoredFile[]> {
  try {
    return await store.listFiles(dir);
  } catch (err) {
    if (err instanceof ResourceNotFoundError) {
      missing.push(...err.missing);
      return [];
    }
    throw err;
  }
}

async function requireExists(store: MediaStore, p: string, missing: string[]): Promise<void> {
  if (!(await store.exists(p))) missing.push(`${store.source}:${p}`);
}
