/**
 * Assembly planner: turns an inventory and settings into a timeline that
 * lands on the target duration.
 *
 * Pure. The only source of variation is `pickIndex`, which the caller
 * supplies (random in production, fixed in tests).
 */
import { orderMedia, type MediaItem } from '../media/inventory.js';
import type { SettingValues, TimerPosition } from '../settings/keys.js';
import { DurationTooShortError, EmptyInventoryError } from '../utils/errors.js';

export interface PlannedSlide {
  readonly item: MediaItem;
  readonly displaySeconds: number;
  /** Offset within one pass of the sequence. */
  readonly startSeconds: number;
}

export interface PlannedAppend {
  readonly item: MediaItem;
  readonly durationSeconds: number;
  readonly trimSeconds: number;
}

export interface PlannedAudio {
  readonly item: MediaItem;
  readonly endSeconds: number;
  readonly fadeStartSeconds: number;
  readonly fadeSeconds: number;
  readonly trailingSilenceSeconds: number;
}

export interface PlannedOverlay {
  readonly startSeconds: number;
  readonly endSeconds: number;
  readonly position: TimerPosition;
}

export interface AssemblyPlan {
  readonly slides: readonly PlannedSlide[];
  readonly repeatCount: number;
  readonly perSlideSeconds: number;
  readonly sequenceSeconds: number;
  readonly appended?: PlannedAppend;
  readonly audio?: PlannedAudio;
  readonly overlay?: PlannedOverlay;
  readonly omitted: readonly MediaItem[];
  readonly totalSeconds: number;
  readonly frameRate: number;
}

export type PlannerSettings = Pick<
  SettingValues,
  | 'TARGET_VIDEO_DURATION' | 'IMAGE_DURATION' | 'MAX_IMAGE_DURATION' | 'VIDEO_FPS'
  | 'ENABLE_MUSIC' | 'FADE_DURATION' | 'TRAILING_SILENCE'
  | 'ENABLE_TIMER' | 'TIMER_MINUTES' | 'TIMER_POSITION'
>;

export interface PlannerInput {
  /** Everything listed from the image and music sources; videos are ignored. */
  inventory: readonly MediaItem[];
  /** The appended clip with its probed length, when one is configured. */
  appended?: { item: MediaItem; durationSeconds: number };
  settings: PlannerSettings;
  /** Chooses the music track: returns an index below `poolSize`. */
  pickIndex: (poolSize: number) => number;
  /** Named in EmptyInventoryError. */
  imageFolder?: string;
}

export const randomIndex = (poolSize: number): number => Math.floor(Math.random() * poolSize);

interface SlideLayout {
  kept: number;
  repeatCount: number;
  perSlideSeconds: number;
}

/**
 * Smallest repeat count that keeps every slide at or above the floor; with a
 * ceiling, the smallest that also keeps slides at or under it, unless that
 * would break the floor. When even one pass at the floor is too long, the
 * tail of the sequence is dropped instead.
 */
export function layoutSlides(count: number, budget: number, floor: number, ceiling: number): SlideLayout {
  if (count * floor > budget) {
    const kept = Math.max(1, Math.floor(budget / floor));
    return { kept, repeatCount: 1, perSlideSeconds: budget / kept };
  }

  let repeatCount = 1;
  if (ceiling > 0 && budget / count > ceiling) {
    repeatCount = Math.ceil(budget / (count * ceiling));
    if (budget / (count * repeatCount) < floor) {
      repeatCount = Math.max(1, Math.floor(budget / (count * floor)));
    }
  }
  return { kept: count, repeatCount, perSlideSeconds: budget / (count * repeatCount) };
}

export function planAssembly(input: PlannerInput): AssemblyPlan {
  const { settings } = input;
  const target = settings.TARGET_VIDEO_DURATION;
  const floor = settings.IMAGE_DURATION;

  const images = orderMedia(input.inventory.filter((m) => m.kind === 'image'));
  const tracks = orderMedia(input.inventory.filter((m) => m.kind === 'audio'));
  if (images.length === 0) throw new EmptyInventoryError(input.imageFolder ?? '');

  const clip = input.appended;
  const clipSeconds = clip?.durationSeconds ?? 0;

  // Clip alone fills the video: cut it at the target, no slides.
  if (clip && clipSeconds >= target) {
    return freezePlan({
      slides: [],
      repeatCount: 0,
      perSlideSeconds: 0,
      sequenceSeconds: 0,
      appended: { item: clip.item, durationSeconds: clipSeconds, trimSeconds: target },
      omitted: images,
      totalSeconds: target,
      frameRate: settings.VIDEO_FPS,
      overlay: planOverlay(settings, target),
    });
  }

  const budget = target - clipSeconds;
  if (budget < floor) throw new DurationTooShortError(budget, floor);

  const layout = layoutSlides(images.length, budget, floor, settings.MAX_IMAGE_DURATION);
  const slides = images.slice(0, layout.kept).map((item, i) => ({
    item,
    displaySeconds: layout.perSlideSeconds,
    startSeconds: i * layout.perSlideSeconds,
  }));
  const sequenceSeconds = layout.perSlideSeconds * layout.kept * layout.repeatCount;
  const totalSeconds = sequenceSeconds + clipSeconds;

  return freezePlan({
    slides,
    repeatCount: layout.repeatCount,
    perSlideSeconds: layout.perSlideSeconds,
    sequenceSeconds,
    appended: clip ? { item: clip.item, durationSeconds: clipSeconds, trimSeconds: clipSeconds } : undefined,
    audio: planAudio(settings, tracks, sequenceSeconds, input.pickIndex),
    overlay: planOverlay(settings, totalSeconds),
    omitted: images.slice(layout.kept),
    totalSeconds,
    frameRate: settings.VIDEO_FPS,
  });
}

function planAudio(
  settings: PlannerSettings,
  tracks: MediaItem[],
  sequenceSeconds: number,
  pickIndex: (poolSize: number) => number,
): PlannedAudio | undefined {
  if (!settings.ENABLE_MUSIC || tracks.length === 0) return undefined;
  const picked = Math.min(tracks.length - 1, Math.max(0, Math.floor(pickIndex(tracks.length))));
  const item = tracks[picked];
  if (!item) return undefined;

  const endSeconds = Math.max(0, sequenceSeconds - settings.TRAILING_SILENCE);
  const fadeStartSeconds = Math.max(0, endSeconds - settings.FADE_DURATION);
  return {
    item,
    endSeconds,
    fadeStartSeconds,
    fadeSeconds: endSeconds - fadeStartSeconds,
    trailingSilenceSeconds: sequenceSeconds - endSeconds,
  };
}

function planOverlay(settings: PlannerSettings, totalSeconds: number): PlannedOverlay | undefined {
  if (!settings.ENABLE_TIMER) return undefined;
  return {
    startSeconds: Math.max(0, totalSeconds - settings.TIMER_MINUTES * 60),
    endSeconds: totalSeconds,
    position: settings.TIMER_POSITION,
  };
}

function freezePlan(plan: AssemblyPlan): AssemblyPlan {
  return Object.freeze({
    ...plan,
    slides: Object.freeze(plan.slides.map((s) => Object.freeze(s))),
    omitted: Object.freeze([...plan.omitted]),
  });
}
