export const BUILD_STAGES = [
  'Validating',
  'Fetching',
  'Assembling',
  'Encoding',
  'Uploading',
  'Notifying',
] as const;

export type BuildStage = (typeof BUILD_STAGES)[number];

export interface ProgressState {
  readonly stage: BuildStage;
  /** Increments on every stage change within a build. */
  readonly stageIndex: number;
  /** 0..1 within the current stage. */
  readonly fraction: number;
  readonly detail: string;
  readonly updatedAt: Date;
}

/** Write side, handed to the executor. */
export interface ProgressReporter {
  enter(stage: BuildStage, detail?: string): void;
  update(fraction: number, detail?: string): void;
}

const clamp01 = (n: number) => (Number.isFinite(n) ? Math.min(1, Math.max(0, n)) : 0);

/**
 * Holds the progress of the running build. Every write swaps in a new frozen
 * object, so a snapshot handed to a reader never changes under it.
 */
export class ProgressTracker implements ProgressReporter {
  private state: ProgressState | null = null;

  constructor(private readonly now: () => Date = () => new Date()) {}

  snapshot(): ProgressState | null {
    return this.state;
  }

  /** Start tracking a new build. */
  begin(): void {
    this.state = Object.freeze({
      stage: BUILD_STAGES[0],
      stageIndex: 0,
      fraction: 0,
      detail: '',
      updatedAt: this.now(),
    });
  }

  clear(): void {
    this.state = null;
  }

  enter(stage: BuildStage, detail = ''): void {
    const previous = this.state;
    this.state = Object.freeze({
      stage,
      stageIndex: previous ? previous.stageIndex + (previous.stage === stage ? 0 : 1) : 0,
      fraction: 0,
      detail,
      updatedAt: this.now(),
    });
  }

  update(fraction: number, detail?: string): void {
    const current = this.state;
    if (!current) return;
    this.state = Object.freeze({
      ...current,
      fraction: Math.max(current.fraction, clamp01(fraction)),
      detail: detail ?? current.detail,
      updatedAt: this.now(),
    });
  }
}

export function progressBar(fraction: number, width = 20): string {
  const filled = Math.round(clamp01(fraction) * width);
  return `[${'#'.repeat(filled)}${'-'.repeat(width - filled)}] ${Math.round(clamp01(fraction) * 100)}%`;
}
