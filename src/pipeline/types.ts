import type { BuildStage } from './progress.js';

export type BuildTrigger = 'scheduled' | 'manual';

export interface BuildOutput {
  videoName: string;
  /** Where the file was delivered, e.g. `local:/srv/out.mp4`. */
  destinations: string[];
  durationSeconds: number;
  includedSlides: string[];
  omittedSlides: string[];
  music?: { name: string; attribution?: string };
}

export type BuildOutcome =
  | { status: 'success'; output: BuildOutput }
  | { status: 'failure'; stage: BuildStage; reason: string };

export interface BuildRecord {
  readonly id: string;
  readonly trigger: BuildTrigger;
  readonly requestedBy?: string;
  readonly startedAt: Date;
  /** Latest stage reached. */
  readonly stage: BuildStage;
  readonly endedAt?: Date;
  readonly outcome?: BuildOutcome;
  readonly includedSlides: readonly string[];
}
