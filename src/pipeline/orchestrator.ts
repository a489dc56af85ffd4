/**
 * Single-flight build scheduler.
 *
 * The state is `idle` or `running(build)`. A trigger that arrives while a
 * build runs is rejected with the active record rather than queued. The
 * check-and-set in submit() has no await in it, which makes it atomic on
 * the event loop.
 */
import { randomUUID } from 'crypto';
import cron from 'node-cron';
import type { HealthMonitor } from '../monitoring/health.js';
import type { BuildNotifications } from '../monitoring/notifier.js';
import { SETTING_INFO } from '../settings/keys.js';
import type { ConfigResolver, EffectiveConfig } from '../settings/resolver.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { ProgressTracker, type ProgressReporter, type ProgressState } from './progress.js';
import type { BuildOutput, BuildRecord, BuildTrigger } from './types.js';

export interface BuildRunner {
  execute(record: BuildRecord, config: EffectiveConfig, progress: ProgressReporter): Promise<BuildOutput>;
}

export type SubmitResult =
  | { accepted: true; build: BuildRecord }
  | { accepted: false; reason: 'AlreadyRunning'; active: BuildRecord };

type State = { status: 'idle' } | { status: 'running'; build: BuildRecord };

export interface OrchestratorStatus {
  status: State['status'];
  build?: BuildRecord;
  progress: ProgressState | null;
  lastBuild: BuildRecord | null;
}

// ── Scheduling seam ───────────────────────────────────────────────────────────

export interface ScheduledJob {
  stop(): void | Promise<void>;
  getNextRun(): Date | null;
}

export type Scheduler = (expression: string, onTick: () => void, timezone?: string) => ScheduledJob;

export const cronScheduler: Scheduler = (expression, onTick, timezone) =>
  cron.schedule(expression, () => onTick(), { timezone });

export interface OrchestratorOptions {
  resolver: ConfigResolver;
  executor: BuildRunner;
  health: HealthMonitor;
  /** Told about builds that fail before the executor takes over. */
  notifier?: Pick<BuildNotifications, 'failed'>;
  heartbeatIntervalSeconds: number;
  timezone?: string;
  scheduler?: Scheduler;
  progress?: ProgressTracker;
  now?: () => Date;
  newId?: () => string;
}

export class Orchestrator {
  private state: State = { status: 'idle' };
  private last: BuildRecord | null = null;
  private running: Promise<void> = Promise.resolve();
  private readonly progress: ProgressTracker;
  private readonly now: () => Date;
  private readonly newId: () => string;
  private readonly scheduler: Scheduler;

  private job: ScheduledJob | null = null;
  private armedExpression: string | null = null;
  private heartbeatTimer: NodeJS.Timeout | null = null;

  constructor(private readonly opts: OrchestratorOptions) {
    this.progress = opts.progress ?? new ProgressTracker();
    this.now = opts.now ?? (() => new Date());
    this.newId = opts.newId ?? randomUUID;
    this.scheduler = opts.scheduler ?? cronScheduler;
  }

  // ── Builds ──────────────────────────────────────────────────────────────────

  submit(trigger: BuildTrigger, requestedBy?: string): SubmitResult {
    if (this.state.status === 'running') {
      logger.info('Orchestrator: trigger rejected, build already running', { trigger, requestedBy });
      return { accepted: false, reason: 'AlreadyRunning', active: this.withLiveStage(this.state.build) };
    }

    const build: BuildRecord = Object.freeze({
      id: this.newId(),
      trigger,
      requestedBy,
      startedAt: this.now(),
      stage: 'Validating',
      includedSlides: [],
    });
    this.progress.begin();
    this.state = { status: 'running', build };
    logger.info('Orchestrator: build started', { buildId: build.id, trigger, requestedBy });
    this.running = this.run(build);
    return { accepted: true, build };
  }

  /** Resolves once the current build (if any) has finished. Never rejects. */
  whenIdle(): Promise<void> {
    return this.running;
  }

  get lastBuild(): BuildRecord | null {
    return this.last;
  }

  /** The running build with its latest stage, or null when idle. */
  activeBuild(): BuildRecord | null {
    return this.state.status === 'running' ? this.withLiveStage(this.state.build) : null;
  }

  status(): OrchestratorStatus {
    const build = this.activeBuild() ?? undefined;
    return {
      status: this.state.status,
      build,
      progress: build ? this.progress.snapshot() : null,
      lastBuild: this.last,
    };
  }

  private withLiveStage(build: BuildRecord): BuildRecord {
    const stage = this.progress.snapshot()?.stage;
    return stage && stage !== build.stage ? Object.freeze({ ...build, stage }) : build;
  }

  private async run(build: BuildRecord): Promise<void> {
    let finished: BuildRecord;
    let handedOver = false;
    try {
      const config = this.opts.resolver.resolveAll();
      handedOver = true;
      const output = await this.opts.executor.execute(build, config, this.progress);
      const endedAt = this.now();
      finished = {
        ...this.withLiveStage(build),
        endedAt,
        outcome: { status: 'success', output },
        includedSlides: output.includedSlides,
      };
      this.opts.health.recordSuccess(endedAt);
      logger.info('Orchestrator: build succeeded', { buildId: build.id, output: output.videoName });
    } catch (err) {
      const current = this.withLiveStage(build);
      const reason = errorMessage(err);
      finished = {
        ...current,
        endedAt: this.now(),
        outcome: { status: 'failure', stage: current.stage, reason },
      };
      logger.error('Orchestrator: build failed', { buildId: build.id, stage: current.stage, error: err });
      if (!handedOver) await this.reportEarlyFailure(current, reason);
    }
    this.last = Object.freeze(finished);
    this.progress.clear();
    this.state = { status: 'idle' };
  }

  /** Settings could not be read, so ntfy is left out and only chat hears of it. */
  private async reportEarlyFailure(build: BuildRecord, reason: string): Promise<void> {
    if (!this.opts.notifier) return;
    try {
      await this.opts.notifier.failed(build, build.stage, reason, { ENABLE_NTFY: false, NTFY_TOPIC: '' });
    } catch (err) {
      logger.warn('Orchestrator: failure notification failed', { buildId: build.id, error: err });
    }
  }

  // ── Schedule ────────────────────────────────────────────────────────────────

  /** Arm the cron trigger and start the liveness pulse. */
  start(): void {
    this.reschedule();
    void this.pulse();
    this.heartbeatTimer = setInterval(() => void this.pulse(), this.opts.heartbeatIntervalSeconds * 1000);
  }

  /**
   * Re-arm the cron trigger from the current CRON_SCHEDULE. A no-op when the
   * expression has not changed.
   */
  reschedule(): void {
    let expression = this.opts.resolver.resolve('CRON_SCHEDULE').value;
    if (expression === this.armedExpression && this.job) return;

    let job: ScheduledJob;
    try {
      job = this.scheduler(expression, () => this.onTick(), this.opts.timezone);
    } catch (err) {
      const fallback = SETTING_INFO.CRON_SCHEDULE.defaultValue;
      logger.warn('Orchestrator: cannot schedule expression, using default', { expression, fallback, error: err });
      expression = fallback;
      job = this.scheduler(expression, () => this.onTick(), this.opts.timezone);
    }

    void this.job?.stop();
    this.job = job;
    this.armedExpression = expression;
    logger.info('Orchestrator: schedule armed', { expression, next: this.nextScheduledRun()?.toISOString() });
  }

  nextScheduledRun(): Date | null {
    return this.job?.getNextRun() ?? null;
  }

  heartbeatActive(): boolean {
    return this.heartbeatTimer !== null && this.opts.health.heartbeatActive(this.opts.heartbeatIntervalSeconds * 2);
  }

  async stop(): Promise<void> {
    if (this.heartbeatTimer) clearInterval(this.heartbeatTimer);
    this.heartbeatTimer = null;
    await this.job?.stop();
    this.job = null;
    this.armedExpression = null;
  }

  private onTick(): void {
    const result = this.submit('scheduled');
    if (!result.accepted) {
      logger.warn('Orchestrator: scheduled build skipped, previous build still running', { active: result.active.id });
    }
  }

  private async pulse(): Promise<void> {
    try {
      if (!this.opts.resolver.resolve('ENABLE_HEARTBEAT').value) return;
      await this.opts.health.beat();
    } catch (err) {
      logger.warn('Orchestrator: heartbeat skipped', { error: err });
    }
  }
}
