#!/usr/bin/env node
/**
 * Slideshow builder: entry point.
 *
 * `server` (default) arms the cron schedule and heartbeat and, when Matrix is
 * configured, listens for chat commands. `run` performs one build and exits
 * with its outcome.
 */
import { env } from './config.js';
import { closeDb, getDb } from './db/client.js';
import { OverrideStore } from './db/overrides.js';
import { CommandDispatcher } from './commands/dispatcher.js';
import { formatTime } from './commands/format.js';
import { FfmpegCompositor } from './media/compositor.js';
import { probeMedia } from './media/ffmpeg.js';
import { createHealthMonitor } from './monitoring/health.js';
import { MatrixClient } from './monitoring/matrix.js';
import { createNotifier } from './monitoring/notifier.js';
import { BuildExecutor } from './pipeline/executor.js';
import { Orchestrator } from './pipeline/orchestrator.js';
import { ConfigResolver } from './settings/resolver.js';
import { storesFromEnv } from './storage/index.js';
import { logger } from './utils/logger.js';
import { VERSION } from './version.js';

// ── Wiring ────────────────────────────────────────────────────────────────────

function createServices() {
  const resolver = new ConfigResolver(new OverrideStore(getDb()));
  const stores = storesFromEnv(env);
  const matrix = env.MATRIX_HOMESERVER && env.MATRIX_ACCESS_TOKEN && env.MATRIX_ROOM_ID
    ? new MatrixClient({
        homeserver: env.MATRIX_HOMESERVER,
        accessToken: env.MATRIX_ACCESS_TOKEN,
        roomId: env.MATRIX_ROOM_ID,
      })
    : undefined;
  const notifier = createNotifier(matrix, { url: env.NTFY_URL, token: env.NTFY_TOKEN });
  const health = createHealthMonitor(env.HEARTBEAT_FILE);
  const executor = new BuildExecutor({
    stores,
    compositor: new FfmpegCompositor(),
    notifier,
    probe: probeMedia,
    tempRoot: env.TEMP_DIR,
    fontFile: env.TIMER_FONT_FILE,
  });
  const orchestrator = new Orchestrator({
    resolver,
    executor,
    health,
    notifier,
    heartbeatIntervalSeconds: env.HEARTBEAT_INTERVAL_SECONDS,
    timezone: env.CRON_TIMEZONE,
  });
  return { resolver, stores, matrix, notifier, health, orchestrator };
}

// ── Modes ─────────────────────────────────────────────────────────────────────

async function runOnce(): Promise<number> {
  const { orchestrator } = createServices();
  const result = orchestrator.submit('manual', 'cli');
  if (!result.accepted) return 1;
  await orchestrator.whenIdle();
  const outcome = orchestrator.lastBuild?.outcome;
  if (outcome?.status === 'success') {
    logger.info('Build finished', { destinations: outcome.output.destinations });
    return 0;
  }
  logger.error('Build failed', { stage: outcome?.stage, reason: outcome?.reason });
  return 1;
}

async function serve(): Promise<void> {
  const services = createServices();
  const { orchestrator, matrix } = services;
  const abort = new AbortController();

  orchestrator.start();

  let listening: Promise<void> = Promise.resolve();
  if (matrix) {
    let botUserId = env.MATRIX_USER_ID;
    try {
      botUserId = await matrix.whoami();
      await matrix.join();
    } catch (err) {
      logger.warn('Matrix: startup checks failed, continuing', { error: err });
    }
    if (env.MATRIX_ALLOWED_USERS.length === 0) {
      logger.warn('Matrix: MATRIX_ALLOWED_USERS is empty; every command will be ignored');
    }
    const dispatcher = new CommandDispatcher({
      control: orchestrator,
      resolver: services.resolver,
      chat: matrix,
      health: services.health,
      storage: services.stores,
      roomId: matrix.roomId,
      allowedUsers: env.MATRIX_ALLOWED_USERS,
      botUserId,
    });
    listening = matrix.listen((msg) => dispatcher.handle(msg), abort.signal);
    await services.notifier.announce({
      text: `🟢 Slideshow builder v${VERSION} started. Next scheduled run: ${formatTime(orchestrator.nextScheduledRun())}`,
    });
  } else {
    logger.info('Matrix not configured; running scheduler only');
  }

  const shutdown = async (signal: string) => {
    logger.info('Shutting down', { signal });
    abort.abort();
    await orchestrator.stop();
    await listening;
    const active = orchestrator.activeBuild();
    if (active) {
      logger.info('Waiting for the running build to finish', { buildId: active.id, stage: active.stage });
      await orchestrator.whenIdle();
    }
    closeDb();
    process.exit(0);
  };
  process.once('SIGINT', () => void shutdown('SIGINT'));
  process.once('SIGTERM', () => void shutdown('SIGTERM'));

  logger.info('Slideshow builder: server mode running', { version: VERSION });
}

// ── CLI entrypoint ────────────────────────────────────────────────────────────

const [,, command] = process.argv;

async function main(): Promise<void> {
  logger.info('Slideshow builder: starting', { command: command ?? 'server', version: VERSION });

  switch (command) {
    case 'run':
      process.exitCode = await runOnce();
      closeDb();
      break;

    case undefined:
    case 'server':
      await serve();
      break;

    default:
      logger.error(`Unknown command "${command}" (expected "server" or "run")`);
      process.exitCode = 1;
  }
}

main().catch((err) => {
  logger.error('Fatal startup error', { error: err });
  process.exit(1);
});
