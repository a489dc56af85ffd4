import * as fs from 'fs';
import { logger } from '../utils/logger.js';

/**
 * Process liveness: the heartbeat file a supervisor probes, plus the uptime
 * and last-success facts shown by !status.
 */
export interface HealthMonitor {
  readonly startedAt: Date;
  /** Rewrite the heartbeat file with the current epoch seconds. */
  beat(): Promise<void>;
  /** True when a beat landed within `withinSeconds`. */
  heartbeatActive(withinSeconds: number): boolean;
  recordSuccess(at?: Date): void;
  lastSuccessAt(): Date | null;
  uptimeSeconds(): number;
}

export function createHealthMonitor(heartbeatFile: string, now: () => Date = () => new Date()): HealthMonitor {
  const startedAt = now();
  let lastBeatAt: Date | null = null;
  let lastSuccess: Date | null = null;

  return {
    startedAt,

    async beat() {
      const at = now();
      try {
        await fs.promises.writeFile(heartbeatFile, `${Math.floor(at.getTime() / 1000)}\n`, 'utf-8');
        lastBeatAt = at;
      } catch (err) {
        logger.warn('Health: heartbeat write failed', { file: heartbeatFile, error: err });
      }
    },

    heartbeatActive(withinSeconds) {
      if (!lastBeatAt) return false;
      return now().getTime() - lastBeatAt.getTime() <= withinSeconds * 1000;
    },

    recordSuccess(at = now()) {
      lastSuccess = at;
    },

    lastSuccessAt: () => lastSuccess,

    uptimeSeconds: () => Math.floor((now().getTime() - startedAt.getTime()) / 1000),
  };
}

/** Age of a heartbeat file in seconds, or null when it is missing. */
export async function heartbeatAge(file: string, now: Date = new Date()): Promise<number | null> {
  try {
    const stat = await fs.promises.stat(file);
    return Math.max(0, Math.floor((now.getTime() - stat.mtime.getTime()) / 1000));
  } catch {
    return null;
  }
}
