import * as fs from 'fs';
import * as path from 'path';
import { createHealthMonitor, heartbeatAge } from '../../src/monitoring/health.js';
import { makeTempDir } from '../helpers.js';

describe('HealthMonitor', () => {
  let file: string;
  let clock: Date;

  beforeEach(async () => {
    file = path.join(await makeTempDir(), 'heartbeat');
    clock = new Date('2026-02-01T00:00:00Z');
  });

  function monitor() {
    return createHealthMonitor(file, () => clock);
  }

  it('writes the epoch seconds to the heartbeat file', async () => {
    await monitor().beat();
    expect(await fs.promises.readFile(file, 'utf-8')).toBe('1769904000\n');
  });

  it('is active only while beats are recent', async () => {
    const health = monitor();
    expect(health.heartbeatActive(120)).toBe(false);

    await health.beat();
    clock = new Date('2026-02-01T00:02:00Z');
    expect(health.heartbeatActive(120)).toBe(true);

    clock = new Date('2026-02-01T00:02:01Z');
    expect(health.heartbeatActive(120)).toBe(false);
  });

  it('stays inactive when the file cannot be written', async () => {
    const health = createHealthMonitor(path.join(file, 'missing', 'heartbeat'), () => clock);
    await health.beat();
    expect(health.heartbeatActive(60)).toBe(false);
  });

  it('tracks uptime and the last success', () => {
    const health = monitor();
    clock = new Date('2026-02-01T01:05:30Z');
    health.recordSuccess();

    expect(health.uptimeSeconds()).toBe(3_930);
    expect(health.lastSuccessAt()).toEqual(new Date('2026-02-01T01:05:30Z'));
  });
});

describe('heartbeatAge', () => {
  it('is null for a missing file', async () => {
    expect(await heartbeatAge(path.join(await makeTempDir(), 'none'))).toBeNull();
  });

  it('measures from the file modification time', async () => {
    const file = path.join(await makeTempDir(), 'heartbeat');
    await fs.promises.writeFile(file, '1\n');
    const modified = new Date('2026-02-01T00:00:00Z');
    await fs.promises.utimes(file, modified, modified);

    expect(await heartbeatAge(file, new Date('2026-02-01T00:01:30Z'))).toBe(90);
  });
});
