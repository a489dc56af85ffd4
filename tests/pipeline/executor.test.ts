import * as fs from 'fs';
import * as path from 'path';
import type { Mock } from 'vitest';
import type { Compositor, RenderJob } from '../../src/media/compositor.js';
import type { MediaProbe } from '../../src/media/ffmpeg.js';
import type { BuildNotifications } from '../../src/monitoring/notifier.js';
import { BuildExecutor } from '../../src/pipeline/executor.js';
import { ProgressTracker, type BuildStage, type ProgressReporter } from '../../src/pipeline/progress.js';
import type { BuildRecord } from '../../src/pipeline/types.js';
import type { MediaSource, SettingKey } from '../../src/settings/keys.js';
import { EmptyInventoryError, ResourceNotFoundError, ValidationError } from '../../src/utils/errors.js';
import { MemoryStore, configOf, makeTempDir, settingsWith } from '../helpers.js';

class FakeCompositor implements Compositor {
  readonly jobs: RenderJob[] = [];

  async render(job: RenderJob, onProgress: (fraction: number) => void): Promise<void> {
    this.jobs.push(job);
    onProgress(0.5);
    await fs.promises.writeFile(job.outputPath, 'rendered-video', 'utf-8');
    onProgress(1);
  }
}

function fakeNotifier() {
  return {
    started: vi.fn<BuildNotifications['started']>(async () => undefined),
    stage: vi.fn<BuildNotifications['stage']>(async () => undefined),
    succeeded: vi.fn<BuildNotifications['succeeded']>(async () => undefined),
    failed: vi.fn<BuildNotifications['failed']>(async () => undefined),
  };
}

class StageLog implements ProgressReporter {
  readonly stages: BuildStage[] = [];
  readonly fractions: number[] = [];
  enter(stage: BuildStage): void { this.stages.push(stage); }
  update(fraction: number): void { this.fractions.push(fraction); }
}

const record: BuildRecord = {
  id: 'build-0001',
  trigger: 'manual',
  requestedBy: '@alice:example.org',
  startedAt: new Date('2026-01-02T03:04:05Z'),
  stage: 'Validating',
  includedSlides: [],
};

describe('BuildExecutor', () => {
  let tempRoot: string;
  let local: MemoryStore;
  let cloud: MemoryStore;
  let compositor: FakeCompositor;
  let notifier: ReturnType<typeof fakeNotifier>;
  let probe: Mock<(file: string) => Promise<MediaProbe>>;

  beforeEach(async () => {
    tempRoot = await makeTempDir();
    local = new MemoryStore('local', {
      'images/1.jpg': 'one',
      'images/2.jpg': 'two',
      'images/10.jpg': 'ten',
      'images/readme.txt': 'not an image',
      'music/song.mp3': 'tune',
      'music/song.md': 'Song by Someone (CC-BY)\n',
      'clips/outro.mp4': 'outro',
    }, ['out']);
    cloud = new MemoryStore('nextcloud', {}, ['Videos']);
    compositor = new FakeCompositor();
    notifier = fakeNotifier();
    probe = vi.fn(async () => ({ durationSeconds: 15, hasAudio: false }));
  });

  afterEach(async () => {
    await fs.promises.rm(tempRoot, { recursive: true, force: true });
  });

  function executor() {
    const stores = new Map<MediaSource, MemoryStore>([['local', local], ['nextcloud', cloud]]);
    return new BuildExecutor({
      stores: {
        get: (source) => {
          const store = stores.get(source);
          if (!store) throw new Error(`no store ${source}`);
          return store;
        },
      },
      compositor,
      notifier,
      probe,
      tempRoot,
      pickIndex: () => 0,
    });
  }

  function config(overrides: Partial<Record<SettingKey, string>>) {
    return configOf(settingsWith({
      TARGET_VIDEO_DURATION: '60',
      IMAGE_DURATION: '5',
      OUTPUT_FILEPATH: 'out/slideshow.mp4',
      ...overrides,
    }));
  }

  it('builds, delivers and reports a slideshow', async () => {
    const progress = new StageLog();
    const output = await executor().execute(record, config({}), progress);

    expect(progress.stages).toEqual(['Validating', 'Fetching', 'Assembling', 'Encoding', 'Uploading', 'Notifying']);
    expect(output).toEqual({
      videoName: 'slideshow.mp4',
      destinations: ['local:out/slideshow.mp4'],
      durationSeconds: 60,
      includedSlides: ['1.jpg', '2.jpg', '10.jpg'],
      omittedSlides: [],
      music: { name: 'song.mp3', attribution: 'Song by Someone (CC-BY)' },
    });

    expect(compositor.jobs).toHaveLength(1);
    const job = compositor.jobs[0];
    expect(job?.slides.map((s) => [path.basename(s.file), s.seconds])).toEqual([
      ['0000.jpg', 20],
      ['0001.jpg', 20],
      ['0002.jpg', 20],
    ]);
    expect(job?.audio).toMatchObject({ endSeconds: 55, fadeStartSeconds: 45, fadeSeconds: 10 });
    expect(job?.appended).toBeUndefined();

    expect(local.uploads.get('out/slideshow.mp4')).toBe('rendered-video');
    expect(notifier.succeeded).toHaveBeenCalledWith(record, output, expect.objectContaining({ ENABLE_NTFY: true }));
    expect(notifier.failed).not.toHaveBeenCalled();
  });

  it('announces the start and each working stage', async () => {
    await executor().execute(record, config({}), new StageLog());

    expect(notifier.started).toHaveBeenCalledTimes(1);
    expect(notifier.started).toHaveBeenCalledWith(record, expect.objectContaining({ ENABLE_NTFY: true }));
    expect(notifier.stage.mock.calls.map(([, stage, detail]) => [stage, detail])).toEqual([
      ['Fetching', 'downloading media'],
      ['Assembling', 'preparing render'],
      ['Encoding', '3 slides × 1'],
      ['Uploading', ''],
    ]);
  });

  it('keeps building when a status update cannot be sent', async () => {
    notifier.started.mockRejectedValue(new Error('ntfy down'));
    notifier.stage.mockRejectedValue(new Error('chat down'));
    const output = await executor().execute(record, config({}), new StageLog());
    expect(output.destinations).toEqual(['local:out/slideshow.mp4']);
  });

  it('returns the output when the success notice cannot be sent', async () => {
    notifier.succeeded.mockRejectedValue(new Error('chat down'));
    const output = await executor().execute(record, config({}), new StageLog());
    expect(output.videoName).toBe('slideshow.mp4');
    expect(notifier.failed).not.toHaveBeenCalled();
  });

  it('rethrows the build error when the failure notice cannot be sent', async () => {
    notifier.failed.mockRejectedValue(new Error('chat down'));
    const run = executor().execute(record, config({ OUTPUT_FILEPATH: 'missing/slideshow.mp4' }), new StageLog());
    await expect(run).rejects.toBeInstanceOf(ResourceNotFoundError);
    await expect(run).rejects.toMatchObject({ missing: ['local:missing'] });
    expect(notifier.failed).toHaveBeenCalledTimes(1);
  });

  it('removes the build directory afterwards', async () => {
    await executor().execute(record, config({}), new StageLog());
    expect(fs.existsSync(path.join(tempRoot, record.id))).toBe(false);
  });

  it('probes the appended clip and shortens the slides to fit it', async () => {
    const output = await executor().execute(record, config({ APPEND_VIDEO_PATH: 'clips/outro.mp4' }), new StageLog());

    expect(probe).toHaveBeenCalledTimes(1);
    const job = compositor.jobs[0];
    expect(job?.appended).toMatchObject({ trimSeconds: 15, hasAudio: false });
    expect(job?.slides.map((s) => s.seconds)).toEqual([15, 15, 15]);
    expect(output.durationSeconds).toBe(60);
  });

  it('uploads to Nextcloud when an upload path is set', async () => {
    const output = await executor().execute(
      record,
      config({ OUTPUT_FILEPATH: '', NEXTCLOUD_UPLOAD_PATH: 'Videos/weekly.mp4' }),
      new StageLog(),
    );
    expect(output.videoName).toBe('weekly.mp4');
    expect(output.destinations).toEqual(['nextcloud:Videos/weekly.mp4']);
    expect(cloud.uploads.get('Videos/weekly.mp4')).toBe('rendered-video');
  });

  it('aborts before encoding when the upload destination is missing', async () => {
    const run = executor().execute(
      record,
      config({ OUTPUT_FILEPATH: '', NEXTCLOUD_UPLOAD_PATH: 'Archive/weekly.mp4' }),
      new StageLog(),
    );
    await expect(run).rejects.toEqual(new ResourceNotFoundError(['nextcloud:Archive']));
    expect(compositor.jobs).toHaveLength(0);
    expect(local.fetched).toEqual([]);
    expect(notifier.failed).toHaveBeenCalledWith(record, 'Validating', 'Missing resources: nextcloud:Archive', expect.anything());
  });

  it('reports every missing input at once', async () => {
    const run = executor().execute(
      record,
      config({ IMAGE_FOLDER: 'photos/', APPEND_VIDEO_PATH: 'clips/intro.mp4', OUTPUT_FILEPATH: 'nowhere/out.mp4' }),
      new StageLog(),
    );
    await expect(run).rejects.toMatchObject({
      missing: ['local:photos/', 'local:clips/intro.mp4', 'local:nowhere'],
    });
    expect(compositor.jobs).toHaveLength(0);
  });

  it('requires an output destination', async () => {
    await expect(executor().execute(record, config({ OUTPUT_FILEPATH: '' }), new StageLog()))
      .rejects.toBeInstanceOf(ValidationError);
  });

  it('fails on a folder without images', async () => {
    local.addDir('empty');
    await expect(executor().execute(record, config({ IMAGE_FOLDER: 'empty' }), new StageLog()))
      .rejects.toEqual(new EmptyInventoryError('empty'));
  });

  it('skips music when disabled', async () => {
    const output = await executor().execute(record, config({ ENABLE_MUSIC: 'false' }), new StageLog());
    expect(output.music).toBeUndefined();
    expect(compositor.jobs[0]?.audio).toBeUndefined();
    expect(local.fetched).not.toContain('music/song.mp3');
  });

  it('reports encoder progress through the tracker', async () => {
    const tracker = new ProgressTracker();
    tracker.begin();
    const updates: number[] = [];
    const spy: ProgressReporter = {
      enter: (stage, detail) => tracker.enter(stage, detail),
      update: (fraction, detail) => {
        if (tracker.snapshot()?.stage === 'Encoding') updates.push(fraction);
        tracker.update(fraction, detail);
      },
    };
    await executor().execute(record, config({}), spy);
    expect(updates).toEqual([0.5, 1]);
    expect(tracker.snapshot()?.stage).toBe('Notifying');
  });
});
