import {
  buildConcatList,
  buildRenderArgs,
  countdownFilter,
  parseProgressLine,
  sec,
  type RenderJob,
} from '../../src/media/compositor.js';

function job(overrides: Partial<RenderJob> = {}): RenderJob {
  return {
    slides: [
      { file: '/work/slides/0000.jpg', seconds: 5 },
      { file: '/work/slides/0001.jpg', seconds: 5 },
    ],
    repeatCount: 1,
    sequenceSeconds: 10,
    totalSeconds: 10,
    frameRate: 5,
    concatListPath: '/work/slides.ffconcat',
    outputPath: '/work/out.mp4',
    ...overrides,
  };
}

function filterOf(args: string[]): string {
  const i = args.indexOf('-filter_complex');
  return args[i + 1] ?? '';
}

describe('sec', () => {
  it('keeps at most millisecond precision', () => {
    expect(sec(30)).toBe('30');
    expect(sec(100 / 3)).toBe('33.333');
    expect(sec(12.5)).toBe('12.5');
  });
});

describe('buildConcatList', () => {
  it('expands repeats and lists the last file twice', () => {
    const list = buildConcatList(job({
      slides: [{ file: '/t/a.jpg', seconds: 2.5 }, { file: '/t/b.jpg', seconds: 2.5 }],
      repeatCount: 2,
    }));
    expect(list).toBe([
      'ffconcat version 1.0',
      "file '/t/a.jpg'", 'duration 2.5',
      "file '/t/b.jpg'", 'duration 2.5',
      "file '/t/a.jpg'", 'duration 2.5',
      "file '/t/b.jpg'", 'duration 2.5',
      "file '/t/b.jpg'",
      '',
    ].join('\n'));
  });

  it('escapes single quotes in paths', () => {
    const list = buildConcatList(job({ slides: [{ file: "/t/it's.jpg", seconds: 1 }] }));
    expect(list.split('\n')[1]).toBe("file '/t/it'\\''s.jpg'");
  });
});

describe('buildRenderArgs', () => {
  it('renders slides over silence when there is no music', () => {
    const args = buildRenderArgs(job());
    expect(args.slice(0, 6)).toEqual(['-f', 'concat', '-safe', '0', '-i', '/work/slides.ffconcat']);
    expect(args[args.length - 1]).toBe('/work/out.mp4');
    expect(args.slice(args.indexOf('-t'), args.indexOf('-t') + 2)).toEqual(['-t', '10']);
    expect(args).toContain('pipe:1');

    const filter = filterOf(args).split(';');
    expect(filter[0]).toBe(
      '[0:v]scale=1920:1080:force_original_aspect_ratio=decrease,pad=1920:1080:(ow-iw)/2:(oh-ih)/2:color=black,' +
      'setsar=1,fps=5,format=yuv420p,trim=duration=10,setpts=PTS-STARTPTS[sv]',
    );
    expect(filter[1]).toBe('anullsrc=r=44100:cl=stereo,atrim=duration=10,aresample=44100,aformat=sample_fmts=fltp:channel_layouts=stereo[sa]');
    expect(filter[2]).toBe('[sv][sa]concat=n=1:v=1:a=1[vout][aout]');
  });

  it('loops and fades music, appends the clip and draws the countdown', () => {
    const args = buildRenderArgs(job({
      sequenceSeconds: 60,
      totalSeconds: 70,
      audio: { file: '/work/music.mp3', endSeconds: 55, fadeStartSeconds: 45, fadeSeconds: 10 },
      appended: { file: '/work/append.mp4', trimSeconds: 10, hasAudio: true },
      overlay: { startSeconds: 0, endSeconds: 70, position: 'top-middle' },
    }));

    expect(args.slice(6, 10)).toEqual(['-stream_loop', '-1', '-i', '/work/music.mp3']);
    expect(args.slice(10, 12)).toEqual(['-i', '/work/append.mp4']);

    const filter = filterOf(args).split(';');
    expect(filter[1]).toBe(
      '[1:a]atrim=0:55,asetpts=PTS-STARTPTS,afade=t=out:st=45:d=10,apad=whole_dur=60,' +
      'aresample=44100,aformat=sample_fmts=fltp:channel_layouts=stereo[sa]',
    );
    expect(filter[2]).toMatch(/^\[2:v\]scale=.*trim=duration=10,setpts=PTS-STARTPTS\[cv\]$/);
    expect(filter[3]).toMatch(/^\[2:a\]atrim=duration=10,/);
    expect(filter[4]).toBe('[sv][sa][cv][ca]concat=n=2:v=1:a=1[vjoin][aout]');
    expect(filter[5]).toMatch(/^\[vjoin\]drawtext=.*\[vout\]$/);
  });

  it('renders a lone appended clip', () => {
    const args = buildRenderArgs(job({
      slides: [],
      repeatCount: 0,
      sequenceSeconds: 0,
      appended: { file: '/work/append.mp4', trimSeconds: 600, hasAudio: false },
      totalSeconds: 600,
    }));
    expect(args.slice(0, 2)).toEqual(['-i', '/work/append.mp4']);
    const filter = filterOf(args).split(';');
    expect(filter[0]).toMatch(/^\[0:v\]/);
    expect(filter[1]).toBe('anullsrc=r=44100:cl=stereo,atrim=duration=600,aresample=44100,aformat=sample_fmts=fltp:channel_layouts=stereo[ca]');
    expect(filter[2]).toBe('[cv][ca]concat=n=1:v=1:a=1[vout][aout]');
  });

  it('refuses an empty job', () => {
    expect(() => buildRenderArgs(job({ slides: [] }))).toThrow('nothing to render');
  });
});

describe('countdownFilter', () => {
  it('draws mm:ss remaining at the requested position', () => {
    expect(countdownFilter({ startSeconds: 300, endSeconds: 600, position: 'top-middle' }, 600)).toBe(
      String.raw`drawtext=text='%{eif\:trunc((600-t)/60)\:d\:2}\:%{eif\:mod(trunc(600-t)\,60)\:d\:2}'` +
      ':fontsize=72:fontcolor=white:box=1:boxcolor=black@0.5:boxborderw=16' +
      ":x=(w-text_w)/2:y=40:enable='between(t,300,600)'",
    );
  });

  it('anchors bottom-right corners to the frame edge', () => {
    const filter = countdownFilter({ startSeconds: 0, endSeconds: 60, position: 'bottom-right' }, 60, '/fonts/Mono.ttf');
    expect(filter).toContain(":fontfile='/fonts/Mono.ttf':");
    expect(filter).toContain(':x=w-text_w-40:y=h-text_h-40:');
  });
});

describe('parseProgressLine', () => {
  it('turns out_time into a fraction of the total', () => {
    expect(parseProgressLine('out_time_us=5000000', 10)).toBe(0.5);
    expect(parseProgressLine('out_time_ms=20000000', 10)).toBe(1);
    expect(parseProgressLine('progress=end', 10)).toBe(1);
  });

  it('ignores other keys and junk', () => {
    expect(parseProgressLine('frame=42', 10)).toBeUndefined();
    expect(parseProgressLine('progress=continue', 10)).toBeUndefined();
    expect(parseProgressLine('out_time_us=N/A', 10)).toBeUndefined();
  });
});
