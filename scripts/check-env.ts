#!/usr/bin/env tsx
/**
 * Pre-flight check for the slideshow builder.
 * Validates the process environment, the ffmpeg toolchain, the settings DB
 * and the configured media folders, and pings Nextcloud and Matrix.
 * Run: npm run check-env
 *
 * Exit codes:
 *   0: all required checks pass
 *   1: one or more required checks failed
 */
import type { Env } from '../src/config.js';

// ── ANSI color helpers ────────────────────────────────────────────────────────

const GREEN  = '\x1b[32m';
const RED    = '\x1b[31m';
const YELLOW = '\x1b[33m';
const BOLD   = '\x1b[1m';
const RESET  = '\x1b[0m';

const pass = (label: string, detail = '') =>
  console.log(`  ${GREEN}✓${RESET} ${label}${detail ? `  ${YELLOW}${detail}${RESET}` : ''}`);

const fail = (label: string, hint = '') => {
  console.error(`  ${RED}✗${RESET} ${label}${hint ? `\n    ${YELLOW}hint: ${hint}${RESET}` : ''}`);
};

const skip = (label: string, why: string) =>
  console.log(`  ${YELLOW}○${RESET} ${label}  (${why})`);

let anyRequiredFailed = false;

// ── Section: Process environment ──────────────────────────────────────────────

console.log(`\n${BOLD}=== Slideshow Builder: Pre-flight Check ===${RESET}\n`);
console.log(`${BOLD}[ 1 ] Process environment${RESET}`);

let env: Env;
try {
  ({ env } = await import('../src/config.js'));
  pass('Environment variables valid');
} catch (err) {
  fail('Environment variables invalid', err instanceof Error ? err.message : String(err));
  process.exit(1);
}

// Secrets are masked: first 4 chars + ellipsis
const mask = (v: string) => (v.length > 8 ? `${v.slice(0, 4)}…` : '(set)');

// ── Section: Toolchain ────────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 2 ] FFmpeg toolchain${RESET}`);

const { ffmpegVersion } = await import('../src/media/ffmpeg.js');
for (const [label, bin] of [['ffmpeg', env.FFMPEG_PATH], ['ffprobe', env.FFPROBE_PATH]] as const) {
  const version = await ffmpegVersion(bin);
  if (version) pass(label, version);
  else {
    fail(label, `Install ffmpeg or set ${label.toUpperCase()}_PATH`);
    anyRequiredFailed = true;
  }
}

// ── Section: Settings database ────────────────────────────────────────────────

console.log(`\n${BOLD}[ 3 ] Settings database${RESET}`);

const { getDb, closeDb } = await import('../src/db/client.js');
const { OverrideStore } = await import('../src/db/overrides.js');
const { ConfigResolver } = await import('../src/settings/resolver.js');

let resolver: InstanceType<typeof ConfigResolver> | undefined;
try {
  const store = new OverrideStore(getDb());
  resolver = new ConfigResolver(store);
  pass('Opened', `${env.SETTINGS_DB_PATH} (${store.list().length} override(s))`);
} catch (err) {
  fail('Cannot open settings DB', err instanceof Error ? err.message : String(err));
  anyRequiredFailed = true;
}

// ── Section: Media sources ────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 4 ] Media sources${RESET}`);

const { storesFromEnv } = await import('../src/storage/index.js');
const { imageFolderOf } = await import('../src/pipeline/executor.js');
const stores = storesFromEnv(env);

if (resolver) {
  const s = resolver.resolveAll().values;
  const checks: [string, 'local' | 'nextcloud', string, boolean][] = [
    ['Image folder', s.IMAGE_SOURCE, imageFolderOf(s), true],
    ['Music folder', s.MUSIC_SOURCE, s.MUSIC_FOLDER, s.ENABLE_MUSIC],
    ['Appended clip', s.APPEND_VIDEO_SOURCE, s.APPEND_VIDEO_PATH, s.APPEND_VIDEO_PATH !== ''],
  ];
  for (const [label, source, target, wanted] of checks) {
    if (!wanted) { skip(label, 'not configured'); continue; }
    if (!stores.has(source)) {
      fail(label, `${source} is not configured`);
      anyRequiredFailed = true;
      continue;
    }
    if (await stores.get(source).exists(target)) pass(label, `${source}:${target}`);
    else {
      fail(label, `${source}:${target} not found`);
      anyRequiredFailed = true;
    }
  }
  if (!s.OUTPUT_FILEPATH && !s.NEXTCLOUD_UPLOAD_PATH) {
    fail('Output destination', 'Set OUTPUT_FILEPATH or NEXTCLOUD_UPLOAD_PATH');
    anyRequiredFailed = true;
  } else {
    pass('Output destination', [s.OUTPUT_FILEPATH, s.NEXTCLOUD_UPLOAD_PATH].filter(Boolean).join(', '));
  }
} else {
  skip('Media sources', 'skipped, settings DB unavailable');
}

// ── Section: Services ─────────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 5 ] Services${RESET}`);

if (stores.has('nextcloud')) {
  if (await stores.get('nextcloud').ping()) pass('Nextcloud', env.NEXTCLOUD_URL ?? '');
  else {
    fail('Nextcloud unreachable', 'Check NEXTCLOUD_URL and credentials');
    anyRequiredFailed = true;
  }
} else {
  skip('Nextcloud', 'not configured');
}

if (env.MATRIX_HOMESERVER && env.MATRIX_ACCESS_TOKEN && env.MATRIX_ROOM_ID) {
  const { MatrixClient } = await import('../src/monitoring/matrix.js');
  const matrix = new MatrixClient({
    homeserver: env.MATRIX_HOMESERVER,
    accessToken: env.MATRIX_ACCESS_TOKEN,
    roomId: env.MATRIX_ROOM_ID,
  });
  try {
    pass('Matrix', `${await matrix.whoami()} (token ${mask(env.MATRIX_ACCESS_TOKEN)})`);
  } catch (err) {
    fail('Matrix login failed', err instanceof Error ? err.message : String(err));
    anyRequiredFailed = true;
  }
  if (env.MATRIX_ALLOWED_USERS.length === 0) skip('MATRIX_ALLOWED_USERS', 'empty, nobody can send commands');
  else pass('MATRIX_ALLOWED_USERS', env.MATRIX_ALLOWED_USERS.join(', '));
} else {
  skip('Matrix', 'not configured, scheduler-only mode');
}

closeDb();

// ── Summary ───────────────────────────────────────────────────────────────────

console.log();
if (anyRequiredFailed) {
  console.error(`${RED}${BOLD}Pre-flight FAILED${RESET}: fix the items above.\n`);
  process.exit(1);
}
console.log(`${GREEN}${BOLD}All required checks passed.${RESET}\n`);
