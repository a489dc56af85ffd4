#!/usr/bin/env tsx
/**
 * Offline status for the slideshow builder.
 * Prints stored overrides, the effective configuration, heartbeat age and the
 * next scheduled run. Reads the settings DB directly; the daemon need not run.
 * Run: npm run status
 */
import { env } from '../src/config.js';
import { closeDb, getDb } from '../src/db/client.js';
import { OverrideStore } from '../src/db/overrides.js';
import { formatTime } from '../src/commands/format.js';
import { heartbeatAge } from '../src/monitoring/health.js';
import { cronScheduler } from '../src/pipeline/orchestrator.js';
import { SETTING_GROUPS, keysInGroup } from '../src/settings/keys.js';
import { ConfigResolver, sourceOf } from '../src/settings/resolver.js';

// ── ANSI helpers ──────────────────────────────────────────────────────────────

const GREEN  = '\x1b[32m';
const RED    = '\x1b[31m';
const YELLOW = '\x1b[33m';
const CYAN   = '\x1b[36m';
const BOLD   = '\x1b[1m';
const DIM    = '\x1b[2m';
const RESET  = '\x1b[0m';

function green(s: string)  { return `${GREEN}${s}${RESET}`; }
function red(s: string)    { return `${RED}${s}${RESET}`; }
function yellow(s: string) { return `${YELLOW}${s}${RESET}`; }
function cyan(s: string)   { return `${CYAN}${s}${RESET}`; }
function bold(s: string)   { return `${BOLD}${s}${RESET}`; }
function dim(s: string)    { return `${DIM}${s}${RESET}`; }

// ── Overrides ─────────────────────────────────────────────────────────────────

const store = new OverrideStore(getDb());
const resolver = new ConfigResolver(store);
const overrides = resolver.listOverrides();

console.log(`\n${bold('=== Slideshow Builder: Status ===')}\n`);
console.log(bold(`Overrides (${overrides.length})`) + dim(`  ${env.SETTINGS_DB_PATH}`));
if (overrides.length === 0) console.log(dim('  none'));
for (const o of overrides) {
  console.log(`  ${cyan(o.key)} = ${o.value}  ${dim(o.updatedAt)}`);
}

// ── Effective configuration ───────────────────────────────────────────────────

const config = resolver.resolveAll();
console.log(`\n${bold('Effective configuration')}`);
for (const group of SETTING_GROUPS) {
  console.log(`  ${bold(group)}`);
  for (const key of keysInGroup(group)) {
    const source = sourceOf(config, key);
    const tag = source === 'override' ? yellow(source) : source === 'environment' ? cyan(source) : dim(source);
    const value = String(config.values[key]);
    console.log(`    ${key.padEnd(22)} ${value === '' ? dim('(empty)') : value}  ${tag}`);
  }
}

// ── Liveness ──────────────────────────────────────────────────────────────────

console.log(`\n${bold('Liveness')}`);
const age = await heartbeatAge(env.HEARTBEAT_FILE);
if (age === null) {
  console.log(`  Heartbeat  ${red('missing')}  ${dim(env.HEARTBEAT_FILE)}`);
} else {
  const stale = age > env.HEARTBEAT_INTERVAL_SECONDS * 2;
  console.log(`  Heartbeat  ${stale ? red(`${age}s old`) : green(`${age}s old`)}  ${dim(env.HEARTBEAT_FILE)}`);
}

// ── Schedule ──────────────────────────────────────────────────────────────────

const expression = config.values.CRON_SCHEDULE;
const job = cronScheduler(expression, () => undefined, env.CRON_TIMEZONE);
const next = job.getNextRun();
await job.stop();
console.log(`  Schedule   ${expression}  next: ${next ? green(formatTime(next)) : yellow('unknown')}`);

closeDb();
console.log();
