#!/usr/bin/env tsx
/**
 * Pre-flight environment validation for the Daily Sermon Mailer.
 * Checks required env vars, channel ID format and, with --live, that every
 * configured channel resolves through the YouTube Data API.
 * Run: npm run check-env [-- --live]
 *
 * Exit codes:
 *   0 — all required checks pass
 *   1 — one or more required checks failed
 */
import { config as dotenvConfig } from 'dotenv';
import { EnvSchema, OPTIONAL_KEYS, findSuspectChannelIds } from '../src/env-schema.js';

dotenvConfig();

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

let anyRequiredFailed = false;

function mask(value: string): string {
  return value.length > 10 ? `${value.slice(0, 6)}…` : '(set)';
}

// ── Section: Required environment variables ───────────────────────────────────

console.log(`\n${BOLD}=== Daily Sermon Mailer — Pre-flight Check ===${RESET}\n`);
console.log(`${BOLD}[ 1 ] Required environment variables${RESET}`);

const HINTS: Record<string, string> = {
  YOUTUBE_API_KEY:     'Create a key at https://console.cloud.google.com/apis/credentials',
  YOUTUBE_CHANNEL_IDS: 'Comma separated list, e.g. UCxxxxxxxxxxxxxxxxxxxxxx,UCyyyyyyyyyyyyyyyyyyyyyy',
  SENDGRID_API_KEY:    'Create a key at https://app.sendgrid.com/settings/api_keys',
  SENDER_EMAIL:        'Must be a verified sender in SendGrid',
  RECIPIENT_EMAIL:     'Address that receives the daily sermon',
};

const parsed = EnvSchema.safeParse(process.env);
const invalidKeys = new Set(parsed.success ? [] : parsed.error.issues.map(i => String(i.path[0])));

for (const key of Object.keys(EnvSchema.shape)) {
  if (key in OPTIONAL_KEYS) continue;
  const value = process.env[key];
  if (!invalidKeys.has(key) && value) {
    pass(key, key.endsWith('_KEY') ? mask(value) : value);
  } else {
    fail(key, value ? 'Value is set but invalid' : HINTS[key] ?? `Set ${key} in .env`);
    anyRequiredFailed = true;
  }
}

// ── Section: Optional variables ───────────────────────────────────────────────

console.log(`\n${BOLD}[ 2 ] Optional / configuration variables${RESET}`);

for (const [key, defaultVal] of Object.entries(OPTIONAL_KEYS)) {
  const value = process.env[key];
  if (invalidKeys.has(key)) {
    fail(key, `Invalid value "${value ?? ''}" (default ${defaultVal})`);
    anyRequiredFailed = true;
    continue;
  }
  console.log(`  ${YELLOW}○${RESET} ${key}  ${value ?? defaultVal}${value ? '' : '  (default)'}`);
}

// ── Section: Channel IDs ──────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 3 ] Channel IDs${RESET}`);

if (parsed.success) {
  const suspect = new Set(findSuspectChannelIds(parsed.data.YOUTUBE_CHANNEL_IDS));
  for (const channelId of parsed.data.YOUTUBE_CHANNEL_IDS) {
    if (suspect.has(channelId)) {
      console.log(`  ${YELLOW}○${RESET} ${channelId}  (expected UC + 22 characters — will still be queried)`);
    } else {
      pass(channelId);
    }
  }
} else {
  console.log(`  ${YELLOW}○${RESET} Channel IDs  (skipped — configuration invalid above)`);
}

// ── Section: Live channel lookup ──────────────────────────────────────────────

if (process.argv.includes('--live')) {
  console.log(`\n${BOLD}[ 4 ] YouTube channel lookup${RESET}`);

  if (parsed.success) {
    // Imported late: the platform module validates the environment on load
    const { fetchUploadsPlaylistId } = await import('../src/platforms/youtube.js');
    for (const channelId of parsed.data.YOUTUBE_CHANNEL_IDS) {
      try {
        const playlistId = await fetchUploadsPlaylistId(channelId);
        pass(channelId, `uploads ${playlistId}`);
      } catch (err) {
        fail(channelId, err instanceof Error ? err.message : String(err));
        anyRequiredFailed = true;
      }
    }
  } else {
    console.log(`  ${YELLOW}○${RESET} Channel lookup  (skipped — configuration invalid above)`);
  }
}

// ── Summary ───────────────────────────────────────────────────────────────────

console.log('');
if (anyRequiredFailed) {
  console.error(`${RED}${BOLD}Pre-flight failed.${RESET} Fix the items above and re-run.\n`);
  process.exit(1);
}
console.log(`${GREEN}${BOLD}All required checks passed.${RESET}\n`);
