import { config as dotenvConfig } from 'dotenv';
import { parseEnv } from './env-schema.js';

dotenvConfig();

export { EnvSchema, parseEnv, findSuspectChannelIds, type Env } from './env-schema.js';

export const env = parseEnv(process.env);

// ── Service endpoints ─────────────────────────────────────────────────────────

export const YOUTUBE_API = {
  baseUrl:      'https://www.googleapis.com/youtube/v3',
  watchUrl:     'https://www.youtube.com/watch?v=',
  maxPageSize:  50,   // playlistItems.list hard limit
} as const;

export const SENDGRID_API = {
  sendUrl:         'https://api.sendgrid.com/v3/mail/send',
  acceptedStatus:  202,
} as const;

// ── Schedule ──────────────────────────────────────────────────────────────────

export const SCHEDULE = {
  // Minute tick; the interval itself is enforced by isDue()
  cronExpression:  '* * * * *',
  intervalHours:   env.CHECK_INTERVAL_HOURS,
} as const;
