/**
 * Environment schema, kept free of side effects so scripts/check-env.ts can
 * validate a broken .env without tripping the fatal parse in config.ts.
 */
import { z } from 'zod';
import { ConfigError } from './utils/errors.js';

const channelIdList = z
  .string()
  .transform(v => v.split(',').map(id => id.trim()).filter(id => id.length > 0))
  .pipe(z.array(z.string()).min(1, 'at least one channel ID is required'));

export const EnvSchema = z.object({
  // YouTube Data API
  YOUTUBE_API_KEY:         z.string().min(1),
  YOUTUBE_CHANNEL_IDS:     channelIdList,
  MAX_VIDEOS_PER_CHANNEL:  z.coerce.number().int().min(1).max(500).default(50),

  // SendGrid
  SENDGRID_API_KEY:        z.string().min(1),
  SENDER_EMAIL:            z.string().email(),
  RECIPIENT_EMAIL:         z.string().email(),

  // Schedule
  CHECK_INTERVAL_HOURS:    z.coerce.number().int().positive().default(24),

  // Logging
  LOG_LEVEL:               z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_FORMAT:              z.enum(['text', 'json']).default('text'),
  LOG_FILE:                z.string().default('logs/sermon_emailer.log'),
});

export type Env = z.infer<typeof EnvSchema>;

export type EnvKey = keyof typeof EnvSchema.shape;

/** Keys with a default; everything else must be set. */
export const OPTIONAL_KEYS = {
  MAX_VIDEOS_PER_CHANNEL: '50',
  CHECK_INTERVAL_HOURS:   '24',
  LOG_LEVEL:              'info',
  LOG_FORMAT:             'text',
  LOG_FILE:               'logs/sermon_emailer.log',
} as const satisfies Partial<Record<EnvKey, string>>;

/**
 * Validate an environment map. Throws a ConfigError naming every missing or
 * invalid key so a misconfigured deploy fails at startup.
 */
export function parseEnv(source: Record<string, string | undefined>): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const keys = [...new Set(parsed.error.issues.map(i => i.path.join('.')))];
    throw new ConfigError(`Missing or invalid environment variables: ${keys.join(', ')}`, keys);
  }
  return parsed.data;
}

// ── Channel IDs ───────────────────────────────────────────────────────────────

const CHANNEL_ID_PATTERN = /^UC[A-Za-z0-9_-]{22}$/;

/** Channel IDs that do not look like `UC` + 22 characters. They are still queried. */
export function findSuspectChannelIds(channelIds: readonly string[]): string[] {
  return channelIds.filter(id => !CHANNEL_ID_PATTERN.test(id));
}
