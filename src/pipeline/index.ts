/**
 * Delivery pipeline — one run of fetch → pick → send.
 *
 * A run never throws. Every failure becomes a DeliveryOutcome and exactly one
 * "Delivery: ..." status line is logged per run; the scheduler simply waits
 * for the next interval.
 */
import { env } from '../config.js';
import { logger } from '../utils/logger.js';
import { describeError } from '../utils/errors.js';
import { fetchChannelVideos, type VideoRecord } from '../platforms/youtube.js';
import { sendEmail } from '../platforms/sendgrid.js';
import { dedupeVideos, pickRandomVideo } from './selector.js';
import { composeSermonEmail } from './composer.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface DeliveryState {
  lastVideoId: string | null;
  /** Local calendar day (YYYY-MM-DD) of the last successful delivery. */
  lastSentDay: string | null;
}

export type DeliveryOutcome =
  | { status: 'sent'; video: VideoRecord; messageId: string | null }
  | { status: 'already_sent'; day: string }
  | { status: 'no_videos' }
  | { status: 'fetch_failed'; failedChannels: string[] }
  | { status: 'send_failed'; video: VideoRecord; error: string };

export interface CollectResult {
  videos: VideoRecord[];
  failedChannels: string[];
}

export function createDeliveryState(): DeliveryState {
  return { lastVideoId: null, lastSentDay: null };
}

export function toLocalDay(date: Date): string {
  const y = date.getFullYear();
  const m = String(date.getMonth() + 1).padStart(2, '0');
  const d = String(date.getDate()).padStart(2, '0');
  return `${y}-${m}-${d}`;
}

// ── Steps ─────────────────────────────────────────────────────────────────────

/**
 * List every configured channel. A failing channel is logged and skipped so
 * the others still contribute candidates.
 */
export async function collectVideos(channelIds: readonly string[]): Promise<CollectResult> {
  const videos: VideoRecord[] = [];
  const failedChannels: string[] = [];

  for (const channelId of channelIds) {
    try {
      videos.push(...await fetchChannelVideos(channelId));
    } catch (err) {
      failedChannels.push(channelId);
      logger.warn('Pipeline: channel listing failed', { channelId, error: describeError(err) });
    }
  }

  return { videos: dedupeVideos(videos), failedChannels };
}

// ── Main run ──────────────────────────────────────────────────────────────────

/**
 * Run one delivery cycle:
 * 1. Skip if a sermon already went out today.
 * 2. Collect videos from all configured channels.
 * 3. Pick one at random, avoiding the previous pick.
 * 4. Compose and send the email; update state only on success.
 */
export async function runDailyDelivery(
  state: DeliveryState,
  now: Date = new Date(),
  channelIds: readonly string[] = env.YOUTUBE_CHANNEL_IDS,
): Promise<DeliveryOutcome> {
  const today = toLocalDay(now);

  // ── Step 1: once per day ─────────────────────────────────────────────────
  if (state.lastSentDay === today) {
    logger.info('Delivery: already sent today', { outcome: 'already_sent', day: today });
    return { status: 'already_sent', day: today };
  }

  // ── Step 2: collect ──────────────────────────────────────────────────────
  const { videos, failedChannels } = await collectVideos(channelIds);

  if (videos.length === 0 && failedChannels.length > 0 && failedChannels.length === channelIds.length) {
    logger.error('Delivery: video listing failed', { outcome: 'fetch_failed', failedChannels });
    return { status: 'fetch_failed', failedChannels };
  }

  // ── Step 3: pick ─────────────────────────────────────────────────────────
  const video = pickRandomVideo(videos, { excludeId: state.lastVideoId });
  if (!video) {
    logger.warn('Delivery: no videos found in configured channels', {
      outcome: 'no_videos',
      channels: channelIds.length,
    });
    return { status: 'no_videos' };
  }

  // ── Step 4: send ─────────────────────────────────────────────────────────
  let messageId: string | null;
  try {
    messageId = await sendEmail(composeSermonEmail(video));
  } catch (err) {
    const error = describeError(err);
    logger.error('Delivery: email send failed', {
      outcome: 'send_failed',
      videoId: video.id,
      title:   video.title,
      error,
    });
    return { status: 'send_failed', video, error };
  }

  state.lastVideoId = video.id;
  state.lastSentDay = today;
  logger.info('Delivery: sent', {
    outcome:  'sent',
    videoId:  video.id,
    title:    video.title,
    channel:  video.channelTitle,
    messageId,
  });
  return { status: 'sent', video, messageId };
}

/** Outcomes that count as a healthy run (used for the CLI exit code). */
export function isSuccessfulOutcome(outcome: DeliveryOutcome): boolean {
  return outcome.status === 'sent' || outcome.status === 'already_sent';
}
