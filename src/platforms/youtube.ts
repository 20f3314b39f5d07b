/**
 * YouTube Data API v3 client.
 *
 * Channel videos are listed through the channel's uploads playlist
 * (channels.list → playlistItems.list), which costs 1 quota unit per page
 * instead of the 100 charged by search.list.
 *
 * The API key travels as a query parameter and is never echoed into errors
 * or logs.
 */
import { env, YOUTUBE_API } from '../config.js';
import { logger } from '../utils/logger.js';
import { describeError, YouTubeApiError } from '../utils/errors.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface VideoRecord {
  id: string;
  title: string;
  description: string;
  channelId: string;
  channelTitle: string;
  publishedAt: Date;
  url: string;
}

export interface VideoDetails extends VideoRecord {
  durationSeconds: number;
  viewCount: number;
  likeCount: number;
}

interface ChannelListResponse {
  items?: Array<{
    id: string;
    contentDetails: { relatedPlaylists: { uploads: string } };
  }>;
}

interface PlaylistItemsResponse {
  nextPageToken?: string;
  items?: Array<{
    snippet: {
      publishedAt: string;
      channelId: string;
      channelTitle: string;
      title: string;
      description?: string;
      resourceId?: { kind: string; videoId?: string };
    };
  }>;
}

interface VideoListResponse {
  items?: Array<{
    id: string;
    snippet: {
      publishedAt: string;
      channelId: string;
      channelTitle: string;
      title: string;
      description?: string;
    };
    contentDetails: { duration: string };
    statistics?: { viewCount?: string; likeCount?: string };
  }>;
}

type PlaylistSnippet = NonNullable<PlaylistItemsResponse['items']>[number]['snippet'];

// Placeholder titles YouTube returns for uploads that can no longer be watched
const UNAVAILABLE_TITLES = new Set(['Private video', 'Deleted video']);

// ── Internal HTTP helper ──────────────────────────────────────────────────────

async function youtubeGet<T>(
  endpoint: string,
  params: Record<string, string | number | undefined>,
  channelId: string | null = null,
): Promise<T> {
  const url = new URL(`${YOUTUBE_API.baseUrl}/${endpoint}`);
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) url.searchParams.set(key, String(value));
  }
  url.searchParams.set('key', env.YOUTUBE_API_KEY);

  let res: Response;
  try {
    res = await fetch(url.toString());
  } catch (err) {
    throw new YouTubeApiError(`YouTube GET ${endpoint} failed: ${describeError(err)}`, null, '', channelId);
  }

  if (!res.ok) {
    const text = await res.text().catch(() => '');
    throw new YouTubeApiError(`YouTube GET ${endpoint} failed: HTTP ${res.status}`, res.status, text, channelId);
  }

  return res.json() as Promise<T>;
}

// ── Helpers ───────────────────────────────────────────────────────────────────

export function buildWatchUrl(videoId: string): string {
  return `${YOUTUBE_API.watchUrl}${videoId}`;
}

/**
 * Parse an ISO 8601 duration ("PT1H2M30S", "P1DT5M") into seconds.
 * Unparseable input yields 0.
 */
export function parseIsoDuration(duration: string): number {
  const match = duration.match(/^P(?:(\d+)D)?(?:T(?:(\d+)H)?(?:(\d+)M)?(?:(\d+)S)?)?$/);
  if (!match) {
    logger.warn('YouTube: could not parse duration', { duration });
    return 0;
  }
  const [, days, hours, minutes, seconds] = match.map(part => Number(part ?? 0));
  return (days ?? 0) * 86_400 + (hours ?? 0) * 3600 + (minutes ?? 0) * 60 + (seconds ?? 0);
}

function toVideoRecord(snippet: PlaylistSnippet): VideoRecord | null {
  const videoId = snippet.resourceId?.videoId;
  if (!videoId || UNAVAILABLE_TITLES.has(snippet.title)) return null;

  return {
    id:           videoId,
    title:        snippet.title,
    description:  snippet.description ?? '',
    channelId:    snippet.channelId,
    channelTitle: snippet.channelTitle,
    publishedAt:  new Date(snippet.publishedAt),
    url:          buildWatchUrl(videoId),
  };
}

// ── Public API ─────────────────────────────────────────────────────────────────

/**
 * Resolve a channel's uploads playlist ID.
 * Throws YouTubeApiError if the channel does not exist.
 */
export async function fetchUploadsPlaylistId(channelId: string): Promise<string> {
  const response = await youtubeGet<ChannelListResponse>('channels', {
    part: 'contentDetails',
    id:   channelId,
  }, channelId);

  const channel = response.items?.[0];
  if (!channel) {
    throw new YouTubeApiError(`YouTube channel not found: ${channelId}`, 404, '', channelId);
  }
  return channel.contentDetails.relatedPlaylists.uploads;
}

/**
 * List up to `maxResults` uploads of a channel, newest first, following
 * nextPageToken until the limit or the last page is reached.
 * Private and deleted uploads are skipped.
 */
export async function fetchChannelVideos(
  channelId: string,
  maxResults: number = env.MAX_VIDEOS_PER_CHANNEL,
): Promise<VideoRecord[]> {
  const playlistId = await fetchUploadsPlaylistId(channelId);
  logger.debug('YouTube: listing uploads', { channelId, playlistId });

  const videos: VideoRecord[] = [];
  let pageToken: string | undefined;

  do {
    const page = await youtubeGet<PlaylistItemsResponse>('playlistItems', {
      part:       'snippet',
      playlistId,
      maxResults: Math.min(YOUTUBE_API.maxPageSize, maxResults - videos.length),
      pageToken,
    }, channelId);

    for (const item of page.items ?? []) {
      const video = toVideoRecord(item.snippet);
      if (video) videos.push(video);
      if (videos.length >= maxResults) break;
    }
    pageToken = page.nextPageToken;
  } while (pageToken && videos.length < maxResults);

  logger.info('YouTube: retrieved channel videos', { channelId, count: videos.length });
  return videos;
}

/**
 * Fetch full details for one video, or null if it does not exist.
 */
export async function fetchVideoDetails(videoId: string): Promise<VideoDetails | null> {
  const response = await youtubeGet<VideoListResponse>('videos', {
    part: 'snippet,contentDetails,statistics',
    id:   videoId,
  });

  const video = response.items?.[0];
  if (!video) {
    logger.warn('YouTube: video not found', { videoId });
    return null;
  }

  return {
    id:              video.id,
    title:           video.snippet.title,
    description:     video.snippet.description ?? '',
    channelId:       video.snippet.channelId,
    channelTitle:    video.snippet.channelTitle,
    publishedAt:     new Date(video.snippet.publishedAt),
    url:             buildWatchUrl(video.id),
    durationSeconds: parseIsoDuration(video.contentDetails.duration),
    viewCount:       Number(video.statistics?.viewCount ?? 0),
    likeCount:       Number(video.statistics?.likeCount ?? 0),
  };
}
