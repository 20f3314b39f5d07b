/**
 * Random sermon selection.
 */
import type { VideoRecord } from '../platforms/youtube.js';

export interface PickOptions {
  /** ID of the previously sent video; avoided while anything else is available. */
  excludeId?: string | null;
  /** Uniform source in [0, 1). */
  random?: () => number;
}

/**
 * Pick one video at random. Returns null for an empty list; otherwise the
 * result is always an element of `videos`.
 */
export function pickRandomVideo<T extends Pick<VideoRecord, 'id'>>(
  videos: readonly T[],
  options: PickOptions = {},
): T | null {
  const { excludeId = null, random = Math.random } = options;
  if (videos.length === 0) return null;

  const fresh = excludeId === null ? videos : videos.filter(v => v.id !== excludeId);
  const pool = fresh.length > 0 ? fresh : videos;

  // index stays inside the pool for any number random() returns, NaN included
  const r = random();
  const index = Number.isFinite(r)
    ? Math.min(pool.length - 1, Math.max(0, Math.floor(r * pool.length)))
    : 0;
  return pool[index] ?? null;
}

/** Drop repeated video IDs, keeping the first occurrence. */
export function dedupeVideos<T extends Pick<VideoRecord, 'id'>>(videos: readonly T[]): T[] {
  const seen = new Set<string>();
  return videos.filter(video => {
    if (seen.has(video.id)) return false;
    seen.add(video.id);
    return true;
  });
}
