vi.mock('../../src/platforms/youtube.js', () => ({ fetchChannelVideos: vi.fn() }));
vi.mock('../../src/platforms/sendgrid.js', () => ({ sendEmail: vi.fn() }));
vi.mock('../../src/utils/logger.js', () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

import { fetchChannelVideos, type VideoRecord } from '../../src/platforms/youtube.js';
import { sendEmail } from '../../src/platforms/sendgrid.js';
import { logger } from '../../src/utils/logger.js';
import { EmailDeliveryError, YouTubeApiError } from '../../src/utils/errors.js';
import { composeSermonEmail } from '../../src/pipeline/composer.js';
import {
  collectVideos,
  createDeliveryState,
  isSuccessfulOutcome,
  runDailyDelivery,
  toLocalDay,
} from '../../src/pipeline/index.js';

const fetchVideos = vi.mocked(fetchChannelVideos);
const send = vi.mocked(sendEmail);

const CHANNELS = ['UC-one', 'UC-two'];
const MARCH_1 = new Date(2026, 2, 1, 9, 0);
const MARCH_2 = new Date(2026, 2, 2, 9, 0);

function video(id: string, channelTitle = 'Pastor A'): VideoRecord {
  return {
    id,
    title:       `Sermon ${id}`,
    description: '',
    channelId:   'UC-one',
    channelTitle,
    publishedAt: new Date('2026-01-01T00:00:00Z'),
    url:         `https://www.youtube.com/watch?v=${id}`,
  };
}

beforeEach(() => {
  vi.resetAllMocks();
  vi.restoreAllMocks();
});

describe('toLocalDay', () => {
  it('formats the local calendar day', () => {
    expect(toLocalDay(new Date(2026, 0, 5, 23, 59))).toBe('2026-01-05');
  });
});

describe('collectVideos', () => {
  it('merges channels and drops duplicate ids', async () => {
    fetchVideos
      .mockResolvedValueOnce([video('a'), video('b')])
      .mockResolvedValueOnce([video('b', 'Pastor B'), video('c', 'Pastor B')]);

    const result = await collectVideos(CHANNELS);

    expect(result.videos.map(v => v.id)).toEqual(['a', 'b', 'c']);
    expect(result.videos[1]?.channelTitle).toBe('Pastor A');
    expect(result.failedChannels).toEqual([]);
    expect(fetchVideos).toHaveBeenNthCalledWith(1, 'UC-one');
    expect(fetchVideos).toHaveBeenNthCalledWith(2, 'UC-two');
  });

  it('keeps going when one channel fails', async () => {
    fetchVideos
      .mockRejectedValueOnce(new YouTubeApiError('YouTube GET channels failed: HTTP 500', 500))
      .mockResolvedValueOnce([video('c')]);

    const result = await collectVideos(CHANNELS);

    expect(result.videos.map(v => v.id)).toEqual(['c']);
    expect(result.failedChannels).toEqual(['UC-one']);
    expect(logger.warn).toHaveBeenCalledWith('Pipeline: channel listing failed', {
      channelId: 'UC-one',
      error:     'YouTube GET channels failed: HTTP 500',
    });
  });
});

describe('runDailyDelivery', () => {
  it('sends the picked video and records it', async () => {
    vi.spyOn(Math, 'random').mockReturnValue(0);
    fetchVideos.mockResolvedValueOnce([video('a'), video('b')]).mockResolvedValueOnce([]);
    send.mockResolvedValueOnce('msg-1');
    const state = createDeliveryState();

    const outcome = await runDailyDelivery(state, MARCH_1, CHANNELS);

    expect(outcome).toEqual({ status: 'sent', video: video('a'), messageId: 'msg-1' });
    expect(send).toHaveBeenCalledWith(composeSermonEmail(video('a')));
    expect(state).toEqual({ lastVideoId: 'a', lastSentDay: '2026-03-01' });
    expect(logger.info).toHaveBeenCalledWith('Delivery: sent', {
      outcome:   'sent',
      videoId:   'a',
      title:     'Sermon a',
      channel:   'Pastor A',
      messageId: 'msg-1',
    });
  });

  it('picks a member of the fetched list', async () => {
    const fetched = [video('a'), video('b'), video('c')];
    const ids = fetched.map(v => v.id);
    send.mockResolvedValue(null);

    for (let i = 0; i < 20; i++) {
      fetchVideos.mockResolvedValueOnce(fetched);
      const outcome = await runDailyDelivery(createDeliveryState(), MARCH_1, ['UC-one']);
      if (outcome.status !== 'sent') throw new Error(`unexpected outcome ${outcome.status}`);
      expect(ids).toContain(outcome.video.id);
    }
  });

  it('logs no_videos and sends nothing for an empty listing', async () => {
    fetchVideos.mockResolvedValue([]);
    const state = createDeliveryState();

    const outcome = await runDailyDelivery(state, MARCH_1, CHANNELS);

    expect(outcome).toEqual({ status: 'no_videos' });
    expect(send).not.toHaveBeenCalled();
    expect(state).toEqual({ lastVideoId: null, lastSentDay: null });
    expect(logger.warn).toHaveBeenCalledWith('Delivery: no videos found in configured channels', {
      outcome:  'no_videos',
      channels: 2,
    });
  });

  it('reports fetch_failed when every channel fails', async () => {
    fetchVideos.mockRejectedValue(new YouTubeApiError('YouTube GET channels failed: fetch failed'));

    const outcome = await runDailyDelivery(createDeliveryState(), MARCH_1, CHANNELS);

    expect(outcome).toEqual({ status: 'fetch_failed', failedChannels: CHANNELS });
    expect(send).not.toHaveBeenCalled();
    expect(logger.error).toHaveBeenCalledWith('Delivery: video listing failed', {
      outcome:        'fetch_failed',
      failedChannels: CHANNELS,
    });
  });

  it('logs a failure entry and returns normally when the email fails', async () => {
    vi.spyOn(Math, 'random').mockReturnValue(0);
    fetchVideos.mockResolvedValueOnce([video('a')]).mockResolvedValueOnce([]);
    send.mockRejectedValueOnce(new EmailDeliveryError('SendGrid mail/send failed: HTTP 401', 401));
    const state = createDeliveryState();

    const outcome = await runDailyDelivery(state, MARCH_1, CHANNELS);

    expect(outcome).toEqual({
      status: 'send_failed',
      video:  video('a'),
      error:  'SendGrid mail/send failed: HTTP 401',
    });
    expect(state).toEqual({ lastVideoId: null, lastSentDay: null });
    expect(logger.error).toHaveBeenCalledWith('Delivery: email send failed', {
      outcome: 'send_failed',
      videoId: 'a',
      title:   'Sermon a',
      error:   'SendGrid mail/send failed: HTTP 401',
    });
    expect(logger.info).not.toHaveBeenCalledWith('Delivery: sent', expect.anything());
  });

  it('keeps an accepted email recorded when logging the success fails', async () => {
    vi.spyOn(Math, 'random').mockReturnValue(0);
    fetchVideos.mockResolvedValueOnce([video('a')]).mockResolvedValueOnce([]);
    send.mockResolvedValueOnce('msg-1');
    vi.mocked(logger.info).mockImplementation((msg) => {
      if (msg === 'Delivery: sent') throw new Error('disk full');
    });
    const state = createDeliveryState();

    await expect(runDailyDelivery(state, MARCH_1, CHANNELS)).rejects.toThrow('disk full');

    expect(send).toHaveBeenCalledTimes(1);
    expect(state).toEqual({ lastVideoId: 'a', lastSentDay: '2026-03-01' });
    expect(logger.error).not.toHaveBeenCalled();
  });

  it('skips a second run on the same day', async () => {
    const state = { lastVideoId: 'a', lastSentDay: '2026-03-01' };

    const outcome = await runDailyDelivery(state, new Date(2026, 2, 1, 21, 30), CHANNELS);

    expect(outcome).toEqual({ status: 'already_sent', day: '2026-03-01' });
    expect(fetchVideos).not.toHaveBeenCalled();
    expect(send).not.toHaveBeenCalled();
  });

  it('does not repeat yesterday\'s video while alternatives exist', async () => {
    vi.spyOn(Math, 'random').mockReturnValue(0);
    fetchVideos.mockResolvedValueOnce([video('a'), video('b')]).mockResolvedValueOnce([]);
    send.mockResolvedValueOnce('msg-2');
    const state = { lastVideoId: 'a', lastSentDay: '2026-03-01' };

    const outcome = await runDailyDelivery(state, MARCH_2, CHANNELS);

    expect(outcome).toMatchObject({ status: 'sent', video: { id: 'b' } });
    expect(state).toEqual({ lastVideoId: 'b', lastSentDay: '2026-03-02' });
  });

  it('retries on a later run after a failed send the same day', async () => {
    vi.spyOn(Math, 'random').mockReturnValue(0);
    fetchVideos.mockResolvedValue([video('a')]);
    send.mockRejectedValueOnce(new Error('socket hang up')).mockResolvedValueOnce('msg-3');
    const state = createDeliveryState();

    const first = await runDailyDelivery(state, MARCH_1, ['UC-one']);
    const second = await runDailyDelivery(state, new Date(2026, 2, 1, 15, 0), ['UC-one']);

    expect(first.status).toBe('send_failed');
    expect(second).toEqual({ status: 'sent', video: video('a'), messageId: 'msg-3' });
    expect(send).toHaveBeenCalledTimes(2);
  });
});

describe('isSuccessfulOutcome', () => {
  it('treats sent and already_sent as success', () => {
    expect(isSuccessfulOutcome({ status: 'sent', video: video('a'), messageId: null })).toBe(true);
    expect(isSuccessfulOutcome({ status: 'already_sent', day: '2026-03-01' })).toBe(true);
    expect(isSuccessfulOutcome({ status: 'no_videos' })).toBe(false);
    expect(isSuccessfulOutcome({ status: 'fetch_failed', failedChannels: [] })).toBe(false);
    expect(isSuccessfulOutcome({ status: 'send_failed', video: video('a'), error: 'x' })).toBe(false);
  });
});
