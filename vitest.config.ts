import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    // Placeholder values so src/config.ts parses when a test imports it
    env: {
      YOUTUBE_API_KEY:        'test-youtube-key',
      YOUTUBE_CHANNEL_IDS:    'UCaaaaaaaaaaaaaaaaaaaaaa,UCbbbbbbbbbbbbbbbbbbbbbb',
      SENDGRID_API_KEY:       'test-secret',
      SENDER_EMAIL:           'sender@example.com',
      RECIPIENT_EMAIL:        'recipient@example.com',
      CHECK_INTERVAL_HOURS:   '24',
      MAX_VIDEOS_PER_CHANNEL: '50',
      LOG_LEVEL:              'error',
      LOG_FORMAT:             'text',
      LOG_FILE:               '',
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.d.ts'],
    },
  },
});
