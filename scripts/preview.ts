#!/usr/bin/env tsx
/**
 * Dry run: collect videos, pick one and print the email that would be sent.
 * Nothing is emailed.
 * Run: npm run preview
 */
import { env } from '../src/config.js';
import { collectVideos } from '../src/pipeline/index.js';
import { pickRandomVideo } from '../src/pipeline/selector.js';
import { composeSermonEmail } from '../src/pipeline/composer.js';
import { fetchVideoDetails } from '../src/platforms/youtube.js';

const { videos, failedChannels } = await collectVideos(env.YOUTUBE_CHANNEL_IDS);
console.log(`Collected ${videos.length} videos from ${env.YOUTUBE_CHANNEL_IDS.length} channel(s)`);
if (failedChannels.length > 0) {
  console.log(`Failed channels: ${failedChannels.join(', ')}`);
}

const video = pickRandomVideo(videos);
if (!video) {
  console.log('No videos found — nothing would be sent.');
  process.exit(1);
}

const details = await fetchVideoDetails(video.id);
if (details) {
  const minutes = Math.round(details.durationSeconds / 60);
  console.log(`Picked ${video.id}: ${minutes} min, ${details.viewCount} views, ${details.likeCount} likes`);
}

const email = composeSermonEmail(video);
console.log(`\nTo:      ${env.RECIPIENT_EMAIL}`);
console.log(`From:    ${env.SENDER_EMAIL}`);
console.log(`Subject: ${email.subject}\n`);
console.log(email.text);
