/**
 * Builds the daily sermon email (bilingual Telugu / English).
 */
import type { VideoRecord } from '../platforms/youtube.js';
import type { EmailMessage } from '../platforms/sendgrid.js';

export const SUBJECT =
  'మీ రోజువారీ తెలుగు బైబిల్ ప్రసంగం (Your Daily Telugu Bible Sermon)';

const GREETING = 'నమస్కారం (Greetings),';
const INTRO = 'ఈ రోజు మీకోసం ఎంచుకోబడిన ప్రసంగం ఇక్కడ ఉంది (Here is the sermon selected for you today):';
const LABELS = {
  title:   'ప్రసంగం పేరు (Sermon Title)',
  speaker: 'ప్రసంగకర్త (Speaker)',
  link:    'వినడానికి/చూడటానికి లింక్ (Link to listen/watch)',
} as const;
const BLESSING = 'దేవుడు మిమ్మును దీవించును గాక (May God bless you),';
const SIGNATURE = 'మీ తెలుగు ప్రసంగాల సహాయకుడు (Your Telugu Sermons Assistant)';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, ch => HTML_ESCAPES[ch] ?? ch);
}

type SermonFields = Pick<VideoRecord, 'title' | 'channelTitle' | 'url'>;

export function composeSermonEmail(video: SermonFields): Required<EmailMessage> {
  const text = [
    GREETING,
    '',
    INTRO,
    '',
    `${LABELS.title}: ${video.title}`,
    `${LABELS.speaker}: ${video.channelTitle}`,
    `${LABELS.link}: ${video.url}`,
    '',
    BLESSING,
    SIGNATURE,
  ].join('\n');

  const url = escapeHtml(video.url);
  const html = [
    `<p>${GREETING}</p>`,
    `<p>${INTRO}</p>`,
    '<ul>',
    `  <li><strong>${LABELS.title}:</strong> ${escapeHtml(video.title)}</li>`,
    `  <li><strong>${LABELS.speaker}:</strong> ${escapeHtml(video.channelTitle)}</li>`,
    `  <li><strong>${LABELS.link}:</strong> <a href="${url}">${url}</a></li>`,
    '</ul>',
    `<p>${BLESSING}<br>${SIGNATURE}</p>`,
  ].join('\n');

  return { subject: SUBJECT, text, html };
}
