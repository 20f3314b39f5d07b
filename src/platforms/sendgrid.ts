/**
 * SendGrid v3 mail/send client.
 *
 * One personalization per call: the configured recipient, from the verified
 * sender. SendGrid answers 202 Accepted on success; anything else is a
 * delivery failure.
 */
import { env, SENDGRID_API } from '../config.js';
import { logger } from '../utils/logger.js';
import { describeError, EmailDeliveryError } from '../utils/errors.js';

export interface EmailMessage {
  subject: string;
  text: string;
  html?: string;
}

interface MailContent {
  type: 'text/plain' | 'text/html';
  value: string;
}

/** Request body for POST /v3/mail/send. text/plain must precede text/html. */
export function buildMailPayload(message: EmailMessage): Record<string, unknown> {
  const content: MailContent[] = [{ type: 'text/plain', value: message.text }];
  if (message.html) content.push({ type: 'text/html', value: message.html });

  return {
    personalizations: [{ to: [{ email: env.RECIPIENT_EMAIL }] }],
    from:             { email: env.SENDER_EMAIL },
    subject:          message.subject,
    content,
  };
}

/**
 * Send an email to the configured recipient.
 * Returns SendGrid's X-Message-Id, or null when the header is absent.
 */
export async function sendEmail(message: EmailMessage): Promise<string | null> {
  let res: Response;
  try {
    res = await fetch(SENDGRID_API.sendUrl, {
      method: 'POST',
      headers: {
        'Content-Type':  'application/json',
        'Authorization': `Bearer ${env.SENDGRID_API_KEY}`,
      },
      body: JSON.stringify(buildMailPayload(message)),
    });
  } catch (err) {
    throw new EmailDeliveryError(`SendGrid request failed: ${describeError(err)}`, null, '', err);
  }

  if (res.status !== SENDGRID_API.acceptedStatus) {
    const text = await res.text().catch(() => '');
    throw new EmailDeliveryError(`SendGrid mail/send failed: HTTP ${res.status}`, res.status, text);
  }

  const messageId = res.headers.get('x-message-id');
  logger.info('SendGrid: email accepted', { to: env.RECIPIENT_EMAIL, messageId });
  return messageId;
}
