/**
 * Error types raised by the mailer.
 *
 * ConfigError is fatal at startup. The two service errors are caught by the
 * delivery pipeline and turned into a logged run outcome.
 */

export class ConfigError extends Error {
  constructor(message: string, public readonly keys: string[] = []) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class YouTubeApiError extends Error {
  constructor(
    message: string,
    public readonly status: number | null = null,
    public readonly body = '',
    public readonly channelId: string | null = null,
  ) {
    super(message);
    this.name = 'YouTubeApiError';
  }
}

export class EmailDeliveryError extends Error {
  constructor(
    message: string,
    public readonly status: number | null = null,
    public readonly body = '',
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'EmailDeliveryError';
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
