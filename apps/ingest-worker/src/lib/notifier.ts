import type { HttpTransport, Logger } from '@libs/jquants-client';

export interface Notifier {
  send(text: string): Promise<void>;
}

/** Discord rejects messages longer than this. */
const DISCORD_MAX_CONTENT = 2000;
const LINE_NOTIFY_URL = 'https://notify-api.line.me/api/notify';

export class ConsoleNotifier implements Notifier {
  constructor(private readonly logger: Logger = console) {}

  async send(text: string): Promise<void> {
    this.logger.info?.(`[notify] ${text}`);
  }
}

export interface DiscordNotifierOptions {
  discordWebhookUrl?: string;
  lineNotifyToken?: string;
  transport?: HttpTransport;
  logger?: Logger;
}

/**
 * Posts to a Discord webhook, falling back to LINE Notify when Discord is
 * not configured or the post fails.
 */
export class DiscordNotifier implements Notifier {
  private readonly transport: HttpTransport;

  constructor(private readonly options: DiscordNotifierOptions) {
    this.transport = options.transport ?? ((url, init) => fetch(url, init));
  }

  async send(text: string): Promise<void> {
    const { discordWebhookUrl, lineNotifyToken } = this.options;
    if (discordWebhookUrl) {
      try {
        await this.post(discordWebhookUrl, {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({ content: text.slice(0, DISCORD_MAX_CONTENT) }),
        });
        return;
      } catch (error) {
        if (!lineNotifyToken) {
          throw error;
        }
        this.options.logger?.warn?.('[notify] Discord failed, falling back to LINE', error);
      }
    }

    if (!lineNotifyToken) {
      throw new Error('No notification channel configured');
    }
    await this.post(LINE_NOTIFY_URL, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${lineNotifyToken}`,
        'Content-Type': 'application/x-www-form-urlencoded',
      },
      body: new URLSearchParams({ message: text }).toString(),
    });
  }

  private async post(url: string, init: RequestInit): Promise<void> {
    const response = await this.transport(url, init);
    if (!response.ok) {
      throw new Error(`Notification post to ${new URL(url).host} failed with status ${response.status}`);
    }
  }
}

export function createNotifier(options: DiscordNotifierOptions): Notifier {
  if (options.discordWebhookUrl || options.lineNotifyToken) {
    return new DiscordNotifier(options);
  }
  return new ConsoleNotifier(options.logger);
}

/** Best-effort delivery: a failing channel is logged, never raised. */
export async function safeNotify(notifier: Notifier, text: string, logger: Logger = console): Promise<void> {
  try {
    await notifier.send(text);
  } catch (error) {
    logger.warn?.(`[notify] Failed to deliver notification: ${text}`, error);
  }
}
