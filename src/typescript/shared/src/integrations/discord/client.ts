import { z } from 'zod';
import type { Logger } from 'winston';
import { ChatDestination } from '../../domain/contracts';
import { parseErrorResponse, wrapFetchWithErrorLogging } from '../../infrastructure/http/errors';
import { DisplayMessage } from '../../types/relay';
import { decode } from '../../types/decode';

export const WEBHOOK_SENDER = {
  username: 'Strava Webhook',
  avatarUrl: 'https://d3nn82uaxijpm6.cloudfront.net/mstile-144x144.png?v=dLlWydWlG8',
  content: '*A new activity was posted to Strava*',
};

/** Discord embed object, https://discord.com/developers/docs/resources/message#embed-object */
export interface DiscordEmbed {
  title: string;
  url: string;
  color: number;
  timestamp: string;
  author: { name: string; url: string; icon_url: string };
  footer: { text: string; icon_url: string };
  fields: { name: string; value: string; inline: boolean }[];
}

const webhookMessageSchema = z.object({
  id: z.string()
});

export function toDiscordEmbed(message: DisplayMessage): DiscordEmbed {
  return {
    title: message.title,
    url: message.url,
    color: message.color,
    timestamp: message.timestamp.toISOString(),
    author: {
      name: message.author.name,
      url: message.author.url,
      icon_url: message.author.iconUrl,
    },
    footer: {
      text: message.footer.text,
      icon_url: message.footer.iconUrl,
    },
    fields: message.fields.map(f => ({ name: f.name, value: f.value, inline: f.inline })),
  };
}

/**
 * Posts and edits messages through a Discord channel webhook.
 */
export class DiscordWebhookClient implements ChatDestination {
  private readonly fetchFn: typeof fetch;

  constructor(
    private readonly webhookUrl: string,
    logger: Pick<Logger, 'error'>,
    fetchFn: typeof fetch = fetch
  ) {
    this.fetchFn = wrapFetchWithErrorLogging(fetchFn, logger, 'discord');
  }

  async send(message: DisplayMessage): Promise<string> {
    // wait=true makes Discord answer with the created message instead of 204
    const response = await this.fetchFn(this.url('', { wait: 'true' }), {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        content: WEBHOOK_SENDER.content,
        username: WEBHOOK_SENDER.username,
        avatar_url: WEBHOOK_SENDER.avatarUrl,
        embeds: [toDiscordEmbed(message)],
      }),
    });

    const error = await parseErrorResponse(response);
    if (error) throw error;

    const created = decode(webhookMessageSchema, await response.json(), 'Discord webhook message');
    return created.id;
  }

  async edit(messageId: string, message: DisplayMessage): Promise<void> {
    const response = await this.fetchFn(this.url(`/messages/${encodeURIComponent(messageId)}`), {
      method: 'PATCH',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ embeds: [toDiscordEmbed(message)] }),
    });

    const error = await parseErrorResponse(response);
    if (error) throw error;
  }

  private url(path: string, query?: Record<string, string>): string {
    const url = new URL(this.webhookUrl);
    url.pathname = url.pathname.replace(/\/$/, '') + path;
    if (query) {
      for (const [key, value] of Object.entries(query)) {
        url.searchParams.set(key, value);
      }
    }
    return url.toString();
  }
}
