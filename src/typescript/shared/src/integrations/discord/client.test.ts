import { DiscordWebhookClient, toDiscordEmbed } from './client';
import { mockLogger, mockResponse } from '../../test-utils';
import { UpstreamHttpError } from '../../infrastructure/http/errors';
import { DisplayMessage } from '../../types/relay';

const message: DisplayMessage = {
  title: 'Morning Run',
  url: 'https://strava.com/activities/1001',
  color: 0xFC4C02,
  timestamp: new Date('2024-05-01T07:30:00Z'),
  author: { name: 'Ada Runner', url: 'https://strava.com/athletes/42', iconUrl: 'https://example.com/a.jpg' },
  footer: { text: 'Powered by Strava', iconUrl: 'https://example.com/strava.png' },
  fields: [{ name: 'Distance', value: '5.0 km', inline: true }],
};

const WEBHOOK_URL = 'https://discord.test/api/webhooks/123/token';

describe('DiscordWebhookClient', () => {
  let fetchFn: jest.Mock;
  let client: DiscordWebhookClient;

  beforeEach(() => {
    fetchFn = jest.fn();
    client = new DiscordWebhookClient(WEBHOOK_URL, mockLogger(), fetchFn);
  });

  it('should map the display message to a Discord embed', () => {
    expect(toDiscordEmbed(message)).toEqual({
      title: 'Morning Run',
      url: 'https://strava.com/activities/1001',
      color: 0xFC4C02,
      timestamp: '2024-05-01T07:30:00.000Z',
      author: { name: 'Ada Runner', url: 'https://strava.com/athletes/42', icon_url: 'https://example.com/a.jpg' },
      footer: { text: 'Powered by Strava', icon_url: 'https://example.com/strava.png' },
      fields: [{ name: 'Distance', value: '5.0 km', inline: true }],
    });
  });

  it('should post with wait=true and return the created message id', async () => {
    fetchFn.mockResolvedValue(mockResponse(200, { id: '1234567890', channel_id: '55' }));

    const id = await client.send(message);

    const [url, init] = fetchFn.mock.calls[0];
    expect(url).toBe('https://discord.test/api/webhooks/123/token?wait=true');
    expect(init.method).toBe('POST');
    expect(JSON.parse(init.body)).toEqual({
      content: '*A new activity was posted to Strava*',
      username: 'Strava Webhook',
      avatar_url: 'https://d3nn82uaxijpm6.cloudfront.net/mstile-144x144.png?v=dLlWydWlG8',
      embeds: [toDiscordEmbed(message)],
    });
    expect(id).toBe('1234567890');
  });

  it('should patch the existing message when editing', async () => {
    fetchFn.mockResolvedValue(mockResponse(200, { id: '1234567890' }));

    await client.edit('1234567890', message);

    const [url, init] = fetchFn.mock.calls[0];
    expect(url).toBe('https://discord.test/api/webhooks/123/token/messages/1234567890');
    expect(init.method).toBe('PATCH');
    expect(JSON.parse(init.body)).toEqual({ embeds: [toDiscordEmbed(message)] });
  });

  it('should throw on a rejected post', async () => {
    fetchFn.mockResolvedValue(mockResponse(404, '{"message":"Unknown Webhook"}', 'Not Found'));

    await expect(client.send(message)).rejects.toBeInstanceOf(UpstreamHttpError);
  });

  it('should throw on a rejected edit', async () => {
    fetchFn.mockResolvedValue(mockResponse(404, '{"message":"Unknown Message"}', 'Not Found'));

    await expect(client.edit('1', message)).rejects.toThrow('Not Found (404): {"message":"Unknown Message"}');
  });
});
