import { z } from 'zod';

/**
 * Order-book channel name, e.g. `book.BTC-PERPETUAL.100ms`. The same string
 * is sent to the exchange and used by hub consumers to subscribe.
 */
export function bookTopic(instrument: string, cadence: string): string {
  const name = instrument.trim();
  const interval = cadence.trim();
  if (!name || !interval) {
    throw new Error(`Invalid book topic parts: instrument="${instrument}" cadence="${cadence}"`);
  }
  return `book.${name}.${interval}`;
}

export interface SubscriptionCommand {
  jsonrpc: '2.0';
  id: number;
  method: 'public/subscribe' | 'public/unsubscribe';
  params: { channels: string[] };
}

export function buildSubscribeCommand(channels: string[], id: number): SubscriptionCommand {
  return { jsonrpc: '2.0', id, method: 'public/subscribe', params: { channels } };
}

export function buildUnsubscribeCommand(channels: string[], id: number): SubscriptionCommand {
  return { jsonrpc: '2.0', id, method: 'public/unsubscribe', params: { channels } };
}

const NotificationSchema = z.object({
  method: z.literal('subscription'),
  params: z.object({ channel: z.string() }),
});

/**
 * Channel of an inbound subscription notification; undefined for replies,
 * heartbeats and anything that is not JSON.
 */
export function channelOf(payload: string): string | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(payload);
  } catch {
    return undefined;
  }
  const result = NotificationSchema.safeParse(parsed);
  return result.success ? result.data.params.channel : undefined;
}
