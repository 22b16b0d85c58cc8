import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import { StreamClient } from '../../feeds/streamClient';
import { StreamSession, type Broadcaster } from '../../feeds/streamSession';
import { describeError } from '../../lib/errors';
import { ConnectionState } from '../../types';
import { FakeTransport, testConfig } from '../helpers/fakeTransport';

const notification = (channel: string, changeId: number) =>
  JSON.stringify({
    jsonrpc: '2.0',
    method: 'subscription',
    params: { channel, data: { change_id: changeId, bids: [], asks: [] } },
  });

describe('StreamSession', () => {
  let transport: FakeTransport;
  let client: StreamClient;
  let broadcast: Mock<(topic: string, message: string) => number>;
  let session: StreamSession;

  beforeEach(() => {
    transport = new FakeTransport();
    client = new StreamClient({ ...testConfig, readTimeoutMs: 50 }, () => transport);
    broadcast = vi.fn<(topic: string, message: string) => number>(() => 1);
    const broadcaster: Broadcaster = { broadcast };
    session = new StreamSession(client, broadcaster);
  });

  it('connects and sends the subscribe command', async () => {
    const topic = await session.start('ETH-PERPETUAL', '100ms');

    expect(topic).toBe('book.ETH-PERPETUAL.100ms');
    expect(transport.writes).toEqual([
      '{"jsonrpc":"2.0","id":1,"method":"public/subscribe","params":{"channels":["book.ETH-PERPETUAL.100ms"]}}',
    ]);
    expect(session.isRunning()).toBe(true);

    await session.stop();
  });

  it('relays notifications verbatim under their channel', async () => {
    await session.start('BTC-PERPETUAL', '100ms');
    const first = notification('book.BTC-PERPETUAL.100ms', 1);
    const second = notification('book.BTC-PERPETUAL.100ms', 2);
    transport.deliver(first);
    transport.deliver(second);

    await vi.waitFor(() => expect(broadcast).toHaveBeenCalledTimes(2));

    expect(broadcast).toHaveBeenNthCalledWith(1, 'book.BTC-PERPETUAL.100ms', first);
    expect(broadcast).toHaveBeenNthCalledWith(2, 'book.BTC-PERPETUAL.100ms', second);
    expect(session.status().framesReceived).toBe(2);

    await session.stop();
  });

  it('does not relay the subscribe reply or other non-notification frames', async () => {
    await session.start('BTC-PERPETUAL', '100ms');
    const update = notification('book.BTC-PERPETUAL.100ms', 7);
    transport.deliver('{"jsonrpc":"2.0","id":1,"result":["book.BTC-PERPETUAL.100ms"]}');
    transport.deliver('{"jsonrpc":"2.0","method":"heartbeat","params":{"type":"test_request"}}');
    transport.deliver(update);

    await vi.waitFor(() => expect(session.status().framesReceived).toBe(3));

    expect(broadcast).toHaveBeenCalledTimes(1);
    expect(broadcast).toHaveBeenCalledWith('book.BTC-PERPETUAL.100ms', update);

    await session.stop();
  });

  it('stops after the in-flight receive settles and disconnects', async () => {
    await session.start('BTC-PERPETUAL', '100ms');

    await session.stop();

    expect(session.isRunning()).toBe(false);
    expect(client.getState()).toBe(ConnectionState.Disconnected);
    expect(transport.closes).toBe(1);
    expect(transport.writes[1]).toBe(
      '{"jsonrpc":"2.0","id":2,"method":"public/unsubscribe","params":{"channels":["book.BTC-PERPETUAL.100ms"]}}',
    );
  });

  it('ends the loop on a receive failure without reconnecting', async () => {
    transport.readError = new Error('Connection closed with code 1006');
    await session.start('BTC-PERPETUAL', '100ms');

    await vi.waitFor(() => expect(session.isRunning()).toBe(false));

    expect(transport.opens).toBe(1);
    expect(session.status()).toEqual({
      running: false,
      topic: 'book.BTC-PERPETUAL.100ms',
      state: ConnectionState.Disconnected,
      lastError: 'Connection closed with code 1006',
      framesReceived: 0,
    });
  });

  it('surfaces a subscribe failure and disconnects', async () => {
    transport.writeError = new Error('socket hang up');

    await expect(session.start('BTC-PERPETUAL', '100ms')).rejects.toThrow('socket hang up');

    expect(session.isRunning()).toBe(false);
    expect(client.getState()).toBe(ConnectionState.Disconnected);
  });

  it('refuses a second start while running', async () => {
    await session.start('BTC-PERPETUAL', '100ms');

    await expect(session.start('ETH-PERPETUAL', '100ms')).rejects.toThrow(
      'Stream already running for book.BTC-PERPETUAL.100ms',
    );

    await session.stop();
  });

  it('lets only one of two concurrent starts through', async () => {
    const results = await Promise.allSettled([
      session.start('BTC-PERPETUAL', '100ms'),
      session.start('ETH-PERPETUAL', '100ms'),
    ]);

    expect(results.map((result) => result.status)).toEqual(['fulfilled', 'rejected']);
    const second = results[1];
    expect(second?.status === 'rejected' ? describeError(second.reason) : undefined).toBe(
      'Stream is already starting',
    );
    expect(transport.writes).toEqual([
      '{"jsonrpc":"2.0","id":1,"method":"public/subscribe","params":{"channels":["book.BTC-PERPETUAL.100ms"]}}',
    ]);
    expect(session.status().topic).toBe('book.BTC-PERPETUAL.100ms');

    await session.stop();

    expect(transport.writes).toHaveLength(2);
  });

  it('can start again after a failed start', async () => {
    transport.writeError = new Error('socket hang up');
    await expect(session.start('BTC-PERPETUAL', '100ms')).rejects.toThrow('socket hang up');

    transport.writeError = null;
    await expect(session.start('BTC-PERPETUAL', '100ms')).resolves.toBe('book.BTC-PERPETUAL.100ms');

    await session.stop();
  });

  it('stop is safe when never started', async () => {
    await session.stop();

    expect(client.getState()).toBe(ConnectionState.Disconnected);
  });
});
