import { afterEach, describe, expect, it, vi } from 'vitest';
import { WebSocketServer } from 'ws';
import { MessageFeed, parseFeedMessage } from '../../src/data/messageFeed';
import { RawMessage } from '../../src/types';

describe('parseFeedMessage', () => {
  it('accepts a single message', () => {
    expect(parseFeedMessage('{"id":7,"text":"hello","platform":"telegram","extra":true}')).toEqual([
      { id: '7', text: 'hello', platform: 'telegram' },
    ]);
  });

  it('accepts a batch and drops malformed items', () => {
    const frame = JSON.stringify([{ id: 'a', text: 'one' }, 42, { id: 'b', text: 5 }, { text: null }]);
    expect(parseFeedMessage(frame)).toEqual([{ id: 'a', text: 'one' }, { text: null }]);
  });

  it('ignores frames that are not JSON', () => {
    expect(parseFeedMessage('not json')).toEqual([]);
  });
});

describe('MessageFeed', () => {
  let server: WebSocketServer | null = null;
  let feed: MessageFeed | null = null;

  afterEach(async () => {
    feed?.disconnect();
    feed = null;
    const current = server;
    server = null;
    if (current) {
      await new Promise<void>(resolve => current.close(() => resolve()));
    }
  });

  it('handleFrame hands each message to the sink and survives sink errors', () => {
    const sink = vi.fn((message: RawMessage) => {
      if (message.id === 'bad') throw new Error('sink broke');
    });
    feed = new MessageFeed(sink, { url: 'ws://127.0.0.1:1' });

    expect(feed.handleFrame(JSON.stringify([{ id: 'bad', text: 'x' }, { id: 'ok', text: 'y' }]))).toBe(2);
    expect(sink).toHaveBeenCalledTimes(2);
    expect(feed.messagesReceived).toBe(2);
  });

  it('streams frames from a websocket server', async () => {
    const wss = new WebSocketServer({ port: 0, host: '127.0.0.1' });
    server = wss;
    await new Promise<void>(resolve => wss.on('listening', () => resolve()));
    const address = wss.address();
    if (typeof address === 'string') throw new Error('expected a TCP address');

    wss.on('connection', socket => {
      socket.send(JSON.stringify({ id: 'm1', text: 'fair launch', channel: 'calls' }));
    });

    const received: RawMessage[] = [];
    feed = new MessageFeed(message => received.push(message), { url: `ws://127.0.0.1:${address.port}` });
    await feed.connect();

    expect(feed.connected).toBe(true);
    await vi.waitFor(() => expect(received).toEqual([{ id: 'm1', text: 'fair launch', channel: 'calls' }]));
  });
});
