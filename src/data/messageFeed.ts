// =========================================================
// MESSAGE FEED — WEBSOCKET CHATTER STREAM
// =========================================================

import WebSocket from 'ws';
import { z } from 'zod';
import { RawMessage } from '../types';
import { FEED_CONFIG } from '../config';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

const log = logger.child('feed');

const FeedItemSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(value => String(value)).optional(),
  text: z.string().nullish(),
  platform: z.string().optional(),
  channel: z.string().optional(),
});

/**
 * Decode one frame. A frame carries a single message or an array of them;
 * items that do not fit the shape are dropped.
 */
export function parseFeedMessage(raw: string): RawMessage[] {
  let body: unknown;
  try {
    body = JSON.parse(raw);
  } catch (error) {
    log.debug('Ignoring non-JSON frame', { error: errorMessage(error) });
    return [];
  }

  const items: unknown[] = Array.isArray(body) ? body : [body];
  const messages: RawMessage[] = [];
  for (const item of items) {
    const parsed = FeedItemSchema.safeParse(item);
    if (parsed.success) {
      messages.push(parsed.data);
    } else {
      log.debug('Dropping malformed feed item', { issues: parsed.error.issues.length });
    }
  }
  return messages;
}

export type MessageSink = (message: RawMessage) => void;

export interface MessageFeedOptions {
  url: string;
  maxReconnectAttempts: number;
  reconnectDelayMs: number;
}

/**
 * Chatter stream client. Each decoded message is handed to the sink;
 * dropped connections are retried with exponential backoff.
 */
export class MessageFeed {
  private readonly options: MessageFeedOptions;
  private readonly sink: MessageSink;
  private ws: WebSocket | null = null;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private reconnectAttempts: number = 0;
  private isConnected: boolean = false;
  private closing: boolean = false;
  private received: number = 0;

  constructor(sink: MessageSink, options: Partial<MessageFeedOptions> = {}) {
    this.sink = sink;
    this.options = { ...FEED_CONFIG, ...options };
  }

  /**
   * Connect and start streaming. Resolves on the first open.
   */
  async connect(): Promise<void> {
    this.closing = false;
    return new Promise((resolve, reject) => {
      log.info('Connecting to message feed...', { url: this.options.url });

      const ws = new WebSocket(this.options.url);
      this.ws = ws;

      ws.on('open', () => {
        log.info('Message feed connected');
        this.isConnected = true;
        this.reconnectAttempts = 0;
        resolve();
      });

      ws.on('message', (data: WebSocket.RawData) => {
        this.handleFrame(data.toString());
      });

      ws.on('error', (error: Error) => {
        log.error('Message feed error', { error: error.message });
        if (!this.isConnected) {
          reject(error);
        }
      });

      ws.on('close', () => {
        const wasConnected = this.isConnected;
        this.isConnected = false;
        if (this.closing) return;
        log.warn('Message feed closed');
        if (wasConnected) {
          this.handleReconnect();
        }
      });
    });
  }

  /**
   * Deliver every message in a raw frame to the sink
   */
  handleFrame(raw: string): number {
    const messages = parseFeedMessage(raw);
    for (const message of messages) {
      this.received++;
      try {
        this.sink(message);
      } catch (error) {
        log.error('Message sink failed', { error: errorMessage(error) });
      }
    }
    return messages.length;
  }

  private handleReconnect(): void {
    if (this.reconnectAttempts >= this.options.maxReconnectAttempts) {
      log.error('Max reconnection attempts reached');
      return;
    }

    this.reconnectAttempts++;
    const delay = this.options.reconnectDelayMs * Math.pow(2, this.reconnectAttempts - 1);

    log.info(`Reconnecting in ${delay}ms...`, { attempt: this.reconnectAttempts });

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.connect().catch((error: unknown) => {
        log.error('Reconnection failed', { error: errorMessage(error) });
        this.handleReconnect();
      });
    }, delay);
  }

  disconnect(): void {
    this.closing = true;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    if (this.ws) {
      this.ws.close();
      this.ws = null;
      this.isConnected = false;
      log.info('Message feed disconnected');
    }
  }

  get connected(): boolean {
    return this.isConnected;
  }

  get messagesReceived(): number {
    return this.received;
  }
}
