// =========================================================
// SIGNAL DETECTOR — CHATTER TO LAUNCH SIGNALS
// =========================================================

import * as crypto from 'crypto';
import { DetectorStats, RawMessage, Signal, TokenMetricsSnapshot } from '../types';
import { DETECTOR_CONFIG } from '../config';
import { calculateHype, formatHype } from './scoring';
import { extractAddress } from './extraction';
import { TokenRegistry } from './tokenTracker';
import { RingBuffer } from '../utils/ringBuffer';
import { EventBus } from '../utils/eventEmitter';
import { logger } from '../utils/logger';

export interface DetectorOptions {
  minHypeScore: number;
  windowMs: number;
  cleanupIntervalMs: number;
  maxTextLength: number;
}

const log = logger.child('detector');

function generateSignalId(timestamp: number): string {
  const randomPart = crypto.randomBytes(6).toString('hex');
  return `sig_${timestamp}_${randomPart}`;
}

/**
 * Signal Detector
 *
 * Scores each message for hype, pulls out the first contract address,
 * and keeps a rolling window of signals plus per-address metrics.
 * A message becomes a signal only when it names an address or its
 * hype clears the configured floor.
 */
export class SignalDetector {
  private readonly options: DetectorOptions;
  private readonly events?: EventBus;

  private signals: RingBuffer<Signal>;
  private registry: TokenRegistry = new TokenRegistry();
  private seenMessages: Map<string, number> = new Map(); // message id -> first seen
  private cleanupInterval: NodeJS.Timeout | null = null;

  private messagesProcessed: number = 0;
  private signalsEmitted: number = 0;

  constructor(options: Partial<DetectorOptions> = {}, events?: EventBus) {
    this.options = { ...DETECTOR_CONFIG, ...options };
    this.events = events;
    this.signals = new RingBuffer<Signal>(this.options.windowMs);
  }

  /**
   * Start periodic pruning of the rolling window
   */
  start(): void {
    if (this.cleanupInterval) return;
    this.cleanupInterval = setInterval(() => this.pruneExpired(), this.options.cleanupIntervalMs);
    log.info('Signal detector started', {
      minHypeScore: this.options.minHypeScore,
      windowHours: this.options.windowMs / 3600000,
    });
  }

  stop(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
  }

  /**
   * Entry point for ingestion sources. Messages whose id was already
   * seen inside the window are ignored.
   */
  ingest(message: RawMessage): Signal | null {
    const messageId = message.id?.trim() || undefined;
    const platform = message.platform?.trim() || 'unknown';
    const channel = message.channel?.trim() || 'unknown';

    if (messageId !== undefined) {
      if (this.seenMessages.has(messageId)) {
        log.debug('Duplicate message ignored', { messageId });
        return null;
      }
      this.seenMessages.set(messageId, Date.now());
    }

    this.events?.emit('message_received', { id: messageId ?? '', platform, channel });
    return this.extract(message.text, platform, channel, messageId);
  }

  /**
   * Score a message and emit a signal if it qualifies.
   * Anything that is not a non-empty string yields null.
   */
  extract(
    text: string | null | undefined,
    platform: string = 'unknown',
    channel: string = 'unknown',
    messageId?: string
  ): Signal | null {
    this.messagesProcessed++;

    if (typeof text !== 'string' || text.trim().length === 0) {
      return null;
    }

    const hype = calculateHype(text);
    const match = extractAddress(text);

    if (!match && hype.total < this.options.minHypeScore) {
      return null;
    }

    const timestamp = Date.now();
    const signal: Signal = Object.freeze({
      id: generateSignalId(timestamp),
      platform,
      channel,
      text: Array.from(text).slice(0, this.options.maxTextLength).join(''),
      address: match?.address,
      chain: match?.chain,
      hypeScore: hype.total,
      timestamp,
      messageId: messageId ?? `${platform}_${channel}_${timestamp}`,
    });

    if (match) {
      this.registry.recordMention(match.address, hype.total, `${platform}:${channel}`, timestamp);
    }

    this.signals.add(signal);
    this.signalsEmitted++;

    log.info('Signal detected', {
      address: signal.address,
      chain: signal.chain,
      hype: signal.hypeScore,
      source: `${platform}:${channel}`,
    });
    log.debug(formatHype(hype));

    this.events?.emit('signal_detected', signal);
    return signal;
  }

  /**
   * Highest hype first; ties go to the most recent signal
   */
  getTopSignals(limit: number = 10): Signal[] {
    return this.signals
      .getAll()
      .reverse()
      .sort((a, b) => b.hypeScore - a.hypeScore || b.timestamp - a.timestamp)
      .slice(0, Math.max(0, limit));
  }

  /**
   * Signals in the window, newest first
   */
  getRecentSignals(limit: number = 50): Signal[] {
    return this.signals.getAll().reverse().slice(0, Math.max(0, limit));
  }

  getTokenMetrics(address: string): TokenMetricsSnapshot | undefined {
    return this.registry.getTracker(address)?.getSnapshot();
  }

  /**
   * Drop signals, metrics and seen ids older than the window
   */
  pruneExpired(): void {
    const cutoff = Date.now() - this.options.windowMs;

    const signalsRemoved = this.signals.evictOld();
    const tokensRemoved = this.registry.pruneBefore(cutoff);

    let idsRemoved = 0;
    for (const [id, seenAt] of this.seenMessages) {
      if (seenAt < cutoff) {
        this.seenMessages.delete(id);
        idsRemoved++;
      }
    }

    if (signalsRemoved + tokensRemoved + idsRemoved > 0) {
      log.debug('Cleanup completed', { signalsRemoved, tokensRemoved, idsRemoved });
    }
  }

  getStats(): DetectorStats {
    return {
      signalsInWindow: this.signals.count(),
      trackedTokens: this.registry.size,
      seenMessages: this.seenMessages.size,
      messagesProcessed: this.messagesProcessed,
      signalsEmitted: this.signalsEmitted,
    };
  }
}
