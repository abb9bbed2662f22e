// =========================================================
// TOKEN TRACKER — PER-ADDRESS CHATTER METRICS
// =========================================================

import { TokenMetricsSnapshot } from '../types';

/**
 * Tracks how often and how loudly one address is being mentioned
 */
export class TokenTracker {
  readonly address: string;
  readonly firstSeen: number;

  private _lastSeen: number;
  private _messageCount: number = 0;
  private _totalHype: number = 0;
  private _sources: Set<string> = new Set();

  constructor(address: string, timestamp: number) {
    this.address = address;
    this.firstSeen = timestamp;
    this._lastSeen = timestamp;
  }

  /**
   * Record one mention
   */
  addMention(hypeScore: number, source: string, timestamp: number): void {
    this._messageCount++;
    this._totalHype += hypeScore;
    this._sources.add(source);
    if (timestamp > this._lastSeen) {
      this._lastSeen = timestamp;
    }
  }

  /**
   * Mean hype per mention
   */
  get averageHype(): number {
    return this._messageCount > 0 ? this._totalHype / this._messageCount : 0;
  }

  /**
   * Mentions per minute between first and last sighting
   */
  get velocity(): number {
    const elapsedMinutes = (this._lastSeen - this.firstSeen) / 60000;
    return elapsedMinutes > 0 ? this._messageCount / elapsedMinutes : 0;
  }

  /**
   * Get current state snapshot
   */
  getSnapshot(): TokenMetricsSnapshot {
    return {
      address: this.address,
      messageCount: this._messageCount,
      totalHype: this._totalHype,
      averageHype: this.averageHype,
      firstSeen: this.firstSeen,
      lastSeen: this._lastSeen,
      velocity: this.velocity,
      sources: [...this._sources],
    };
  }

  // Getters
  get lastSeen(): number { return this._lastSeen; }
  get messageCount(): number { return this._messageCount; }
  get totalHype(): number { return this._totalHype; }
}

/**
 * Registry of trackers keyed by address
 */
export class TokenRegistry {
  private trackers: Map<string, TokenTracker> = new Map();

  /**
   * Record a mention, creating the tracker on first sighting
   */
  recordMention(address: string, hypeScore: number, source: string, timestamp: number): TokenTracker {
    let tracker = this.trackers.get(address);
    if (!tracker) {
      tracker = new TokenTracker(address, timestamp);
      this.trackers.set(address, tracker);
    }
    tracker.addMention(hypeScore, source, timestamp);
    return tracker;
  }

  /**
   * Get a tracker by address
   */
  getTracker(address: string): TokenTracker | undefined {
    return this.trackers.get(address);
  }

  /**
   * Remove trackers not seen since the cutoff. Returns how many were removed.
   */
  pruneBefore(cutoff: number): number {
    let removed = 0;
    for (const [address, tracker] of this.trackers) {
      if (tracker.lastSeen < cutoff) {
        this.trackers.delete(address);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.trackers.size;
  }
}
