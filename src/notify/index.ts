// =========================================================
// NOTIFIER — OUTBOUND TRADE AND STATUS MESSAGES
// =========================================================

import axios, { AxiosInstance } from 'axios';
import { NOTIFY_CONFIG } from '../config';
import { Logger, logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';

export interface Notifier {
  notify(text: string): Promise<void>;
}

/**
 * Writes notifications to the log. Used when no webhook is configured.
 */
export class LogNotifier implements Notifier {
  private readonly log: Logger;

  constructor(log: Logger = logger.child('notify')) {
    this.log = log;
  }

  async notify(text: string): Promise<void> {
    this.log.info(text);
  }
}

/**
 * POSTs `{ text, timestamp }` as JSON to a webhook. Delivery problems
 * are logged and counted, never thrown.
 */
export class WebhookNotifier implements Notifier {
  private readonly url: string;
  private readonly http: AxiosInstance;
  private readonly log: Logger = logger.child('notify');
  private delivered: number = 0;
  private failed: number = 0;

  constructor(url: string, timeoutMs: number = NOTIFY_CONFIG.timeoutMs, http?: AxiosInstance) {
    this.url = url;
    this.http = http ?? axios.create({ timeout: timeoutMs });
  }

  async notify(text: string): Promise<void> {
    try {
      await this.http.post(this.url, { text, timestamp: new Date().toISOString() });
      this.delivered++;
    } catch (error) {
      this.failed++;
      this.log.warn('Notification delivery failed', { error: errorMessage(error) });
    }
  }

  getStats(): { delivered: number; failed: number } {
    return { delivered: this.delivered, failed: this.failed };
  }
}

/**
 * Drops every message
 */
export class SilentNotifier implements Notifier {
  async notify(): Promise<void> {
    return;
  }
}

/**
 * Pick the notifier for the current configuration
 */
export function createNotifier(config: typeof NOTIFY_CONFIG = NOTIFY_CONFIG): Notifier {
  if (!config.enabled) return new SilentNotifier();
  if (config.webhookUrl) return new WebhookNotifier(config.webhookUrl, config.timeoutMs);
  return new LogNotifier();
}
