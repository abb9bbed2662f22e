// =========================================================
// TRADE LOGGER — JSONL OUTPUT
// =========================================================

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { Position, TradeLog } from '../types';
import { LOG_CONFIG } from '../config';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

const log = logger.child('trade-log');

const TradeLogSchema = z.object({
  id: z.string(),
  address: z.string(),
  chain: z.enum(['ethereum', 'solana']),
  symbol: z.string(),
  entryTime: z.number(),
  entryPrice: z.number(),
  entryAmountUsd: z.number(),
  exitTime: z.number().optional(),
  exitPrice: z.number().optional(),
  exitAmountUsd: z.number().optional(),
  exitReason: z.enum(['PROFIT_TARGET', 'STOP_LOSS', 'TRAILING_STOP', 'TIME_LIMIT', 'MANUAL', 'EMERGENCY']).optional(),
  peakPrice: z.number(),
  pnlUsd: z.number(),
  pnlPercent: z.number(),
});

/**
 * Flatten a finished position into its log record
 */
export function toTradeLog(position: Position): TradeLog {
  return {
    id: position.id,
    address: position.address,
    chain: position.chain,
    symbol: position.symbol,
    entryTime: position.entryTime ?? position.createdAt,
    entryPrice: position.entryPrice,
    entryAmountUsd: position.entryAmountUsd,
    exitTime: position.exitTime,
    exitPrice: position.exitPrice,
    exitAmountUsd: position.exitAmountUsd,
    exitReason: position.exitReason,
    peakPrice: position.peakPrice,
    pnlUsd: position.pnlUsd,
    pnlPercent: position.pnlPercent,
  };
}

/**
 * Parse JSONL content. Blank, malformed and non-trade lines are skipped.
 */
export function parseTradeLines(content: string): TradeLog[] {
  const trades: TradeLog[] = [];
  for (const line of content.split('\n')) {
    if (line.trim().length === 0) continue;
    let body: unknown;
    try {
      body = JSON.parse(line);
    } catch {
      continue;
    }
    const parsed = TradeLogSchema.safeParse(body);
    if (parsed.success) {
      trades.push(parsed.data);
    }
  }
  return trades;
}

/**
 * Appends closed trades to `trades_YYYY-MM-DD.jsonl` for later analysis
 */
export class TradeLogger {
  private logDir: string;
  private logFile: string;
  private stream: fs.WriteStream | null = null;

  constructor(logDir: string = LOG_CONFIG.dir) {
    this.logDir = logDir;
    this.logFile = path.join(this.logDir, `trades_${this.getDateString()}.jsonl`);
    this.init();
  }

  private init(): void {
    try {
      if (!fs.existsSync(this.logDir)) {
        fs.mkdirSync(this.logDir, { recursive: true });
      }

      this.stream = fs.createWriteStream(this.logFile, { flags: 'a' });

      log.info('Trade logger initialized', { file: this.logFile });
    } catch (error) {
      log.error('Failed to initialize trade logger', { error: errorMessage(error) });
    }
  }

  private getDateString(): string {
    const now = new Date();
    return `${now.getFullYear()}-${String(now.getMonth() + 1).padStart(2, '0')}-${String(now.getDate()).padStart(2, '0')}`;
  }

  /**
   * Log a completed trade
   */
  logTrade(position: Position): void {
    this.rotate();
    if (!this.stream) {
      log.error('Trade logger stream not available');
      return;
    }

    try {
      this.stream.write(JSON.stringify(toTradeLog(position)) + '\n');
    } catch (error) {
      log.error('Failed to write trade log', { error: errorMessage(error) });
    }
  }

  /**
   * Read all trades from a log file
   */
  static readTrades(filePath: string): TradeLog[] {
    try {
      return parseTradeLines(fs.readFileSync(filePath, 'utf-8'));
    } catch (error) {
      log.error('Failed to read trade log', { filePath, error: errorMessage(error) });
      return [];
    }
  }

  /**
   * Trade log files in a directory, oldest first
   */
  static listLogFiles(logDir: string = LOG_CONFIG.dir): string[] {
    try {
      return fs.readdirSync(logDir)
        .filter(f => f.startsWith('trades_') && f.endsWith('.jsonl'))
        .map(f => path.join(logDir, f))
        .sort();
    } catch (error) {
      log.error('Failed to list log files', { logDir, error: errorMessage(error) });
      return [];
    }
  }

  get currentFile(): string {
    return this.logFile;
  }

  /**
   * Switch to a new file when the date has changed
   */
  rotate(): void {
    const newFile = path.join(this.logDir, `trades_${this.getDateString()}.jsonl`);

    if (newFile !== this.logFile) {
      if (this.stream) {
        this.stream.end();
      }

      this.logFile = newFile;
      this.stream = fs.createWriteStream(this.logFile, { flags: 'a' });

      log.info('Trade log rotated', { file: this.logFile });
    }
  }

  /**
   * Flush and close. Resolves once the file is written.
   */
  close(): Promise<void> {
    const stream = this.stream;
    this.stream = null;
    if (!stream) return Promise.resolve();
    return new Promise(resolve => stream.end(() => resolve()));
  }
}
