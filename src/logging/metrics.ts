// =========================================================
// PERFORMANCE METRICS — TRACKING AND ANALYSIS
// =========================================================

import { ExitReason, PerformanceMetrics, Position, TradeLog } from '../types';
import { TradeLogger, toTradeLog } from './tradeLogger';
import { logger } from '../utils/logger';

/**
 * Performance Metrics Calculator
 *
 * Win rate, average P&L %, average time in trade, best/worst trade,
 * and max drawdown of the running balance (starting balance plus
 * cumulative realized P&L).
 */
export class MetricsCalculator {
  private trades: TradeLog[] = [];
  private readonly startingBalance: number;
  private peakBalance: number;
  private currentBalance: number;
  private maxDrawdown: number = 0;

  constructor(startingBalance: number = 0) {
    this.startingBalance = startingBalance;
    this.peakBalance = startingBalance;
    this.currentBalance = startingBalance;
  }

  /**
   * Add a closed position
   */
  addTrade(position: Position): void {
    this.addLog(toTradeLog(position));
  }

  private addLog(trade: TradeLog): void {
    this.trades.push(trade);
    this.updateDrawdown(trade.pnlUsd);
  }

  private updateDrawdown(pnl: number): void {
    this.currentBalance += pnl;

    if (this.currentBalance > this.peakBalance) {
      this.peakBalance = this.currentBalance;
    }

    if (this.peakBalance > 0) {
      const drawdown = ((this.peakBalance - this.currentBalance) / this.peakBalance) * 100;
      if (drawdown > this.maxDrawdown) {
        this.maxDrawdown = drawdown;
      }
    }
  }

  /**
   * Calculate all performance metrics
   */
  calculate(): PerformanceMetrics {
    const totalTrades = this.trades.length;

    if (totalTrades === 0) {
      return {
        totalTrades: 0,
        wins: 0,
        losses: 0,
        winRate: 0,
        avgPnlPercent: 0,
        avgTimeInTrade: 0,
        totalPnlUsd: 0,
        bestTradeUsd: 0,
        worstTradeUsd: 0,
        maxDrawdown: 0,
      };
    }

    const wins = this.trades.filter(t => t.pnlUsd > 0).length;
    const losses = totalTrades - wins;
    const pnls = this.trades.map(t => t.pnlUsd);
    const totalPnlUsd = pnls.reduce((sum, p) => sum + p, 0);

    const durations: number[] = [];
    for (const trade of this.trades) {
      if (trade.exitTime !== undefined) {
        durations.push(trade.exitTime - trade.entryTime);
      }
    }

    return {
      totalTrades,
      wins,
      losses,
      winRate: (wins / totalTrades) * 100,
      avgPnlPercent: this.trades.reduce((sum, t) => sum + t.pnlPercent, 0) / totalTrades,
      avgTimeInTrade: durations.length > 0 ? durations.reduce((a, b) => a + b, 0) / durations.length : 0,
      totalPnlUsd,
      bestTradeUsd: Math.max(...pnls),
      worstTradeUsd: Math.min(...pnls),
      maxDrawdown: this.maxDrawdown,
    };
  }

  /**
   * Count of closes per exit reason
   */
  getExitReasonBreakdown(): Map<ExitReason | 'unknown', number> {
    const breakdown = new Map<ExitReason | 'unknown', number>();

    for (const trade of this.trades) {
      const reason = trade.exitReason ?? 'unknown';
      breakdown.set(reason, (breakdown.get(reason) ?? 0) + 1);
    }

    return breakdown;
  }

  /**
   * Get formatted summary
   */
  getSummary(): string {
    const m = this.calculate();

    const lines = [
      '═══════════════════════════════════════════',
      '          PERFORMANCE METRICS SUMMARY       ',
      '═══════════════════════════════════════════',
      '',
      `Total Trades:        ${m.totalTrades}`,
      `Wins:                ${m.wins}`,
      `Losses:              ${m.losses}`,
      `Win Rate:            ${m.winRate.toFixed(1)}%`,
      `Avg P&L:             ${m.avgPnlPercent.toFixed(2)}%`,
      `Avg Time in Trade:   ${(m.avgTimeInTrade / 1000).toFixed(0)}s`,
      `Total P&L:           $${m.totalPnlUsd.toFixed(2)}`,
      `Best Trade:          $${m.bestTradeUsd.toFixed(2)}`,
      `Worst Trade:         $${m.worstTradeUsd.toFixed(2)}`,
      `Max Drawdown:        ${m.maxDrawdown.toFixed(1)}%`,
    ];

    const breakdown = this.getExitReasonBreakdown();
    if (breakdown.size > 0) {
      lines.push('', 'Exits by reason:');
      for (const [reason, count] of breakdown) {
        lines.push(`  ${reason.padEnd(18)}${count}`);
      }
    }

    lines.push('═══════════════════════════════════════════');

    return lines.join('\n');
  }

  /**
   * Load trades from log files
   */
  loadFromLogs(logFiles: string[]): void {
    for (const file of logFiles) {
      for (const trade of TradeLogger.readTrades(file)) {
        this.addLog(trade);
      }
    }

    logger.info('Loaded trades from logs', { count: this.trades.length });
  }

  get tradeCount(): number {
    return this.trades.length;
  }

  clear(): void {
    this.trades = [];
    this.peakBalance = this.startingBalance;
    this.currentBalance = this.startingBalance;
    this.maxDrawdown = 0;
  }
}
