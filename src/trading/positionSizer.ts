// =========================================================
// POSITION SIZER — ALLOCATION AND RISK GATE
// =========================================================

import { RiskLimits, SizerStatus, SizingDecision, SizingStrategy } from '../types';
import { ADAPTIVE_SIZING, RISK_PROFILES } from '../config';
import { logger } from '../utils/logger';

const log = logger.child('sizer');

/**
 * Local calendar day, used to roll daily counters
 */
function dayKey(timestamp: number): string {
  const d = new Date(timestamp);
  return `${d.getFullYear()}-${String(d.getMonth() + 1).padStart(2, '0')}-${String(d.getDate()).padStart(2, '0')}`;
}

/**
 * Position Sizer
 *
 * allocation = balance * basePercent, clamped to [minTrade, maxTrade],
 * then cut 10% per open position (never below half).
 *
 * ADAPTIVE moves basePercent with recent results:
 * - 3+ wins in a row: +3pp per win, at most +15pp
 * - otherwise 2+ losses in a row: -5pp per loss, at most -10pp
 * - past half the daily loss limit: scaled down by up to 30%
 * - always kept within [5%, 30%]
 */
export class PositionSizer {
  readonly strategy: SizingStrategy;
  readonly limits: RiskLimits;

  private tradesToday: number = 0;
  private totalTrades: number = 0;
  private winStreak: number = 0;
  private lossStreak: number = 0;
  private dailyPnl: number = 0; // fraction of balance
  private currentDay: string;

  constructor(strategy: SizingStrategy = 'ADAPTIVE', limits?: RiskLimits) {
    this.strategy = strategy;
    this.limits = limits ?? RISK_PROFILES[strategy];
    this.currentDay = dayKey(Date.now());
  }

  /**
   * Fraction of balance to allocate before clamping
   */
  basePercent(): number {
    if (this.strategy !== 'ADAPTIVE') {
      return this.limits.maxPositionSize;
    }

    const a = ADAPTIVE_SIZING;
    let percent = a.basePercent;

    if (this.winStreak >= a.winStreakThreshold) {
      percent += Math.min(a.winCap, this.winStreak * a.winStep);
    } else if (this.lossStreak >= a.lossStreakThreshold) {
      percent -= Math.min(a.lossCap, this.lossStreak * a.lossStep);
    }

    const proximity = Math.max(0, -this.dailyPnl) / this.limits.dailyLossLimit;
    if (proximity > 0.5) {
      percent *= 1 - proximity * 0.3;
    }

    return Math.max(a.floor, Math.min(a.ceiling, percent));
  }

  /**
   * Reason a new trade is refused, or null when it may proceed
   */
  checkRiskGate(openPositions: number): string | null {
    this.rolloverIfNewDay();

    if (openPositions >= this.limits.maxOpenPositions) {
      return `Max open positions reached (${this.limits.maxOpenPositions})`;
    }
    if (this.tradesToday >= this.limits.maxTradesPerDay) {
      return `Daily trade limit reached (${this.limits.maxTradesPerDay})`;
    }
    if (this.dailyPnl <= -this.limits.dailyLossLimit) {
      return `Daily loss limit hit (${(this.dailyPnl * 100).toFixed(2)}%)`;
    }
    if (this.lossStreak >= ADAPTIVE_SIZING.circuitBreakerLosses) {
      return `Losing streak circuit breaker (${this.lossStreak} losses)`;
    }
    return null;
  }

  /**
   * Size a new trade for the given balance and open-position count
   */
  calculate(balanceUsd: number, openPositions: number): SizingDecision {
    const refusal = this.checkRiskGate(openPositions);
    if (refusal) {
      log.warn('Trade refused by risk gate', { reason: refusal });
      return { canTrade: false, reason: refusal };
    }

    const fraction = this.basePercent();
    let amountUsd = Math.max(this.limits.minTradeUsd, Math.min(balanceUsd * fraction, this.limits.maxTradeUsd));

    if (openPositions > 0) {
      amountUsd *= Math.max(0.5, 1 - 0.1 * openPositions);
    }

    log.debug('Position sized', { amountUsd, fraction, balanceUsd, openPositions });
    return { canTrade: true, amountUsd, fraction };
  }

  /**
   * Count an opened trade against today's cap
   */
  recordEntry(): void {
    this.rolloverIfNewDay();
    this.tradesToday++;
  }

  /**
   * Feed a closed trade's result (profit as a fraction of balance)
   */
  recordTradeResult(profitFraction: number): void {
    this.rolloverIfNewDay();
    this.totalTrades++;
    this.dailyPnl += profitFraction;

    if (profitFraction > 0) {
      this.winStreak++;
      this.lossStreak = 0;
    } else {
      this.lossStreak++;
      this.winStreak = 0;
    }
  }

  /**
   * Zero today's counters (streaks carry over)
   */
  resetDaily(): void {
    log.info('Daily sizing stats reset', {
      tradesToday: this.tradesToday,
      dailyPnlPercent: (this.dailyPnl * 100).toFixed(2),
    });
    this.tradesToday = 0;
    this.dailyPnl = 0;
    this.currentDay = dayKey(Date.now());
  }

  private rolloverIfNewDay(): void {
    if (dayKey(Date.now()) !== this.currentDay) {
      this.resetDaily();
    }
  }

  getStatus(): SizerStatus {
    return {
      strategy: this.strategy,
      basePercent: this.basePercent(),
      tradesToday: this.tradesToday,
      totalTrades: this.totalTrades,
      winStreak: this.winStreak,
      lossStreak: this.lossStreak,
      dailyPnl: this.dailyPnl,
    };
  }
}
