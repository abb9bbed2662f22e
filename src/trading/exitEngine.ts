// =========================================================
// EXIT ENGINE — EXIT RULES IN FIXED PRIORITY
// =========================================================

import { ExitReason, Position } from '../types';
import { hoursHeld } from './position';

export interface ExitThresholds {
  profitTargetPercent: number;
  stopLossPercent: number;
  trailingStopPercent: number; // 0 disables the trailing stop
  maxHoldTimeHours: number; // 0 disables the time limit
}

/**
 * Slack for percent comparisons so values like (2.00 - 1.60) / 2.00
 * land on the threshold instead of just under it
 */
const PERCENT_EPSILON = 1e-9;

/**
 * Percent drop from peak to current; 0 when there is no usable peak
 */
export function drawdownPercent(peakPrice: number, currentPrice: number): number {
  if (peakPrice <= 0) return 0;
  return ((peakPrice - currentPrice) / peakPrice) * 100;
}

/**
 * Decide whether a position should close.
 *
 * First rule satisfied wins:
 * 1. PROFIT_TARGET  pnl% >= target
 * 2. STOP_LOSS      pnl% <= -stop
 * 3. TRAILING_STOP  drawdown from peak >= trailing%
 * 4. TIME_LIMIT     held longer than max hold hours
 */
export function evaluateExit(
  position: Position,
  thresholds: ExitThresholds,
  now: number = Date.now()
): ExitReason | null {
  if (position.pnlPercent + PERCENT_EPSILON >= thresholds.profitTargetPercent) {
    return 'PROFIT_TARGET';
  }

  if (position.pnlPercent - PERCENT_EPSILON <= -thresholds.stopLossPercent) {
    return 'STOP_LOSS';
  }

  if (thresholds.trailingStopPercent > 0 && position.peakPrice > 0 &&
      drawdownPercent(position.peakPrice, position.currentPrice) + PERCENT_EPSILON >= thresholds.trailingStopPercent) {
    return 'TRAILING_STOP';
  }

  if (thresholds.maxHoldTimeHours > 0 && hoursHeld(position, now) > thresholds.maxHoldTimeHours) {
    return 'TIME_LIMIT';
  }

  return null;
}
