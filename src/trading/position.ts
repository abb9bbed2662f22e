// =========================================================
// POSITION — LIFECYCLE, VALUATION AND BOOKKEEPING
// =========================================================

import * as crypto from 'crypto';
import { BuyFill, Chain, ExitReason, Position, SellFill, TradeStatus, normalizeAddress } from '../types';
import { BoundedHistory } from '../utils/ringBuffer';
import { InvariantError } from '../utils/errors';

/**
 * Legal lifecycle moves
 */
const TRANSITIONS: Record<TradeStatus, readonly TradeStatus[]> = {
  PENDING: ['EXECUTING', 'CANCELLED'],
  EXECUTING: ['OPEN', 'FAILED'],
  OPEN: ['CLOSED'],
  CLOSED: [],
  FAILED: [],
  CANCELLED: [],
};

export function isTerminal(status: TradeStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

/**
 * Generate a unique position ID
 */
function generatePositionId(): string {
  const randomPart = crypto.randomBytes(6).toString('hex');
  return `pos_${Date.now()}_${randomPart}`;
}

export function createPendingPosition(address: string, chain: Chain, symbol: string, amountUsd: number): Position {
  return {
    id: generatePositionId(),
    address,
    chain,
    symbol,
    status: 'PENDING',
    createdAt: Date.now(),
    entryPrice: 0,
    entryAmountUsd: amountUsd,
    tokenAmount: 0,
    currentPrice: 0,
    currentValueUsd: 0,
    peakPrice: 0,
    pnlUsd: 0,
    pnlPercent: 0,
  };
}

/**
 * Move a position to a new status, refusing anything the table does not allow
 */
export function transition(position: Position, to: TradeStatus): void {
  if (!TRANSITIONS[position.status].includes(to)) {
    throw new InvariantError(`Illegal transition for ${position.id}: ${position.status} -> ${to}`);
  }
  position.status = to;
}

/**
 * Record the buy fill and open the position in one step
 */
export function applyBuyFill(position: Position, fill: BuyFill): void {
  transition(position, 'OPEN');
  position.entryTime = Date.now();
  position.entryPrice = fill.price;
  position.tokenAmount = fill.tokenAmount;
  position.entryTx = fill.txRef;
  position.peakPrice = fill.price;
  updatePrice(position, fill.price);
}

/**
 * Re-value at a new price. The peak only ever moves up.
 */
export function updatePrice(position: Position, price: number): void {
  position.currentPrice = price;
  position.currentValueUsd = position.tokenAmount * price;
  position.peakPrice = Math.max(position.peakPrice, price);
  position.pnlUsd = position.currentValueUsd - position.entryAmountUsd;
  position.pnlPercent = position.entryAmountUsd > 0
    ? (position.currentValueUsd / position.entryAmountUsd - 1) * 100
    : 0;
}

export function applySellFill(position: Position, fill: SellFill, reason: ExitReason): void {
  updatePrice(position, fill.price);
  transition(position, 'CLOSED');
  position.exitTime = Date.now();
  position.exitPrice = fill.price;
  position.exitAmountUsd = position.currentValueUsd;
  position.exitTx = fill.txRef;
  position.exitReason = reason;
}

/**
 * Hours since the entry fill (0 before it)
 */
export function hoursHeld(position: Position, now: number = Date.now()): number {
  return position.entryTime === undefined ? 0 : (now - position.entryTime) / 3600000;
}

/**
 * Open-position store plus bounded history of finished ones
 */
export class PositionManager {
  private positions: Map<string, Position> = new Map();
  private history: BoundedHistory<Position>;
  private tokenToPosition: Map<string, string> = new Map(); // address -> positionId

  constructor(historyLimit: number) {
    this.history = new BoundedHistory<Position>(historyLimit);
  }

  /**
   * Track an open position
   */
  add(position: Position): void {
    this.positions.set(position.id, position);
    this.tokenToPosition.set(normalizeAddress(position.address), position.id);
  }

  /**
   * Move a finished position out of the open set
   */
  archive(position: Position): void {
    if (this.positions.get(position.id) === position) {
      this.positions.delete(position.id);
      this.tokenToPosition.delete(normalizeAddress(position.address));
    }
    this.history.push(position);
  }

  getPosition(positionId: string): Position | undefined {
    return this.positions.get(positionId);
  }

  hasOpenPosition(address: string): boolean {
    return this.tokenToPosition.has(normalizeAddress(address));
  }

  /**
   * Live positions (internal references)
   */
  getOpenPositions(): Position[] {
    return Array.from(this.positions.values());
  }

  getClosedPositions(): Position[] {
    return this.history.getAll();
  }

  get openCount(): number {
    return this.positions.size;
  }

  get closedCount(): number {
    return this.history.length;
  }
}
