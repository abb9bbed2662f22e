// =========================================================
// EXECUTION ENGINE — POSITION LIFECYCLE AND MONITORING
// =========================================================

import { EngineStats, ExitReason, Position, TradeGateway, TradeResult, isSupportedChain, normalizeAddress } from '../types';
import { ENGINE_CONFIG } from '../config';
import {
  PositionManager,
  applyBuyFill,
  applySellFill,
  createPendingPosition,
  transition,
  updatePrice,
} from './position';
import { ExitThresholds, evaluateExit } from './exitEngine';
import { PositionSizer } from './positionSizer';
import { EventBus } from '../utils/eventEmitter';
import { errorMessage, failure } from '../utils/errors';
import { withTimeout } from '../utils/timeout';
import { logger } from '../utils/logger';

const log = logger.child('engine');

export interface EngineOptions extends ExitThresholds {
  maxPositions: number;
  txTimeoutMs: number;
  useStrategyExits: boolean; // take target/stop from the sizer's risk profile
  historyLimit: number;
}

/**
 * Execution Engine
 *
 * Lifecycle: PENDING -> EXECUTING -> OPEN -> CLOSED
 *            PENDING -> CANCELLED (no usable size)
 *            EXECUTING -> FAILED (fill error or timeout)
 *
 * Positions are owned here. Callers and listeners only ever get copies.
 */
export class ExecutionEngine {
  private readonly gateway: TradeGateway;
  private readonly sizer: PositionSizer;
  private readonly options: EngineOptions;
  private readonly events?: EventBus;
  private readonly positions: PositionManager;

  private entryBalances: Map<string, number> = new Map(); // positionId -> wallet balance at entry
  private pendingBuys: Set<string> = new Set(); // addresses with a buy in flight
  private closing: Set<string> = new Set();
  private monitoring: boolean = false;

  private totalTrades: number = 0;
  private winningTrades: number = 0;
  private losingTrades: number = 0;
  private totalProfitUsd: number = 0;

  constructor(
    gateway: TradeGateway,
    sizer: PositionSizer,
    options: Partial<EngineOptions> = {},
    events?: EventBus
  ) {
    this.gateway = gateway;
    this.sizer = sizer;
    this.options = { ...ENGINE_CONFIG, ...options };
    this.events = events;
    this.positions = new PositionManager(this.options.historyLimit);
  }

  /**
   * Open a position. Without an explicit amount the sizer decides.
   */
  async executeBuy(rawAddress: string, chain: string, symbol: string = 'UNKNOWN', amountUsd?: number): Promise<TradeResult> {
    const address = normalizeAddress(rawAddress);
    const chainKey = chain.trim().toLowerCase();
    if (!isSupportedChain(chainKey)) {
      return failure('validation', `Unsupported chain: ${chain}`);
    }
    if (address === '') {
      return failure('validation', 'Empty token address');
    }

    const openCount = this.positions.openCount + this.pendingBuys.size;
    if (openCount >= this.options.maxPositions) {
      log.warn('Buy rejected: position ceiling reached', { address, maxPositions: this.options.maxPositions });
      return failure('capacity', `Max positions reached (${this.options.maxPositions})`);
    }
    if (this.positions.hasOpenPosition(address) || this.pendingBuys.has(address)) {
      return failure('capacity', `Position already open for ${address}`);
    }

    const refusal = this.sizer.checkRiskGate(openCount);
    if (refusal) {
      log.warn('Buy rejected by risk gate', { address, reason: refusal });
      return failure('capacity', refusal);
    }

    this.pendingBuys.add(address);
    try {
      return await this.openPosition(address, chainKey, symbol, openCount, amountUsd);
    } finally {
      this.pendingBuys.delete(address);
    }
  }

  private async openPosition(
    address: string,
    chain: Position['chain'],
    symbol: string,
    openCount: number,
    requestedUsd: number | undefined
  ): Promise<TradeResult> {
    let balanceUsd: number;
    try {
      balanceUsd = await withTimeout(this.gateway.getBalanceUsd(), this.options.txTimeoutMs, 'balance lookup');
    } catch (error) {
      log.error('Balance lookup failed', { address, error: errorMessage(error) });
      return failure('transient', `Balance lookup failed: ${errorMessage(error)}`);
    }

    let amountUsd: number;
    if (requestedUsd === undefined) {
      const decision = this.sizer.calculate(balanceUsd, openCount);
      if (!decision.canTrade) {
        return failure('capacity', decision.reason);
      }
      amountUsd = decision.amountUsd;
    } else {
      amountUsd = requestedUsd;
    }

    const position = createPendingPosition(address, chain, symbol, amountUsd);

    if (!(amountUsd > 0) || amountUsd > balanceUsd) {
      transition(position, 'CANCELLED');
      position.error = amountUsd > 0
        ? `Insufficient balance: ${balanceUsd.toFixed(2)} < ${amountUsd.toFixed(2)}`
        : `Invalid trade size: ${amountUsd}`;
      this.positions.archive(position);
      log.warn('Buy cancelled', { address, reason: position.error });
      return { ...failure(amountUsd > 0 ? 'capacity' : 'validation', position.error), position: { ...position } };
    }

    transition(position, 'EXECUTING');
    log.info('Executing buy', { id: position.id, address, chain, amountUsd: amountUsd.toFixed(2) });

    try {
      const fill = await withTimeout(this.gateway.buy(address, chain, amountUsd), this.options.txTimeoutMs, 'buy');
      applyBuyFill(position, fill);
    } catch (error) {
      transition(position, 'FAILED');
      position.error = errorMessage(error);
      this.positions.archive(position);
      log.error('Buy failed', { id: position.id, address, error: position.error });
      this.events?.emit('position_failed', { ...position });
      return { ...failure('transient', `Buy failed: ${position.error}`), position: { ...position } };
    }

    this.positions.add(position);
    this.entryBalances.set(position.id, balanceUsd);
    this.sizer.recordEntry();
    this.totalTrades++;

    log.info('Position opened', {
      id: position.id,
      address,
      symbol,
      entryPrice: position.entryPrice,
      amountUsd: amountUsd.toFixed(2),
      tx: position.entryTx,
    });
    this.events?.emit('position_opened', { ...position });

    return { success: true, position: { ...position } };
  }

  /**
   * Close an open position at the gateway's fill price
   */
  async executeSell(positionId: string, reason: ExitReason = 'MANUAL'): Promise<TradeResult> {
    const position = this.positions.getPosition(positionId);
    if (!position) {
      return failure('invariant', `Position not found: ${positionId}`);
    }
    if (this.closing.has(positionId)) {
      return { ...failure('transient', `Sell already in progress for ${positionId}`), position: { ...position } };
    }

    this.closing.add(positionId);
    try {
      const fill = await withTimeout(this.gateway.sell({ ...position }), this.options.txTimeoutMs, 'sell');
      applySellFill(position, fill, reason);
    } catch (error) {
      log.error('Sell failed, position stays open', { id: positionId, reason, error: errorMessage(error) });
      return { ...failure('transient', `Sell failed: ${errorMessage(error)}`), position: { ...position } };
    } finally {
      this.closing.delete(positionId);
    }

    this.positions.archive(position);
    this.recordClose(position);

    log.info('Position closed', {
      id: position.id,
      symbol: position.symbol,
      reason,
      pnlUsd: position.pnlUsd.toFixed(2),
      pnlPercent: position.pnlPercent.toFixed(2) + '%',
    });
    this.events?.emit('position_closed', { ...position });

    return { success: true, position: { ...position } };
  }

  private recordClose(position: Position): void {
    if (position.pnlUsd > 0) {
      this.winningTrades++;
    } else {
      this.losingTrades++;
    }
    this.totalProfitUsd += position.pnlUsd;

    const entryBalance = this.entryBalances.get(position.id);
    this.entryBalances.delete(position.id);
    const fraction = entryBalance !== undefined && entryBalance > 0 ? position.pnlUsd / entryBalance : 0;
    this.sizer.recordTradeResult(fraction);
  }

  /**
   * Thresholds in force for this tick
   */
  exitThresholds(): ExitThresholds {
    const { trailingStopPercent, maxHoldTimeHours } = this.options;
    if (this.options.useStrategyExits) {
      return {
        profitTargetPercent: this.sizer.limits.takeProfit * 100,
        stopLossPercent: this.sizer.limits.stopLoss * 100,
        trailingStopPercent,
        maxHoldTimeHours,
      };
    }
    return {
      profitTargetPercent: this.options.profitTargetPercent,
      stopLossPercent: this.options.stopLossPercent,
      trailingStopPercent,
      maxHoldTimeHours,
    };
  }

  /**
   * Re-price every open position and close the ones whose exit rule fired.
   * Works over a snapshot taken at the start; a tick that is still running
   * makes the next call a no-op. Returns the positions closed this tick.
   */
  async monitorTick(): Promise<Position[]> {
    if (this.monitoring) {
      log.debug('Monitor tick skipped, previous tick still running');
      return [];
    }

    this.monitoring = true;
    const closed: Position[] = [];
    try {
      const thresholds = this.exitThresholds();
      for (const position of this.positions.getOpenPositions()) {
        if (this.positions.getPosition(position.id) !== position || position.status !== 'OPEN') {
          continue;
        }

        let price: number;
        try {
          price = await withTimeout(this.gateway.getPrice({ ...position }), this.options.txTimeoutMs, 'price');
        } catch (error) {
          log.warn('Price update failed, skipping position this tick', { id: position.id, error: errorMessage(error) });
          continue;
        }
        if (!Number.isFinite(price) || price <= 0) {
          log.warn('Ignoring unusable price', { id: position.id, price });
          continue;
        }

        updatePrice(position, price);
        const reason = evaluateExit(position, thresholds);
        if (!reason) continue;

        log.info('Exit triggered', { id: position.id, reason, pnlPercent: position.pnlPercent.toFixed(2) + '%' });
        const result = await this.executeSell(position.id, reason);
        if (result.success) closed.push(result.position);
      }
    } finally {
      this.monitoring = false;
    }
    return closed;
  }

  /**
   * Close every open position, e.g. on shutdown
   */
  async closeAll(reason: ExitReason = 'EMERGENCY'): Promise<TradeResult[]> {
    const results: TradeResult[] = [];
    for (const position of this.positions.getOpenPositions()) {
      results.push(await this.executeSell(position.id, reason));
    }
    if (results.length > 0) {
      log.warn('Closed all positions', { reason, count: results.length });
    }
    return results;
  }

  getPosition(positionId: string): Position | undefined {
    const position = this.positions.getPosition(positionId);
    return position ? { ...position } : undefined;
  }

  getOpenPositions(): Position[] {
    return this.positions.getOpenPositions().map(p => ({ ...p }));
  }

  /**
   * Finished positions (closed, failed, cancelled), oldest first
   */
  getClosedPositions(): Position[] {
    return this.positions.getClosedPositions().map(p => ({ ...p }));
  }

  getSizer(): PositionSizer {
    return this.sizer;
  }

  getStats(): EngineStats {
    const decided = this.winningTrades + this.losingTrades;
    return {
      totalTrades: this.totalTrades,
      winningTrades: this.winningTrades,
      losingTrades: this.losingTrades,
      winRate: decided > 0 ? (this.winningTrades / decided) * 100 : 0,
      totalProfitUsd: this.totalProfitUsd,
      openPositions: this.positions.openCount,
      closedPositions: this.positions.closedCount,
    };
  }
}
