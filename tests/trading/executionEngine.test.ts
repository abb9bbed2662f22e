import { describe, expect, it, vi } from 'vitest';
import { ExecutionEngine, EngineOptions } from '../../src/trading/executionEngine';
import { PositionSizer } from '../../src/trading/positionSizer';
import { EventBus } from '../../src/utils/eventEmitter';
import { fakeGateway } from '../helpers/gateway';
import { BuyFill } from '../../src/types';

const TOKEN_A = '0x' + 'a1'.repeat(20);
const TOKEN_B = '0x' + 'b2'.repeat(20);
const TOKEN_C = '0x' + 'c3'.repeat(20);

const OPTIONS: EngineOptions = {
  profitTargetPercent: 100,
  stopLossPercent: 50,
  trailingStopPercent: 20,
  maxHoldTimeHours: 24,
  maxPositions: 5,
  txTimeoutMs: 1000,
  useStrategyExits: false,
  historyLimit: 100,
};

function setup(options: Partial<EngineOptions> = {}, balanceUsd: number = 1000) {
  const { gateway, prices } = fakeGateway(balanceUsd);
  const sizer = new PositionSizer('ADAPTIVE');
  const events = new EventBus();
  const engine = new ExecutionEngine(gateway, sizer, { ...OPTIONS, ...options }, events);
  return { engine, gateway, prices, sizer, events };
}

describe('ExecutionEngine.executeBuy', () => {
  it('opens a sized position', async () => {
    const { engine, gateway } = setup();
    const result = await engine.executeBuy(TOKEN_A, 'Ethereum', 'TST');

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.position.status).toBe('OPEN');
    expect(result.position.chain).toBe('ethereum');
    expect(result.position.entryAmountUsd).toBeCloseTo(150);
    expect(result.position.entryPrice).toBe(1);
    expect(result.position.entryTx).toBe('tx-buy');
    expect(gateway.buy).toHaveBeenCalledWith(TOKEN_A, 'ethereum', result.position.entryAmountUsd);
    expect(engine.getOpenPositions()).toHaveLength(1);
    expect(engine.getSizer().getStatus().tradesToday).toBe(1);
  });

  it('uses an explicit amount when given', async () => {
    const { engine } = setup();
    const result = await engine.executeBuy(TOKEN_A, 'solana', 'SOLT', 40);
    expect(result.success && result.position.entryAmountUsd).toBe(40);
  });

  it('rejects unsupported chains and blank addresses', async () => {
    const { engine, gateway } = setup();

    await expect(engine.executeBuy(TOKEN_A, 'bsc')).resolves.toEqual({
      success: false,
      kind: 'validation',
      error: 'Unsupported chain: bsc',
    });
    await expect(engine.executeBuy('  ', 'ethereum')).resolves.toMatchObject({ kind: 'validation' });
    expect(gateway.getBalanceUsd).not.toHaveBeenCalled();
  });

  it('refuses a second position on the same token', async () => {
    const { engine } = setup();
    await engine.executeBuy(TOKEN_A, 'ethereum');

    await expect(engine.executeBuy(TOKEN_A, 'ethereum')).resolves.toEqual({
      success: false,
      kind: 'capacity',
      error: `Position already open for ${TOKEN_A}`,
    });
  });

  it('counts in-flight buys against the same token', async () => {
    const { engine, gateway } = setup();
    const first = engine.executeBuy(TOKEN_A, 'ethereum');
    const second = await engine.executeBuy(TOKEN_A, 'ethereum');

    expect(second).toMatchObject({ success: false, kind: 'capacity' });
    expect((await first).success).toBe(true);
    expect(gateway.buy).toHaveBeenCalledTimes(1);
  });

  it('treats differently cased EVM addresses as one token', async () => {
    const { engine, gateway } = setup();
    const upper = '0x' + 'A1'.repeat(20);
    const first = engine.executeBuy(upper, 'ethereum');

    await expect(engine.executeBuy(TOKEN_A, 'ethereum')).resolves.toMatchObject({ success: false, kind: 'capacity' });
    const opened = await first;
    expect(opened.success && opened.position.address).toBe(TOKEN_A);
    await expect(engine.executeBuy(upper, 'ethereum')).resolves.toEqual({
      success: false,
      kind: 'capacity',
      error: `Position already open for ${TOKEN_A}`,
    });
    expect(gateway.buy).toHaveBeenCalledTimes(1);
    expect(engine.getOpenPositions()).toHaveLength(1);
  });

  it('enforces the position ceiling', async () => {
    const { engine, gateway } = setup({ maxPositions: 2 });
    await engine.executeBuy(TOKEN_A, 'ethereum');
    await engine.executeBuy(TOKEN_B, 'ethereum');

    await expect(engine.executeBuy(TOKEN_C, 'ethereum')).resolves.toEqual({
      success: false,
      kind: 'capacity',
      error: 'Max positions reached (2)',
    });
    expect(gateway.buy).toHaveBeenCalledTimes(2);
    expect(engine.getClosedPositions()).toEqual([]);
  });

  it('passes on the risk gate refusal', async () => {
    const { engine, sizer, gateway } = setup();
    for (let i = 0; i < 5; i++) sizer.recordTradeResult(-0.001);

    await expect(engine.executeBuy(TOKEN_A, 'ethereum')).resolves.toEqual({
      success: false,
      kind: 'capacity',
      error: 'Losing streak circuit breaker (5 losses)',
    });
    expect(gateway.buy).not.toHaveBeenCalled();
  });

  it('cancels a non-positive size', async () => {
    const { engine, gateway } = setup();
    const result = await engine.executeBuy(TOKEN_A, 'ethereum', 'TST', 0);

    expect(result).toMatchObject({ success: false, kind: 'validation', error: 'Invalid trade size: 0' });
    expect(result.position?.status).toBe('CANCELLED');
    expect(engine.getClosedPositions().map(p => p.status)).toEqual(['CANCELLED']);
    expect(gateway.buy).not.toHaveBeenCalled();
  });

  it('cancels a size above the balance', async () => {
    const { engine } = setup({}, 1000);
    const result = await engine.executeBuy(TOKEN_A, 'ethereum', 'TST', 2000);

    expect(result).toMatchObject({
      success: false,
      kind: 'capacity',
      error: 'Insufficient balance: 1000.00 < 2000.00',
    });
    expect(result.position?.status).toBe('CANCELLED');
  });

  it('marks the position FAILED when the buy errors', async () => {
    const { engine, gateway, events } = setup();
    const failed = vi.fn();
    events.on('position_failed', failed);
    gateway.buy.mockRejectedValueOnce(new Error('rpc down'));

    const result = await engine.executeBuy(TOKEN_A, 'ethereum', 'TST', 50);

    expect(result).toMatchObject({ success: false, kind: 'transient', error: 'Buy failed: rpc down' });
    expect(result.position?.status).toBe('FAILED');
    expect(result.position?.error).toBe('rpc down');
    expect(failed).toHaveBeenCalledTimes(1);
    expect(engine.getOpenPositions()).toEqual([]);
    expect(engine.getStats().totalTrades).toBe(0);
  });

  it('times out a buy that never settles', async () => {
    const { engine, gateway } = setup({ txTimeoutMs: 30 });
    gateway.buy.mockImplementationOnce(() => new Promise<BuyFill>(() => {}));

    const result = await engine.executeBuy(TOKEN_A, 'ethereum', 'TST', 50);
    expect(result).toMatchObject({ success: false, error: 'Buy failed: buy timed out after 30ms' });
  });

  it('reports a failed balance lookup as transient', async () => {
    const { engine, gateway } = setup();
    gateway.getBalanceUsd.mockRejectedValueOnce(new Error('wallet offline'));

    await expect(engine.executeBuy(TOKEN_A, 'ethereum')).resolves.toEqual({
      success: false,
      kind: 'transient',
      error: 'Balance lookup failed: wallet offline',
    });
  });

  it('publishes position_opened with a copy', async () => {
    const { engine, events } = setup();
    const opened = vi.fn();
    events.on('position_opened', opened);

    const result = await engine.executeBuy(TOKEN_A, 'ethereum', 'TST', 50);
    const payload = opened.mock.calls[0][0].data;
    payload.status = 'CLOSED';

    expect(result.success && engine.getPosition(result.position.id)?.status).toBe('OPEN');
  });
});

describe('ExecutionEngine.executeSell', () => {
  it('reports unknown positions as an invariant failure', async () => {
    const { engine } = setup();
    await expect(engine.executeSell('nope')).resolves.toEqual({
      success: false,
      kind: 'invariant',
      error: 'Position not found: nope',
    });
  });

  it('closes at the fill price and books the result', async () => {
    const { engine, gateway, sizer, events } = setup();
    const closedEvents = vi.fn();
    events.on('position_closed', closedEvents);
    const opened = await engine.executeBuy(TOKEN_A, 'ethereum', 'TST', 100);
    if (!opened.success) throw new Error('buy failed');
    gateway.sell.mockResolvedValueOnce({ price: 1.5, txRef: 'tx-sell' });

    const result = await engine.executeSell(opened.position.id, 'MANUAL');

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.position.status).toBe('CLOSED');
    expect(result.position.exitReason).toBe('MANUAL');
    expect(result.position.pnlUsd).toBe(50);
    expect(result.position.exitTx).toBe('tx-sell');
    expect(engine.getStats()).toMatchObject({
      winningTrades: 1,
      losingTrades: 0,
      winRate: 100,
      totalProfitUsd: 50,
      openPositions: 0,
      closedPositions: 1,
    });
    // 50 / 1000 balance at entry
    expect(sizer.getStatus()).toMatchObject({ winStreak: 1, dailyPnl: 0.05 });
    expect(closedEvents).toHaveBeenCalledTimes(1);
  });

  it('keeps the position open when the sell fails', async () => {
    const { engine, gateway } = setup();
    const opened = await engine.executeBuy(TOKEN_A, 'ethereum', 'TST', 100);
    if (!opened.success) throw new Error('buy failed');
    gateway.sell.mockRejectedValueOnce(new Error('slippage'));

    const result = await engine.executeSell(opened.position.id);

    expect(result).toMatchObject({ success: false, kind: 'transient', error: 'Sell failed: slippage' });
    expect(engine.getPosition(opened.position.id)?.status).toBe('OPEN');
    expect(engine.getStats().closedPositions).toBe(0);
  });

  it('refuses a second sell while one is in flight', async () => {
    const { engine } = setup();
    const opened = await engine.executeBuy(TOKEN_A, 'ethereum', 'TST', 100);
    if (!opened.success) throw new Error('buy failed');

    const first = engine.executeSell(opened.position.id);
    const second = await engine.executeSell(opened.position.id);

    expect(second).toMatchObject({
      success: false,
      kind: 'transient',
      error: `Sell already in progress for ${opened.position.id}`,
    });
    expect((await first).success).toBe(true);
  });

  it('counts a break-even close as a loss', async () => {
    const { engine } = setup();
    const opened = await engine.executeBuy(TOKEN_A, 'ethereum', 'TST', 100);
    if (!opened.success) throw new Error('buy failed');

    await engine.executeSell(opened.position.id);
    expect(engine.getStats()).toMatchObject({ winningTrades: 0, losingTrades: 1, winRate: 0 });
  });
});

describe('ExecutionEngine.monitorTick', () => {
  it('closes positions whose exit rule fires', async () => {
    const { engine, prices } = setup();
    await engine.executeBuy(TOKEN_A, 'ethereum', 'TST', 100);
    await engine.executeBuy(TOKEN_B, 'ethereum', 'TST', 100);
    prices.set(TOKEN_A, 2.5);
    prices.set(TOKEN_B, 1.1);

    const closed = await engine.monitorTick();

    expect(closed).toHaveLength(1);
    expect(closed[0]).toMatchObject({ address: TOKEN_A, status: 'CLOSED', exitReason: 'PROFIT_TARGET', pnlUsd: 150 });
    expect(engine.getOpenPositions().map(p => p.address)).toEqual([TOKEN_B]);
    expect(engine.getOpenPositions()[0].currentPrice).toBe(1.1);
  });

  it('skips a position whose price lookup fails', async () => {
    const { engine, gateway, prices } = setup();
    await engine.executeBuy(TOKEN_A, 'ethereum', 'TST', 100);
    prices.set(TOKEN_A, 0.1);
    gateway.getPrice.mockRejectedValueOnce(new Error('no route'));

    await expect(engine.monitorTick()).resolves.toEqual([]);
    expect(engine.getOpenPositions()).toHaveLength(1);
  });

  it('ignores unusable prices', async () => {
    const { engine, prices } = setup();
    await engine.executeBuy(TOKEN_A, 'ethereum', 'TST', 100);
    prices.set(TOKEN_A, Number.NaN);

    await engine.monitorTick();
    expect(engine.getOpenPositions()[0].currentPrice).toBe(1);
  });

  it('can take target and stop from the risk profile', async () => {
    const { engine, prices } = setup({ useStrategyExits: true });
    await engine.executeBuy(TOKEN_A, 'ethereum', 'TST', 100);
    prices.set(TOKEN_A, 1.05);

    const thresholds = engine.exitThresholds();
    expect(thresholds.profitTargetPercent).toBeCloseTo(4);
    expect(thresholds.stopLossPercent).toBeCloseTo(2.5);
    const closed = await engine.monitorTick();
    expect(closed[0]?.exitReason).toBe('PROFIT_TARGET');
  });

  it('a tick started while another runs does nothing', async () => {
    const { engine, gateway } = setup();
    await engine.executeBuy(TOKEN_A, 'ethereum', 'TST', 100);
    let release: (price: number) => void = () => {};
    gateway.getPrice.mockImplementationOnce(() => new Promise<number>(resolve => {
      release = resolve;
    }));

    const first = engine.monitorTick();
    await expect(engine.monitorTick()).resolves.toEqual([]);
    release(1);
    await expect(first).resolves.toEqual([]);
    expect(gateway.getPrice).toHaveBeenCalledTimes(1);
  });
});

describe('ExecutionEngine.closeAll', () => {
  it('sells every open position', async () => {
    const { engine } = setup();
    await engine.executeBuy(TOKEN_A, 'ethereum', 'TST', 100);
    await engine.executeBuy(TOKEN_B, 'ethereum', 'TST', 100);

    const results = await engine.closeAll();

    expect(results).toHaveLength(2);
    expect(results.every(r => r.success && r.position.exitReason === 'EMERGENCY')).toBe(true);
    expect(engine.getOpenPositions()).toEqual([]);
    expect(engine.getClosedPositions()).toHaveLength(2);
  });
});
