import { describe, expect, it, vi } from 'vitest';
import { Orchestrator, OrchestratorOptions, signalKey } from '../../src/core/orchestrator';
import { SignalDetector } from '../../src/core/signalDetector';
import { ContractAuditor } from '../../src/audit/contractAuditor';
import { ExecutionEngine } from '../../src/trading/executionEngine';
import { PositionSizer } from '../../src/trading/positionSizer';
import { EventBus } from '../../src/utils/eventEmitter';
import { AuditProviders, Signal } from '../../src/types';
import { cleanProviders } from '../audit/fakeProviders';
import { fakeGateway } from '../helpers/gateway';

const TOKEN = '0x' + '5e'.repeat(20);

const ORCHESTRATOR_OPTIONS: OrchestratorOptions = {
  signalIntervalMs: 10,
  monitorIntervalMs: 10,
  statusIntervalMs: 60_000,
  errorBackoffMs: 60_000,
  topSignals: 10,
  maxProcessedKeys: 1000,
  defaultChain: 'ethereum',
  rejectionLogSize: 100,
};

function manualSignal(timestamp: number, address: string = TOKEN): Signal {
  return {
    id: `sig_${timestamp}`,
    platform: 'telegram',
    channel: 'calls',
    text: `ca ${address}`,
    address,
    hypeScore: 80,
    timestamp,
    messageId: `m_${timestamp}`,
  };
}

function setup(providers: AuditProviders = cleanProviders(), options: Partial<OrchestratorOptions> = {}) {
  const events = new EventBus();
  const detector = new SignalDetector({ minHypeScore: 70 }, events);
  const auditor = new ContractAuditor(providers, {
    minSafetyScore: 80,
    minLiquidityUsd: 10000,
    maxHolderConcentration: 50,
    maxBuyTax: 10,
    maxSellTax: 10,
    cacheTtlMs: 300_000,
    requestTimeoutMs: 1000,
  }, events);
  const { gateway, prices } = fakeGateway(1000);
  const engine = new ExecutionEngine(gateway, new PositionSizer('ADAPTIVE'), {
    profitTargetPercent: 100,
    stopLossPercent: 50,
    trailingStopPercent: 20,
    maxHoldTimeHours: 24,
    maxPositions: 5,
    txTimeoutMs: 1000,
    useStrategyExits: false,
    historyLimit: 100,
  }, events);
  const notifier = { notify: vi.fn(async (_text: string) => {}) };
  const orchestrator = new Orchestrator(detector, auditor, engine, notifier, { ...ORCHESTRATOR_OPTIONS, ...options }, events);
  return { events, detector, auditor, engine, gateway, prices, notifier, orchestrator, providers };
}

describe('signalKey', () => {
  it('combines address and timestamp', () => {
    expect(signalKey(manualSignal(42))).toBe(`${TOKEN}_42`);
    expect(signalKey({ ...manualSignal(42), address: undefined })).toBeNull();
    expect(signalKey(manualSignal(42, '0x' + '5E'.repeat(20)))).toBe(`${TOKEN}_42`);
  });
});

describe('Orchestrator.processSignals', () => {
  it('audits a signal and opens a position when safe', async () => {
    const { detector, orchestrator, engine, notifier } = setup();
    detector.extract(`CA: ${TOKEN}`, 'telegram', 'calls');

    await expect(orchestrator.processSignals()).resolves.toBe(1);

    expect(orchestrator.getPipelineStats()).toEqual({
      signalsDetected: 1,
      passedAudit: 1,
      rejectedAudit: 0,
      tradesExecuted: 1,
      tradesFailed: 0,
      processedKeys: 1,
    });
    expect(engine.getOpenPositions()[0]).toMatchObject({ address: TOKEN, symbol: 'TST', chain: 'ethereum' });
    expect(notifier.notify).toHaveBeenCalledWith(`OPENED TST (ethereum) ${TOKEN}\nSize: $150.00 @ 1`);
  });

  it('processes each signal once', async () => {
    const { detector, orchestrator, providers } = setup();
    const signal = detector.extract(`CA: ${TOKEN}`);
    await orchestrator.processSignals();

    await expect(orchestrator.processSignals()).resolves.toBe(0);
    expect(signal && orchestrator.hasProcessed(`${TOKEN}_${signal.timestamp}`)).toBe(true);
    expect(providers.getCode).toHaveBeenCalledTimes(1);
  });

  it('buys once when chatter quotes a token in two casings', async () => {
    const { orchestrator, engine, providers } = setup();

    await expect(orchestrator.processSignal(manualSignal(1))).resolves.toBe('executed');
    await expect(orchestrator.processSignal(manualSignal(2, '0x' + '5E'.repeat(20)))).resolves.toBe('failed');

    expect(providers.getCode).toHaveBeenCalledTimes(1);
    expect(engine.getOpenPositions()).toHaveLength(1);
    expect(orchestrator.getPipelineStats()).toMatchObject({ tradesExecuted: 1, tradesFailed: 1 });
  });

  it('records a rejection when the audit fails', async () => {
    const providers = cleanProviders({ getCode: vi.fn(async () => '0x') });
    const { orchestrator, events, gateway, notifier } = setup(providers);
    const rejected = vi.fn();
    events.on('signal_rejected', rejected);

    await expect(orchestrator.processSignal(manualSignal(1))).resolves.toBe('rejected');

    const [rejection] = orchestrator.getRejections();
    expect(rejection.address).toBe(TOKEN);
    expect(rejection.failedChecks).toEqual([
      { name: 'Contract Existence', details: 'No contract code at address', severity: 'CRITICAL' },
    ]);
    expect(rejected).toHaveBeenCalledTimes(1);
    expect(orchestrator.getPipelineStats().rejectedAudit).toBe(1);
    expect(gateway.buy).not.toHaveBeenCalled();
    expect(notifier.notify).not.toHaveBeenCalled();
  });

  it('rejects honeypots', async () => {
    const providers = cleanProviders({
      getHoneypotReport: vi.fn(async () => ({ isHoneypot: true, buyTax: 0, sellTax: 0 })),
    });
    const { orchestrator } = setup(providers);
    await expect(orchestrator.processSignal(manualSignal(1))).resolves.toBe('rejected');
  });

  it('skips signals without an address', async () => {
    const { detector, orchestrator } = setup();
    const signal = detector.extract('stealth launch presale 1000x alpha call moon');
    if (!signal) throw new Error('expected a hype-only signal');

    await expect(orchestrator.processSignal(signal)).resolves.toBe('skipped');
    expect(orchestrator.getPipelineStats().signalsDetected).toBe(0);
  });

  it('falls back to the default chain', async () => {
    const { orchestrator, engine } = setup();
    await expect(orchestrator.processSignal(manualSignal(1))).resolves.toBe('executed');
    expect(engine.getOpenPositions()[0].chain).toBe('ethereum');
  });

  it('counts a refused buy as failed', async () => {
    const { orchestrator, gateway } = setup();
    gateway.buy.mockRejectedValueOnce(new Error('rpc down'));

    await expect(orchestrator.processSignal(manualSignal(1))).resolves.toBe('failed');
    expect(orchestrator.getPipelineStats().tradesFailed).toBe(1);
  });

  it('forgets the oldest keys past the limit', async () => {
    const { orchestrator } = setup(cleanProviders(), { maxProcessedKeys: 2 });
    await orchestrator.processSignal(manualSignal(1, '0x' + '01'.repeat(20)));
    await orchestrator.processSignal(manualSignal(2, '0x' + '02'.repeat(20)));
    await orchestrator.processSignal(manualSignal(3, '0x' + '03'.repeat(20)));

    expect(orchestrator.hasProcessed(`${'0x' + '01'.repeat(20)}_1`)).toBe(false);
    expect(orchestrator.hasProcessed(`${'0x' + '03'.repeat(20)}_3`)).toBe(true);
    expect(orchestrator.getPipelineStats().processedKeys).toBe(2);
  });

  it('a failing notifier does not fail the signal', async () => {
    const { orchestrator, notifier } = setup();
    notifier.notify.mockRejectedValueOnce(new Error('webhook down'));

    await expect(orchestrator.processSignal(manualSignal(1))).resolves.toBe('executed');
  });
});

describe('Orchestrator.monitorPositions', () => {
  it('notifies for each position closed', async () => {
    const { orchestrator, prices, notifier, engine } = setup();
    await orchestrator.processSignal(manualSignal(1));
    prices.set(TOKEN, 10);

    await orchestrator.monitorPositions();

    expect(engine.getOpenPositions()).toEqual([]);
    expect(notifier.notify).toHaveBeenLastCalledWith('CLOSED TST [PROFIT_TARGET]\nP&L: +$1350.00 (+900.00%)');
  });
});

describe('Orchestrator.reportStatus', () => {
  it('logs, publishes and notifies the counters', () => {
    const { orchestrator, events, notifier } = setup();
    const reports = vi.fn();
    events.on('status_report', reports);

    orchestrator.reportStatus();

    expect(reports.mock.calls[0][0].data.pipeline.signalsDetected).toBe(0);
    expect(notifier.notify).toHaveBeenCalledWith('STATUS signals=0 passed=0 rejected=0 trades=0 open=0 pnl=$0.00');
  });
});

describe('Orchestrator loops', () => {
  it('runs the signal and monitor loops until stopped', async () => {
    const { detector, orchestrator, engine } = setup();
    detector.extract(`CA: ${TOKEN}`);

    orchestrator.start();
    await vi.waitFor(() => expect(engine.getOpenPositions()).toHaveLength(1));
    await vi.waitFor(() => expect(orchestrator.getStatus().loops.monitor.iterations).toBeGreaterThan(0));
    expect(orchestrator.getStatus().running).toBe(true);

    await orchestrator.stop();
    const status = orchestrator.getStatus();
    expect(status.running).toBe(false);
    expect(status.loops.signals.running).toBe(false);
  });

  it('backs off after a failing iteration', async () => {
    const { detector, orchestrator } = setup();
    vi.spyOn(detector, 'getTopSignals').mockImplementation(() => {
      throw new Error('detector broke');
    });

    orchestrator.start();
    await vi.waitFor(() => expect(orchestrator.getStatus().loops.signals.failures).toBe(1));
    expect(orchestrator.getStatus().loops.signals.iterations).toBe(0);

    await orchestrator.stop();
  });
});
