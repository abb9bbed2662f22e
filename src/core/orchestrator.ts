// =========================================================
// ORCHESTRATOR — SIGNAL → AUDIT → TRADE PIPELINE
// =========================================================

import {
  Chain,
  ContractAudit,
  DetectorStats,
  AuditorStats,
  EngineStats,
  PipelineStats,
  Position,
  Rejection,
  Signal,
  SizerStatus,
  normalizeAddress,
} from '../types';
import { ORCHESTRATOR_CONFIG } from '../config';
import { SignalDetector } from './signalDetector';
import { ContractAuditor } from '../audit/contractAuditor';
import { ExecutionEngine } from '../trading/executionEngine';
import { Notifier } from '../notify';
import { BoundedHistory } from '../utils/ringBuffer';
import { PollingLoop } from '../utils/loop';
import { EventBus } from '../utils/eventEmitter';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

const log = logger.child('orchestrator');

export interface OrchestratorOptions {
  signalIntervalMs: number;
  monitorIntervalMs: number;
  statusIntervalMs: number;
  errorBackoffMs: number;
  topSignals: number;
  maxProcessedKeys: number;
  defaultChain: Chain;
  rejectionLogSize: number;
}

export type SignalOutcome = 'skipped' | 'rejected' | 'executed' | 'failed';

export interface OrchestratorStatus {
  running: boolean;
  pipeline: PipelineStats;
  detector: DetectorStats;
  auditor: AuditorStats;
  engine: EngineStats;
  sizer: SizerStatus;
  loops: Record<string, { running: boolean; iterations: number; failures: number }>;
}

/**
 * Key that identifies a signal for pipeline-level dedup
 */
export function signalKey(signal: Signal): string | null {
  if (!signal.address) return null;
  return `${normalizeAddress(signal.address)}_${signal.timestamp}`;
}

function formatOpened(position: Position): string {
  return `OPENED ${position.symbol} (${position.chain}) ${position.address}\n` +
    `Size: $${position.entryAmountUsd.toFixed(2)} @ ${position.entryPrice}`;
}

function formatClosed(position: Position): string {
  const sign = position.pnlUsd >= 0 ? '+' : '';
  return `CLOSED ${position.symbol} [${position.exitReason ?? 'UNKNOWN'}]\n` +
    `P&L: ${sign}$${position.pnlUsd.toFixed(2)} (${sign}${position.pnlPercent.toFixed(2)}%)`;
}

/**
 * Orchestrator
 *
 * Three independent loops share the event loop:
 * - signals: drain top-N from the detector, audit, buy what is safe
 * - monitor: let the engine re-price and exit positions
 * - status: periodic counters to the log, bus and notifier
 */
export class Orchestrator {
  private readonly detector: SignalDetector;
  private readonly auditor: ContractAuditor;
  private readonly engine: ExecutionEngine;
  private readonly notifier: Notifier;
  private readonly options: OrchestratorOptions;
  private readonly events?: EventBus;

  private processed: Set<string> = new Set(); // insertion-ordered, oldest first
  private rejections: BoundedHistory<Rejection>;
  private loops: PollingLoop[];
  private running: boolean = false;

  private signalsDetected: number = 0;
  private passedAudit: number = 0;
  private rejectedAudit: number = 0;
  private tradesExecuted: number = 0;
  private tradesFailed: number = 0;

  constructor(
    detector: SignalDetector,
    auditor: ContractAuditor,
    engine: ExecutionEngine,
    notifier: Notifier,
    options: Partial<OrchestratorOptions> = {},
    events?: EventBus
  ) {
    this.detector = detector;
    this.auditor = auditor;
    this.engine = engine;
    this.notifier = notifier;
    this.options = { ...ORCHESTRATOR_CONFIG, ...options };
    this.events = events;
    this.rejections = new BoundedHistory<Rejection>(this.options.rejectionLogSize);

    const { errorBackoffMs } = this.options;
    this.loops = [
      new PollingLoop({
        name: 'signal-loop',
        intervalMs: this.options.signalIntervalMs,
        errorBackoffMs,
        runImmediately: true,
        task: async () => {
          await this.processSignals();
        },
      }),
      new PollingLoop({
        name: 'monitor-loop',
        intervalMs: this.options.monitorIntervalMs,
        errorBackoffMs,
        runImmediately: true,
        task: async () => {
          await this.monitorPositions();
        },
      }),
      new PollingLoop({
        name: 'status-loop',
        intervalMs: this.options.statusIntervalMs,
        errorBackoffMs,
        task: async () => {
          this.reportStatus();
        },
      }),
    ];
  }

  start(): void {
    if (this.running) {
      log.warn('Orchestrator already running');
      return;
    }
    this.running = true;
    for (const loop of this.loops) {
      loop.start();
    }
    log.info('Orchestrator started', {
      signalIntervalMs: this.options.signalIntervalMs,
      monitorIntervalMs: this.options.monitorIntervalMs,
      statusIntervalMs: this.options.statusIntervalMs,
    });
  }

  /**
   * Let each loop finish its current iteration, then stop scheduling
   */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    await Promise.all(this.loops.map(loop => loop.stop()));
    log.info('Orchestrator stopped', { ...this.getPipelineStats() });
  }

  /**
   * One pass of the signal loop. Returns how many signals were acted on.
   */
  async processSignals(): Promise<number> {
    const signals = this.detector.getTopSignals(this.options.topSignals);
    let handled = 0;

    for (const signal of signals) {
      try {
        const outcome = await this.processSignal(signal);
        if (outcome !== 'skipped') handled++;
      } catch (error) {
        log.error('Signal processing failed', { signalId: signal.id, error: errorMessage(error) });
      }
    }

    return handled;
  }

  /**
   * Audit one signal and trade it when safe. Signals without an address
   * or already processed are skipped.
   */
  async processSignal(signal: Signal): Promise<SignalOutcome> {
    const key = signalKey(signal);
    if (!key || !signal.address || this.processed.has(key)) {
      return 'skipped';
    }
    this.markProcessed(key);
    this.signalsDetected++;

    const chain = signal.chain ?? this.options.defaultChain;
    log.info('Processing signal', {
      address: signal.address,
      chain,
      hype: signal.hypeScore,
      source: `${signal.platform}:${signal.channel}`,
    });

    const audit = await this.auditor.audit(signal.address, chain);
    if (!audit.safe) {
      this.recordRejection(audit);
      return 'rejected';
    }

    this.passedAudit++;
    const result = await this.engine.executeBuy(signal.address, chain, audit.tokenSymbol ?? 'UNKNOWN');
    if (!result.success) {
      this.tradesFailed++;
      log.warn('Trade not executed', { address: signal.address, kind: result.kind, error: result.error });
      return 'failed';
    }

    this.tradesExecuted++;
    this.dispatch(formatOpened(result.position));
    return 'executed';
  }

  private markProcessed(key: string): void {
    this.processed.add(key);
    while (this.processed.size > this.options.maxProcessedKeys) {
      const oldest = this.processed.values().next();
      if (oldest.done) break;
      this.processed.delete(oldest.value);
    }
  }

  private recordRejection(audit: ContractAudit): void {
    this.rejectedAudit++;
    const rejection: Rejection = {
      address: audit.address,
      chain: audit.chain,
      timestamp: Date.now(),
      safetyScore: audit.safetyScore,
      failedChecks: audit.checks
        .filter(check => !check.passed)
        .map(check => ({ name: check.name, details: check.details, severity: check.severity })),
    };
    this.rejections.push(rejection);

    log.warn('Signal rejected by audit', {
      address: audit.address,
      score: audit.safetyScore.toFixed(1),
      risk: audit.riskLevel,
      failed: rejection.failedChecks.map(c => `${c.name}: ${c.details}`),
    });
    this.events?.emit('signal_rejected', rejection);
  }

  /**
   * One pass of the monitor loop
   */
  async monitorPositions(): Promise<void> {
    const closed = await this.engine.monitorTick();
    for (const position of closed) {
      this.dispatch(formatClosed(position));
    }
  }

  /**
   * Log, publish and send the periodic status report
   */
  reportStatus(): void {
    const pipeline = this.getPipelineStats();
    const engine = this.engine.getStats();

    log.info('Status report', {
      ...pipeline,
      openPositions: engine.openPositions,
      winRate: engine.winRate.toFixed(1) + '%',
      totalProfitUsd: engine.totalProfitUsd.toFixed(2),
    });
    this.events?.emit('status_report', { pipeline, engine });

    this.dispatch(
      `STATUS signals=${pipeline.signalsDetected} passed=${pipeline.passedAudit} ` +
      `rejected=${pipeline.rejectedAudit} trades=${pipeline.tradesExecuted} ` +
      `open=${engine.openPositions} pnl=$${engine.totalProfitUsd.toFixed(2)}`
    );
  }

  /**
   * Fire-and-forget notification
   */
  private dispatch(text: string): void {
    this.notifier.notify(text).catch((error: unknown) => {
      log.warn('Notifier failed', { error: errorMessage(error) });
    });
  }

  getPipelineStats(): PipelineStats {
    return {
      signalsDetected: this.signalsDetected,
      passedAudit: this.passedAudit,
      rejectedAudit: this.rejectedAudit,
      tradesExecuted: this.tradesExecuted,
      tradesFailed: this.tradesFailed,
      processedKeys: this.processed.size,
    };
  }

  /**
   * Most recent audit rejections, newest first
   */
  getRejections(limit: number = 20): Rejection[] {
    return this.rejections.recent(limit);
  }

  hasProcessed(key: string): boolean {
    return this.processed.has(key);
  }

  getStatus(): OrchestratorStatus {
    const [signalLoop, monitorLoop, statusLoop] = this.loops;
    const describe = (loop: PollingLoop) => ({
      running: loop.isRunning,
      iterations: loop.iterations,
      failures: loop.failures,
    });
    return {
      running: this.running,
      pipeline: this.getPipelineStats(),
      detector: this.detector.getStats(),
      auditor: this.auditor.getStats(),
      engine: this.engine.getStats(),
      sizer: this.engine.getSizer().getStatus(),
      loops: {
        signals: describe(signalLoop),
        monitor: describe(monitorLoop),
        status: describe(statusLoop),
      },
    };
  }
}
