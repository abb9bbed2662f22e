// =========================================================
// PIPELINE — COMPONENT WIRING
// =========================================================

import { AuditProviders, TradeGateway } from './types';
import { AUDITOR_CONFIG, ENGINE_CONFIG } from './config';
import { SignalDetector } from './core/signalDetector';
import { Orchestrator, OrchestratorOptions } from './core/orchestrator';
import { ContractAuditor } from './audit/contractAuditor';
import { LiveAuditProviders } from './data/auditProviders';
import { DryRunGateway, SimulatedAuditProviders } from './data/dryRun';
import { ExecutionEngine, EngineOptions } from './trading/executionEngine';
import { PositionSizer } from './trading/positionSizer';
import { Notifier, createNotifier } from './notify';
import { MetricsCalculator } from './logging/metrics';
import { TradeLogger } from './logging/tradeLogger';
import { EventBus } from './utils/eventEmitter';

export interface PipelineOverrides {
  providers?: AuditProviders;
  gateway?: TradeGateway;
  notifier?: Notifier;
  engine?: Partial<EngineOptions>;
  orchestrator?: Partial<OrchestratorOptions>;
  tradeLogDir?: string | null; // null disables the JSONL trade log
}

export interface Pipeline {
  events: EventBus;
  detector: SignalDetector;
  auditor: ContractAuditor;
  sizer: PositionSizer;
  engine: ExecutionEngine;
  orchestrator: Orchestrator;
  metrics: MetricsCalculator;
  tradeLogger: TradeLogger | null;
}

/**
 * Build every component around one event bus. Nothing is started.
 */
export function createPipeline(overrides: PipelineOverrides = {}): Pipeline {
  const events = new EventBus();

  const providers = overrides.providers ??
    (AUDITOR_CONFIG.simulationMode ? new SimulatedAuditProviders() : new LiveAuditProviders());
  const gateway = overrides.gateway ?? new DryRunGateway();

  const detector = new SignalDetector({}, events);
  const auditor = new ContractAuditor(providers, {}, events);
  const sizer = new PositionSizer(ENGINE_CONFIG.sizingStrategy);
  const engine = new ExecutionEngine(gateway, sizer, overrides.engine, events);
  const orchestrator = new Orchestrator(
    detector,
    auditor,
    engine,
    overrides.notifier ?? createNotifier(),
    overrides.orchestrator,
    events
  );

  const metrics = new MetricsCalculator(ENGINE_CONFIG.dryRunBalanceUsd);
  const tradeLogger = overrides.tradeLogDir === null ? null : new TradeLogger(overrides.tradeLogDir);

  events.on('position_closed', (event) => {
    metrics.addTrade(event.data);
    tradeLogger?.logTrade(event.data);
  });

  return { events, detector, auditor, sizer, engine, orchestrator, metrics, tradeLogger };
}
