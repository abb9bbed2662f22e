// =========================================================
// CONFIGURATION — LAUNCH SIGNAL PIPELINE
// =========================================================

import * as dotenv from 'dotenv';
import { RiskLimits, SizingStrategy } from '../types';

dotenv.config();

function envString(name: string, fallback: string): string {
  const raw = process.env[name];
  return raw === undefined || raw.trim() === '' ? fallback : raw.trim();
}

/**
 * Unparseable values come back as NaN so validateConfig() can report them
 */
function envNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  return Number(raw);
}

function envBool(name: string, fallback: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  return ['true', '1', 'yes', 'on'].includes(raw.trim().toLowerCase());
}

const SIZING_STRATEGIES: readonly SizingStrategy[] = ['CONSERVATIVE', 'BALANCED', 'AGGRESSIVE', 'ADAPTIVE'];

function parseStrategy(raw: string): SizingStrategy {
  const upper = raw.toUpperCase();
  return SIZING_STRATEGIES.find(s => s === upper) ?? 'ADAPTIVE';
}

/**
 * Logging configuration
 */
export const LOG_CONFIG = {
  level: envString('LOG_LEVEL', 'info'),
  dir: envString('LOG_DIR', './logs'),
  toFile: envBool('LOG_TO_FILE', false),
};

/**
 * Signal detector
 */
export const DETECTOR_CONFIG = {
  minHypeScore: envNumber('MIN_HYPE_SCORE', 70),
  windowMs: envNumber('SIGNAL_WINDOW_HOURS', 24) * 60 * 60 * 1000,
  cleanupIntervalMs: 60 * 1000,
  maxTextLength: 500,
};

/**
 * Contract auditor
 */
export const AUDITOR_CONFIG = {
  minSafetyScore: envNumber('MIN_SAFETY_SCORE', 80),
  minLiquidityUsd: envNumber('MIN_LIQUIDITY_USD', 10000),
  maxHolderConcentration: envNumber('MAX_HOLDER_CONCENTRATION', 50),
  maxBuyTax: envNumber('MAX_BUY_TAX', 10),
  maxSellTax: envNumber('MAX_SELL_TAX', 10),
  cacheTtlMs: 5 * 60 * 1000,
  requestTimeoutMs: envNumber('AUDIT_TIMEOUT_MS', 10000),
  simulationMode: envBool('SIMULATION_MODE', true),
  ethereumRpcUrl: envString('ETHEREUM_RPC_URL', 'https://eth.llamarpc.com'),
  solanaRpcUrl: envString('SOLANA_RPC_URL', 'https://api.mainnet-beta.solana.com'),
  dextoolsApiKey: envString('DEXTOOLS_API_KEY', ''),
  honeypotApiUrl: 'https://api.honeypot.is/v2/IsHoneypot',
  rugcheckApiUrl: 'https://api.rugcheck.xyz/v1/tokens',
  dextoolsApiUrl: 'https://api.dextools.io/v1/token/ether',
};

/**
 * Execution engine
 */
export const ENGINE_CONFIG = {
  dryRun: envBool('DRY_RUN_MODE', true),
  dryRunBalanceUsd: envNumber('DRY_RUN_BALANCE_USD', 1000),
  dryRunEntryPrice: 0.00001,
  profitTargetPercent: envNumber('PROFIT_TARGET_PERCENT', 500),
  stopLossPercent: envNumber('STOP_LOSS_PERCENT', 50),
  trailingStopPercent: envNumber('TRAILING_STOP_PERCENT', 20),
  maxHoldTimeHours: envNumber('MAX_HOLD_TIME_HOURS', 24),
  maxPositions: envNumber('MAX_POSITIONS', 5),
  txTimeoutMs: envNumber('TX_TIMEOUT_SECONDS', 60) * 1000,
  sizingStrategy: parseStrategy(envString('SIZING_STRATEGY', 'ADAPTIVE')),
  useStrategyExits: envBool('USE_STRATEGY_EXITS', false),
  historyLimit: 500,
};

/**
 * Orchestrator loops
 */
export const ORCHESTRATOR_CONFIG = {
  signalIntervalMs: envNumber('SIGNAL_INTERVAL_MS', 5000),
  monitorIntervalMs: envNumber('MONITOR_INTERVAL_MS', 5000),
  statusIntervalMs: envNumber('STATUS_INTERVAL_MS', 300000),
  errorBackoffMs: 10000,
  topSignals: 10,
  maxProcessedKeys: 1000,
  defaultChain: 'ethereum' as const,
  rejectionLogSize: 100,
};

/**
 * Status server
 */
export const SERVER_CONFIG = {
  port: envNumber('PORT', 3000),
};

/**
 * Chatter feed
 */
export const FEED_CONFIG = {
  url: envString('FEED_WS_URL', ''),
  maxReconnectAttempts: 10,
  reconnectDelayMs: 1000,
};

/**
 * Notifications
 */
export const NOTIFY_CONFIG = {
  enabled: envBool('ENABLE_NOTIFICATIONS', true),
  webhookUrl: envString('NOTIFY_WEBHOOK_URL', ''),
  timeoutMs: 5000,
};

/**
 * Risk limits per sizing strategy. ADAPTIVE trades under the BALANCED limits.
 */
export const RISK_PROFILES: Record<SizingStrategy, RiskLimits> = {
  CONSERVATIVE: {
    maxPositionSize: 0.05,
    maxOpenPositions: 5,
    stopLoss: 0.02,
    takeProfit: 0.05,
    dailyLossLimit: 0.05,
    maxTradesPerDay: 15,
    minTradeUsd: 5,
    maxTradeUsd: 5000,
  },
  BALANCED: {
    maxPositionSize: 0.15,
    maxOpenPositions: 4,
    stopLoss: 0.025,
    takeProfit: 0.04,
    dailyLossLimit: 0.08,
    maxTradesPerDay: 12,
    minTradeUsd: 5,
    maxTradeUsd: 10000,
  },
  AGGRESSIVE: {
    maxPositionSize: 0.30,
    maxOpenPositions: 3,
    stopLoss: 0.03,
    takeProfit: 0.02,
    dailyLossLimit: 0.10,
    maxTradesPerDay: 10,
    minTradeUsd: 5,
    maxTradeUsd: 20000,
  },
  ADAPTIVE: {
    maxPositionSize: 0.15,
    maxOpenPositions: 4,
    stopLoss: 0.025,
    takeProfit: 0.04,
    dailyLossLimit: 0.08,
    maxTradesPerDay: 12,
    minTradeUsd: 5,
    maxTradeUsd: 10000,
  },
};

/**
 * Adaptive allocation bounds and steps (fractions)
 */
export const ADAPTIVE_SIZING = {
  basePercent: 0.15,
  floor: 0.05,
  ceiling: 0.30,
  winStep: 0.03,
  winCap: 0.15,
  winStreakThreshold: 3,
  lossStep: 0.05,
  lossCap: 0.10,
  lossStreakThreshold: 2,
  circuitBreakerLosses: 5,
};

/**
 * Validate configuration at startup
 */
export function validateConfig(): void {
  const errors: string[] = [];

  const numeric: Array<[string, number]> = [
    ['MIN_HYPE_SCORE', DETECTOR_CONFIG.minHypeScore],
    ['SIGNAL_WINDOW_HOURS', DETECTOR_CONFIG.windowMs],
    ['MIN_SAFETY_SCORE', AUDITOR_CONFIG.minSafetyScore],
    ['MIN_LIQUIDITY_USD', AUDITOR_CONFIG.minLiquidityUsd],
    ['MAX_HOLDER_CONCENTRATION', AUDITOR_CONFIG.maxHolderConcentration],
    ['MAX_BUY_TAX', AUDITOR_CONFIG.maxBuyTax],
    ['MAX_SELL_TAX', AUDITOR_CONFIG.maxSellTax],
    ['AUDIT_TIMEOUT_MS', AUDITOR_CONFIG.requestTimeoutMs],
    ['DRY_RUN_BALANCE_USD', ENGINE_CONFIG.dryRunBalanceUsd],
    ['PROFIT_TARGET_PERCENT', ENGINE_CONFIG.profitTargetPercent],
    ['STOP_LOSS_PERCENT', ENGINE_CONFIG.stopLossPercent],
    ['TRAILING_STOP_PERCENT', ENGINE_CONFIG.trailingStopPercent],
    ['MAX_HOLD_TIME_HOURS', ENGINE_CONFIG.maxHoldTimeHours],
    ['MAX_POSITIONS', ENGINE_CONFIG.maxPositions],
    ['TX_TIMEOUT_SECONDS', ENGINE_CONFIG.txTimeoutMs],
    ['SIGNAL_INTERVAL_MS', ORCHESTRATOR_CONFIG.signalIntervalMs],
    ['MONITOR_INTERVAL_MS', ORCHESTRATOR_CONFIG.monitorIntervalMs],
    ['STATUS_INTERVAL_MS', ORCHESTRATOR_CONFIG.statusIntervalMs],
    ['PORT', SERVER_CONFIG.port],
  ];

  for (const [name, value] of numeric) {
    if (!Number.isFinite(value)) {
      errors.push(`${name} must be a number`);
    } else if (value < 0) {
      errors.push(`${name} must not be negative`);
    }
  }

  if (AUDITOR_CONFIG.minSafetyScore > 100) {
    errors.push('MIN_SAFETY_SCORE must be between 0 and 100');
  }

  if (ENGINE_CONFIG.maxPositions < 1) {
    errors.push('MAX_POSITIONS must be at least 1');
  }

  if (ENGINE_CONFIG.stopLossPercent > 100) {
    errors.push('STOP_LOSS_PERCENT must not exceed 100');
  }

  if (ENGINE_CONFIG.trailingStopPercent > 100) {
    errors.push('TRAILING_STOP_PERCENT must not exceed 100');
  }

  if (!ENGINE_CONFIG.dryRun) {
    errors.push('DRY_RUN_MODE=false requires a live trade gateway, which this build does not ship');
  }

  if (errors.length > 0) {
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }
}
