// =========================================================
// TYPE DEFINITIONS — LAUNCH SIGNAL PIPELINE
// =========================================================

/**
 * Chains the auditor and execution engine know how to handle
 */
export type Chain = 'ethereum' | 'solana';

export const SUPPORTED_CHAINS: readonly Chain[] = ['ethereum', 'solana'];

export function isSupportedChain(value: string): value is Chain {
  return SUPPORTED_CHAINS.some(chain => chain === value);
}

const EVM_ADDRESS = /^0x[0-9a-fA-F]{40}$/;

/**
 * Canonical form of a token address: EVM hex is lowercased,
 * base58 is case-significant and kept as written.
 */
export function normalizeAddress(address: string): string {
  const trimmed = address.trim();
  return EVM_ADDRESS.test(trimmed) ? trimmed.toLowerCase() : trimmed;
}

/**
 * Raw chatter event delivered by an ingestion source.
 * Every field may be missing or empty.
 */
export interface RawMessage {
  id?: string;
  text?: string | null;
  platform?: string;
  channel?: string;
}

/**
 * A detected launch signal (immutable once created)
 */
export interface Signal {
  readonly id: string;
  readonly platform: string;
  readonly channel: string;
  readonly text: string;
  readonly address?: string;
  readonly chain?: Chain;
  readonly hypeScore: number;
  readonly timestamp: number; // Unix ms
  readonly messageId: string;
}

/**
 * Hype score components
 */
export interface HypeBreakdown {
  keywordScore: number;
  matchedKeywords: string[];
  punctuationBonus: number;
  emojiBonus: number;
  capsBonus: number;
  total: number;
}

/**
 * Extracted contract address
 */
export interface AddressMatch {
  address: string;
  chain: Chain;
}

/**
 * Point-in-time view of a token's chatter metrics
 */
export interface TokenMetricsSnapshot {
  address: string;
  messageCount: number;
  totalHype: number;
  averageHype: number;
  firstSeen: number;
  lastSeen: number;
  velocity: number; // messages per minute
  sources: string[];
}

export interface DetectorStats {
  signalsInWindow: number;
  trackedTokens: number;
  seenMessages: number;
  messagesProcessed: number;
  signalsEmitted: number;
}

/**
 * Risk tiers, ordered from safest to most dangerous
 */
export type RiskLevel = 'SAFE' | 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

/**
 * Outcome of one security check
 */
export interface SecurityCheck {
  readonly name: string;
  readonly passed: boolean;
  readonly score: number; // 0-100
  readonly details: string;
  readonly severity: RiskLevel;
}

/**
 * Full audit result for a contract
 */
export interface ContractAudit {
  readonly address: string;
  readonly chain: string;
  readonly timestamp: number;
  readonly checks: readonly SecurityCheck[];
  readonly safetyScore: number;
  readonly riskLevel: RiskLevel;
  readonly safe: boolean;
  readonly isHoneypot: boolean;
  readonly liquidityUsd: number;
  readonly buyTax: number;
  readonly sellTax: number;
  readonly topHolderPercent: number;
  readonly holderCount: number;
  readonly tokenName?: string;
  readonly tokenSymbol?: string;
  readonly totalSupply?: string;
  readonly mintAuthority?: boolean;
  readonly freezeAuthority?: boolean;
}

/**
 * Honeypot simulation result for an EVM token
 */
export interface HoneypotReport {
  isHoneypot: boolean;
  buyTax: number; // percent
  sellTax: number; // percent
  holderCount?: number;
}

export interface RugCheckRisk {
  name: string;
  description: string;
  level: string;
}

export interface RugCheckReport {
  score: number;
  risks: RugCheckRisk[];
  tokenName?: string;
  tokenSymbol?: string;
}

/**
 * SPL mint account facts
 */
export interface MintInfo {
  mintAuthority: boolean;
  freezeAuthority: boolean;
  supply: string;
  decimals: number;
}

export interface TokenIdentity {
  name?: string;
  symbol?: string;
  totalSupply?: string;
}

export interface LiquidityReport {
  liquidityUsd: number;
  name?: string;
  symbol?: string;
  totalSupply?: string;
}

/**
 * Chain and audit-API lookups used by the contract auditor.
 * getLiquidity is only present when a liquidity source is configured.
 */
export interface AuditProviders {
  getCode(address: string): Promise<string>;
  getTokenIdentity(address: string): Promise<TokenIdentity>;
  getHoneypotReport(address: string): Promise<HoneypotReport>;
  getLiquidity?(address: string): Promise<LiquidityReport>;
  getMintInfo(address: string): Promise<MintInfo>;
  getTopHolderPercent(address: string): Promise<number>;
  getRugCheckReport(address: string): Promise<RugCheckReport>;
}

export interface AuditorStats {
  auditsRun: number;
  cacheHits: number;
  safeCount: number;
  cachedEntries: number;
}

/**
 * Position lifecycle states
 */
export type TradeStatus = 'PENDING' | 'EXECUTING' | 'OPEN' | 'CLOSED' | 'FAILED' | 'CANCELLED';

/**
 * Why a position was closed
 */
export type ExitReason =
  | 'PROFIT_TARGET'
  | 'STOP_LOSS'
  | 'TRAILING_STOP'
  | 'TIME_LIMIT'
  | 'MANUAL'
  | 'EMERGENCY';

/**
 * A live or historical position. Owned by the execution engine;
 * everything outside it receives copies.
 */
export interface Position {
  id: string;
  address: string;
  chain: Chain;
  symbol: string;
  status: TradeStatus;
  createdAt: number;

  entryTime?: number;
  entryPrice: number;
  entryAmountUsd: number;
  tokenAmount: number;
  entryTx?: string;

  currentPrice: number;
  currentValueUsd: number;
  peakPrice: number;

  exitTime?: number;
  exitPrice?: number;
  exitAmountUsd?: number;
  exitTx?: string;
  exitReason?: ExitReason;

  pnlUsd: number;
  pnlPercent: number;
  error?: string;
}

/**
 * Failure taxonomy shared by every operation result
 */
export type ErrorKind = 'transient' | 'validation' | 'capacity' | 'invariant';

export interface Failure {
  success: false;
  kind: ErrorKind;
  error: string;
}

export type TradeResult =
  | { success: true; position: Position }
  | (Failure & { position?: Position });

/**
 * Fill returned by a trade gateway
 */
export interface BuyFill {
  price: number;
  tokenAmount: number;
  txRef: string;
}

export interface SellFill {
  price: number;
  txRef: string;
}

/**
 * Wallet and broadcast collaborator used by the execution engine
 */
export interface TradeGateway {
  buy(address: string, chain: Chain, amountUsd: number): Promise<BuyFill>;
  sell(position: Position): Promise<SellFill>;
  getPrice(position: Position): Promise<number>;
  getBalanceUsd(): Promise<number>;
}

export interface EngineStats {
  totalTrades: number;
  winningTrades: number;
  losingTrades: number;
  winRate: number;
  totalProfitUsd: number;
  openPositions: number;
  closedPositions: number;
}

/**
 * Position sizing strategies
 */
export type SizingStrategy = 'CONSERVATIVE' | 'BALANCED' | 'AGGRESSIVE' | 'ADAPTIVE';

/**
 * Per-strategy risk thresholds (fractions, not percents)
 */
export interface RiskLimits {
  maxPositionSize: number;
  maxOpenPositions: number;
  stopLoss: number;
  takeProfit: number;
  dailyLossLimit: number;
  maxTradesPerDay: number;
  minTradeUsd: number;
  maxTradeUsd: number;
}

export type SizingDecision =
  | { canTrade: true; amountUsd: number; fraction: number }
  | { canTrade: false; reason: string };

export interface SizerStatus {
  strategy: SizingStrategy;
  basePercent: number;
  tradesToday: number;
  totalTrades: number;
  winStreak: number;
  lossStreak: number;
  dailyPnl: number;
}

/**
 * Orchestrator counters
 */
export interface PipelineStats {
  signalsDetected: number;
  passedAudit: number;
  rejectedAudit: number;
  tradesExecuted: number;
  tradesFailed: number;
  processedKeys: number;
}

/**
 * A signal dropped by the audit gate, kept for observability
 */
export interface Rejection {
  address: string;
  chain: string;
  timestamp: number;
  safetyScore: number;
  failedChecks: Array<{ name: string; details: string; severity: RiskLevel }>;
}

/**
 * Trade log entry for JSONL output
 */
export interface TradeLog {
  id: string;
  address: string;
  chain: Chain;
  symbol: string;
  entryTime: number;
  entryPrice: number;
  entryAmountUsd: number;
  exitTime?: number;
  exitPrice?: number;
  exitAmountUsd?: number;
  exitReason?: ExitReason;
  peakPrice: number;
  pnlUsd: number;
  pnlPercent: number;
}

/**
 * Performance metrics over closed trades
 */
export interface PerformanceMetrics {
  totalTrades: number;
  wins: number;
  losses: number;
  winRate: number;
  avgPnlPercent: number;
  avgTimeInTrade: number; // ms
  totalPnlUsd: number;
  bestTradeUsd: number;
  worstTradeUsd: number;
  maxDrawdown: number;
}

/**
 * Event bus payloads
 */
export interface EventMap {
  message_received: { id: string; platform: string; channel: string };
  signal_detected: Signal;
  signal_rejected: Rejection;
  audit_completed: ContractAudit;
  position_opened: Position;
  position_closed: Position;
  position_failed: Position;
  status_report: { pipeline: PipelineStats; engine: EngineStats };
}

export type EventType = keyof EventMap;

export interface SystemEvent<K extends EventType = EventType> {
  type: K;
  timestamp: number;
  data: EventMap[K];
}
