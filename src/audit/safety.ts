// =========================================================
// SAFETY SCORING — CHECK AGGREGATION AND VERDICT
// =========================================================

import { AuditProviders, ContractAudit, RiskLevel, SecurityCheck } from '../types';
import { errorMessage } from '../utils/errors';
import { Logger } from '../utils/logger';

export interface AuditThresholds {
  minLiquidityUsd: number;
  maxHolderConcentration: number;
  maxBuyTax: number;
  maxSellTax: number;
}

/**
 * What a chain-specific check path gets to work with.
 * call() applies the per-request timeout.
 */
export interface CheckContext {
  providers: AuditProviders;
  thresholds: AuditThresholds;
  call<T>(label: string, fn: () => Promise<T>): Promise<T>;
  log: Logger;
}

/**
 * Mutable audit under construction. Frozen into a ContractAudit by finalizeAudit().
 */
export interface AuditDraft {
  checks: SecurityCheck[];
  isHoneypot: boolean;
  liquidityUsd: number;
  buyTax: number;
  sellTax: number;
  topHolderPercent: number;
  holderCount: number;
  tokenName?: string;
  tokenSymbol?: string;
  totalSupply?: string;
  mintAuthority?: boolean;
  freezeAuthority?: boolean;
}

/**
 * Pessimistic starting point: everything unknown counts against the token
 */
export function createDraft(): AuditDraft {
  return {
    checks: [],
    isHoneypot: true,
    liquidityUsd: 0,
    buyTax: 100,
    sellTax: 100,
    topHolderPercent: 100,
    holderCount: 0,
  };
}

/**
 * Unweighted mean of check scores; 0 with no checks
 */
export function meanScore(checks: readonly SecurityCheck[]): number {
  if (checks.length === 0) return 0;
  return checks.reduce((sum, check) => sum + check.score, 0) / checks.length;
}

/**
 * Score bands: >=90 SAFE, >=70 LOW, >=50 MEDIUM, >=30 HIGH, else CRITICAL
 */
export function classifyRisk(score: number): RiskLevel {
  if (score >= 90) return 'SAFE';
  if (score >= 70) return 'LOW';
  if (score >= 50) return 'MEDIUM';
  if (score >= 30) return 'HIGH';
  return 'CRITICAL';
}

export function criticalFailures(checks: readonly SecurityCheck[]): SecurityCheck[] {
  return checks.filter(check => !check.passed && check.severity === 'CRITICAL');
}

/**
 * Safe only when the score clears the bar, no CRITICAL check failed
 * and the token was positively shown not to be a honeypot
 */
export function isSafe(
  score: number,
  checks: readonly SecurityCheck[],
  isHoneypot: boolean,
  minSafetyScore: number
): boolean {
  return score >= minSafetyScore && criticalFailures(checks).length === 0 && !isHoneypot;
}

/**
 * Partial credit for a collaborator call that failed or timed out
 */
export function apiErrorCheck(name: string, error: unknown): SecurityCheck {
  return {
    name,
    passed: false,
    score: 50,
    details: `API error: ${errorMessage(error)}`,
    severity: 'MEDIUM',
  };
}

const SEVERITY_BY_LEVEL: Record<string, RiskLevel> = {
  low: 'LOW',
  medium: 'MEDIUM',
  high: 'HIGH',
  critical: 'CRITICAL',
  danger: 'CRITICAL',
  warn: 'MEDIUM',
};

/**
 * Map a third-party risk level string onto our tiers. Unknown levels are MEDIUM.
 */
export function severityFromLevel(level: string): RiskLevel {
  return SEVERITY_BY_LEVEL[level.trim().toLowerCase()] ?? 'MEDIUM';
}

export function finalizeAudit(
  draft: AuditDraft,
  address: string,
  chain: string,
  minSafetyScore: number
): ContractAudit {
  const checks = Object.freeze([...draft.checks]);
  const safetyScore = meanScore(checks);
  const safe = checks.length > 0 && isSafe(safetyScore, checks, draft.isHoneypot, minSafetyScore);

  return Object.freeze({
    address,
    chain,
    timestamp: Date.now(),
    checks,
    safetyScore,
    riskLevel: classifyRisk(safetyScore),
    safe,
    isHoneypot: draft.isHoneypot,
    liquidityUsd: draft.liquidityUsd,
    buyTax: draft.buyTax,
    sellTax: draft.sellTax,
    topHolderPercent: draft.topHolderPercent,
    holderCount: draft.holderCount,
    tokenName: draft.tokenName,
    tokenSymbol: draft.tokenSymbol,
    totalSupply: draft.totalSupply,
    mintAuthority: draft.mintAuthority,
    freezeAuthority: draft.freezeAuthority,
  });
}

/**
 * One-line digest for logs and notifications
 */
export function summarizeAudit(audit: ContractAudit): string {
  const failed = audit.checks.filter(check => !check.passed).map(check => check.name);
  return `${audit.safe ? 'SAFE' : 'UNSAFE'} ${audit.chain}:${audit.address} ` +
    `score=${audit.safetyScore.toFixed(1)} risk=${audit.riskLevel}` +
    (failed.length > 0 ? ` failed=[${failed.join(', ')}]` : '');
}
