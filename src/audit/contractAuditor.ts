// =========================================================
// CONTRACT AUDITOR — SAFETY VERDICTS FOR CANDIDATE TOKENS
// =========================================================

import { AuditProviders, AuditorStats, ContractAudit, isSupportedChain, normalizeAddress } from '../types';
import { AUDITOR_CONFIG } from '../config';
import { AuditThresholds, CheckContext, createDraft, finalizeAudit, summarizeAudit } from './safety';
import { runEthereumChecks } from './ethereumChecks';
import { runSolanaChecks } from './solanaChecks';
import { TtlCache } from '../utils/ttlCache';
import { withTimeout } from '../utils/timeout';
import { errorMessage } from '../utils/errors';
import { EventBus } from '../utils/eventEmitter';
import { logger } from '../utils/logger';

export interface AuditorOptions extends AuditThresholds {
  minSafetyScore: number;
  cacheTtlMs: number;
  requestTimeoutMs: number;
}

const log = logger.child('auditor');

/**
 * Contract Auditor
 *
 * Runs every applicable check for the token's chain, averages their
 * scores and decides whether the token is safe to buy. Completed audits
 * are cached per chain and address; unsupported chains and audits that
 * blew up are never cached.
 */
export class ContractAuditor {
  private readonly providers: AuditProviders;
  private readonly options: AuditorOptions;
  private readonly events?: EventBus;
  private readonly cache: TtlCache<string, ContractAudit>;
  private readonly context: CheckContext;

  private auditsRun: number = 0;
  private cacheHits: number = 0;
  private safeCount: number = 0;

  constructor(providers: AuditProviders, options: Partial<AuditorOptions> = {}, events?: EventBus) {
    this.providers = providers;
    this.options = { ...AUDITOR_CONFIG, ...options };
    this.events = events;
    this.cache = new TtlCache<string, ContractAudit>(this.options.cacheTtlMs);

    const timeoutMs = this.options.requestTimeoutMs;
    this.context = {
      providers,
      thresholds: {
        minLiquidityUsd: this.options.minLiquidityUsd,
        maxHolderConcentration: this.options.maxHolderConcentration,
        maxBuyTax: this.options.maxBuyTax,
        maxSellTax: this.options.maxSellTax,
      },
      call: <T>(label: string, fn: () => Promise<T>): Promise<T> =>
        withTimeout(Promise.resolve().then(fn), timeoutMs, label),
      log,
    };
  }

  private cacheKey(address: string, chain: string): string {
    return `${chain}:${normalizeAddress(address)}`;
  }

  /**
   * Audit a contract. A cached result is returned as-is, without any new lookups.
   */
  async audit(rawAddress: string, chain: string = 'ethereum'): Promise<ContractAudit> {
    const address = normalizeAddress(rawAddress);
    const normalizedChain = chain.trim().toLowerCase();
    const key = this.cacheKey(address, normalizedChain);

    const cached = this.cache.get(key);
    if (cached) {
      this.cacheHits++;
      log.debug('Audit cache hit', { key });
      return cached;
    }

    this.auditsRun++;
    const draft = createDraft();

    if (!isSupportedChain(normalizedChain)) {
      log.warn('Unsupported chain, treating as unsafe', { address, chain });
      return this.publish(finalizeAudit(draft, address, normalizedChain, this.options.minSafetyScore));
    }

    log.info('Auditing contract', { address, chain: normalizedChain });

    try {
      if (normalizedChain === 'ethereum') {
        await runEthereumChecks(address, draft, this.context);
      } else {
        await runSolanaChecks(address, draft, this.context);
      }
    } catch (error) {
      log.error('Audit failed', { address, chain: normalizedChain, error: errorMessage(error) });
      draft.checks.push({
        name: 'Audit Error',
        passed: false,
        score: 0,
        details: errorMessage(error),
        severity: 'CRITICAL',
      });
      return this.publish(finalizeAudit(draft, address, normalizedChain, this.options.minSafetyScore));
    }

    const audit = finalizeAudit(draft, address, normalizedChain, this.options.minSafetyScore);
    this.cache.set(key, audit);
    return this.publish(audit);
  }

  private publish(audit: ContractAudit): ContractAudit {
    if (audit.safe) this.safeCount++;
    log.info('Audit complete', { summary: summarizeAudit(audit) });
    this.events?.emit('audit_completed', audit);
    return audit;
  }

  /**
   * True when the token is safe to trade
   */
  async quickCheck(address: string, chain: string = 'ethereum'): Promise<boolean> {
    const audit = await this.audit(address, chain);
    return audit.safe;
  }

  /**
   * Cached audit, if still fresh
   */
  getCachedAudit(address: string, chain: string = 'ethereum'): ContractAudit | undefined {
    return this.cache.get(this.cacheKey(address, chain.trim().toLowerCase()));
  }

  getStats(): AuditorStats {
    return {
      auditsRun: this.auditsRun,
      cacheHits: this.cacheHits,
      safeCount: this.safeCount,
      cachedEntries: this.cache.size,
    };
  }
}
