import { afterEach, describe, expect, it, vi } from 'vitest';
import bs58 from 'bs58';
import { ContractAuditor } from '../../src/audit/contractAuditor';
import { EventBus } from '../../src/utils/eventEmitter';
import { cleanProviders } from './fakeProviders';

const TOKEN = '0x' + 'ab'.repeat(20);
const MINT = bs58.encode(Buffer.alloc(32, 9));

const THRESHOLDS = {
  minSafetyScore: 80,
  minLiquidityUsd: 10000,
  maxHolderConcentration: 50,
  maxBuyTax: 10,
  maxSellTax: 10,
  cacheTtlMs: 300_000,
  requestTimeoutMs: 1000,
};

describe('ContractAuditor (ethereum)', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('passes a clean token', async () => {
    const auditor = new ContractAuditor(cleanProviders(), THRESHOLDS);
    const audit = await auditor.audit(TOKEN, 'ethereum');

    expect(audit.checks.map(c => c.name)).toEqual(['Contract Existence', 'Honeypot Check', 'Buy Tax', 'Sell Tax']);
    expect(audit.safetyScore).toBe(100);
    expect(audit.riskLevel).toBe('SAFE');
    expect(audit.safe).toBe(true);
    expect(audit.isHoneypot).toBe(false);
    expect(audit.tokenSymbol).toBe('TST');
    expect(audit.holderCount).toBe(120);
  });

  it('serves repeat audits from cache until the ttl passes', async () => {
    vi.useFakeTimers();
    const providers = cleanProviders();
    const auditor = new ContractAuditor(providers, THRESHOLDS);

    const first = await auditor.audit(TOKEN, 'ethereum');
    const second = await auditor.audit(TOKEN, 'Ethereum');

    expect(second).toBe(first);
    expect(providers.getCode).toHaveBeenCalledTimes(1);
    expect(auditor.getStats()).toMatchObject({ auditsRun: 1, cacheHits: 1, cachedEntries: 1 });

    vi.advanceTimersByTime(300_000);
    expect(auditor.getCachedAudit(TOKEN)).toBeUndefined();
    await auditor.audit(TOKEN, 'ethereum');
    expect(providers.getCode).toHaveBeenCalledTimes(2);
  });

  it('shares one cache entry across EVM address casings', async () => {
    const providers = cleanProviders();
    const auditor = new ContractAuditor(providers, THRESHOLDS);

    const first = await auditor.audit('0x' + 'AB'.repeat(20), 'ethereum');
    const second = await auditor.audit(TOKEN, 'ethereum');

    expect(second).toBe(first);
    expect(first.address).toBe(TOKEN);
    expect(providers.getCode).toHaveBeenCalledTimes(1);
  });

  it('fails a honeypot even when the mean clears the bar', async () => {
    const providers = cleanProviders({
      getHoneypotReport: vi.fn(async () => ({ isHoneypot: true, buyTax: 0, sellTax: 0 })),
      getLiquidity: vi.fn(async () => ({ liquidityUsd: 200_000 })),
    });
    const audit = await new ContractAuditor(providers, THRESHOLDS).audit(TOKEN, 'ethereum');

    expect(audit.checks).toHaveLength(5);
    expect(audit.safetyScore).toBe(80);
    expect(audit.liquidityUsd).toBe(200_000);
    expect(audit.safe).toBe(false);
  });

  it('gives partial credit when the honeypot API fails', async () => {
    const providers = cleanProviders({
      getHoneypotReport: vi.fn(async () => {
        throw new Error('503 Service Unavailable');
      }),
    });
    const audit = await new ContractAuditor(providers, THRESHOLDS).audit(TOKEN, 'ethereum');

    expect(audit.checks.map(c => c.name)).toEqual(['Contract Existence', 'Honeypot API']);
    expect(audit.safetyScore).toBe(75);
    expect(audit.riskLevel).toBe('LOW');
    expect(audit.isHoneypot).toBe(true);
    expect(audit.safe).toBe(false);
  });

  it('fails the existence check when there is no code', async () => {
    const providers = cleanProviders({ getCode: vi.fn(async () => '0x') });
    const audit = await new ContractAuditor(providers, THRESHOLDS).audit(TOKEN, 'ethereum');

    expect(audit.checks[0]).toMatchObject({ name: 'Contract Existence', passed: false, score: 0, severity: 'CRITICAL' });
    expect(audit.checks).toHaveLength(4);
    expect(audit.safe).toBe(false);
  });

  it('times out slow lookups', async () => {
    const providers = cleanProviders({ getCode: vi.fn(() => new Promise<string>(() => {})) });
    const auditor = new ContractAuditor(providers, { ...THRESHOLDS, requestTimeoutMs: 20 });
    const audit = await auditor.audit(TOKEN, 'ethereum');

    expect(audit.checks[0].details).toBe('API error: getCode timed out after 20ms');
    expect(audit.checks[0].score).toBe(50);
  });

  it('stops at an invalid address', async () => {
    const providers = cleanProviders();
    const audit = await new ContractAuditor(providers, THRESHOLDS).audit('0xnope', 'ethereum');

    expect(audit.checks).toHaveLength(1);
    expect(audit.checks[0].name).toBe('Address Validation');
    expect(audit.riskLevel).toBe('CRITICAL');
    expect(providers.getCode).not.toHaveBeenCalled();
  });

  it('treats unsupported chains as unsafe and never caches them', async () => {
    const auditor = new ContractAuditor(cleanProviders(), THRESHOLDS);
    const audit = await auditor.audit(TOKEN, 'bsc');

    expect(audit.checks).toEqual([]);
    expect(audit.safe).toBe(false);
    expect(auditor.getCachedAudit(TOKEN, 'bsc')).toBeUndefined();
    await auditor.audit(TOKEN, 'bsc');
    expect(auditor.getStats().auditsRun).toBe(2);
  });

  it('publishes audit_completed', async () => {
    const events = new EventBus();
    const handler = vi.fn();
    events.on('audit_completed', handler);

    await new ContractAuditor(cleanProviders(), THRESHOLDS, events).audit(TOKEN);
    expect(handler).toHaveBeenCalledTimes(1);
  });

  it('quickCheck returns the verdict', async () => {
    await expect(new ContractAuditor(cleanProviders(), THRESHOLDS).quickCheck(TOKEN)).resolves.toBe(true);
  });
});

describe('ContractAuditor (solana)', () => {
  it('passes a clean mint', async () => {
    const audit = await new ContractAuditor(cleanProviders(), THRESHOLDS).audit(MINT, 'solana');

    expect(audit.checks.map(c => c.name)).toEqual([
      'Mint Authority',
      'Freeze Authority',
      'RugCheck Analysis',
      'Holder Concentration',
    ]);
    // (100 + 100 + 85 + 92.5) / 4
    expect(audit.safetyScore).toBe(94.375);
    expect(audit.safe).toBe(true);
    expect(audit.isHoneypot).toBe(false);
    expect(audit.topHolderPercent).toBe(7.5);
    expect(audit.tokenSymbol).toBe('SOLT');
    expect(audit.totalSupply).toBe('1000000');
  });

  it('adds one failed check per reported risk', async () => {
    const providers = cleanProviders({
      getRugCheckReport: vi.fn(async () => ({
        score: 90,
        risks: [{ name: 'Mutable metadata', description: 'Metadata can change', level: 'warn' }],
      })),
    });
    const audit = await new ContractAuditor(providers, THRESHOLDS).audit(MINT, 'solana');

    const risk = audit.checks.find(c => c.name === 'Mutable metadata');
    expect(risk).toMatchObject({ passed: false, score: 0, severity: 'MEDIUM' });
    expect(audit.checks.find(c => c.name === 'RugCheck Analysis')?.passed).toBe(false);
    // (100 + 100 + 90 + 0 + 92.5) / 5
    expect(audit.safetyScore).toBe(76.5);
    expect(audit.safe).toBe(false);
  });

  it('a live freeze authority is a honeypot', async () => {
    const providers = cleanProviders({
      getMintInfo: vi.fn(async () => ({ mintAuthority: false, freezeAuthority: true, supply: '1', decimals: 0 })),
    });
    const audit = await new ContractAuditor(providers, THRESHOLDS).audit(MINT, 'solana');

    expect(audit.isHoneypot).toBe(true);
    expect(audit.freezeAuthority).toBe(true);
    expect(audit.safe).toBe(false);
  });

  it('an unreadable mint leaves the token unsafe', async () => {
    const providers = cleanProviders({
      getMintInfo: vi.fn(async () => {
        throw new Error('rpc down');
      }),
    });
    const audit = await new ContractAuditor(providers, THRESHOLDS).audit(MINT, 'solana');

    expect(audit.checks[0]).toMatchObject({ name: 'Mint Account', score: 50 });
    expect(audit.isHoneypot).toBe(true);
    expect(audit.safe).toBe(false);
  });

  it('rejects a string that is not a public key', async () => {
    const audit = await new ContractAuditor(cleanProviders(), THRESHOLDS).audit('not-a-key', 'solana');
    expect(audit.checks.map(c => c.name)).toEqual(['Address Validation']);
  });
});
