// =========================================================
// SOLANA CHECKS — SPL TOKEN AUDIT PATH
// =========================================================

import bs58 from 'bs58';
import { SecurityCheck } from '../types';
import { AuditDraft, CheckContext, apiErrorCheck, severityFromLevel } from './safety';

/**
 * A Solana address is base58 that decodes to a 32-byte public key
 */
export function isSolanaAddress(address: string): boolean {
  try {
    return bs58.decode(address).length === 32;
  } catch {
    return false;
  }
}

/**
 * Mint and freeze authorities. A live freeze authority lets the issuer
 * lock holders out of selling, so only its absence counts as a
 * non-honeypot verdict.
 */
async function checkAuthorities(address: string, draft: AuditDraft, ctx: CheckContext): Promise<SecurityCheck[]> {
  try {
    const mint = await ctx.call('mintInfo', () => ctx.providers.getMintInfo(address));
    draft.mintAuthority = mint.mintAuthority;
    draft.freezeAuthority = mint.freezeAuthority;
    draft.totalSupply = mint.supply;
    draft.isHoneypot = mint.freezeAuthority;

    return [
      {
        name: 'Mint Authority',
        passed: !mint.mintAuthority,
        score: mint.mintAuthority ? 0 : 100,
        details: mint.mintAuthority ? 'Supply can still be minted' : 'Mint authority revoked',
        severity: mint.mintAuthority ? 'HIGH' : 'LOW',
      },
      {
        name: 'Freeze Authority',
        passed: !mint.freezeAuthority,
        score: mint.freezeAuthority ? 0 : 100,
        details: mint.freezeAuthority ? 'Token accounts can be frozen' : 'Freeze authority revoked',
        severity: mint.freezeAuthority ? 'CRITICAL' : 'LOW',
      },
    ];
  } catch (error) {
    return [apiErrorCheck('Mint Account', error)];
  }
}

async function checkRugCheck(address: string, draft: AuditDraft, ctx: CheckContext): Promise<SecurityCheck[]> {
  try {
    const report = await ctx.call('rugcheck', () => ctx.providers.getRugCheckReport(address));
    draft.tokenName = report.tokenName ?? draft.tokenName;
    draft.tokenSymbol = report.tokenSymbol ?? draft.tokenSymbol;

    const ok = report.score >= 50 && report.risks.length === 0;
    const checks: SecurityCheck[] = [{
      name: 'RugCheck Analysis',
      passed: ok,
      score: report.score,
      details: `RugCheck score: ${report.score}, Risks: ${report.risks.length}`,
      severity: ok ? 'LOW' : 'HIGH',
    }];

    for (const risk of report.risks) {
      checks.push({
        name: risk.name || 'Unknown Risk',
        passed: false,
        score: 0,
        details: risk.description,
        severity: severityFromLevel(risk.level),
      });
    }
    return checks;
  } catch (error) {
    return [apiErrorCheck('RugCheck API', error)];
  }
}

async function checkHolderConcentration(address: string, draft: AuditDraft, ctx: CheckContext): Promise<SecurityCheck[]> {
  try {
    const pct = await ctx.call('topHolder', () => ctx.providers.getTopHolderPercent(address));
    draft.topHolderPercent = pct;

    const ok = pct <= ctx.thresholds.maxHolderConcentration;
    return [{
      name: 'Holder Concentration',
      passed: ok,
      score: Math.max(0, 100 - pct),
      details: `Top holder owns ${pct.toFixed(1)}% (max ${ctx.thresholds.maxHolderConcentration}%)`,
      severity: ok ? 'LOW' : 'HIGH',
    }];
  } catch (error) {
    return [apiErrorCheck('Holder API', error)];
  }
}

/**
 * Solana audit path
 */
export async function runSolanaChecks(address: string, draft: AuditDraft, ctx: CheckContext): Promise<void> {
  if (!isSolanaAddress(address)) {
    draft.checks.push({
      name: 'Address Validation',
      passed: false,
      score: 0,
      details: 'Invalid Solana address',
      severity: 'CRITICAL',
    });
    return;
  }

  const [authorities, rugcheck, holders] = await Promise.all([
    checkAuthorities(address, draft, ctx),
    checkRugCheck(address, draft, ctx),
    checkHolderConcentration(address, draft, ctx),
  ]);

  draft.checks.push(...authorities, ...rugcheck, ...holders);
}
