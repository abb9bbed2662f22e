// =========================================================
// ETHEREUM CHECKS — EVM CONTRACT AUDIT PATH
// =========================================================

import { ethers } from 'ethers';
import { SecurityCheck } from '../types';
import { AuditDraft, CheckContext, apiErrorCheck } from './safety';
import { errorMessage } from '../utils/errors';

/**
 * Tax check score: 5 points lost per percent of tax
 */
export function taxScore(tax: number): number {
  return 100 - Math.min(tax * 5, 100);
}

function taxCheck(name: string, tax: number, maxTax: number): SecurityCheck {
  return {
    name,
    passed: tax <= maxTax,
    score: taxScore(tax),
    details: `${tax}% tax (max ${maxTax}%)`,
    severity: tax > 20 ? 'HIGH' : 'MEDIUM',
  };
}

async function checkContractExistence(address: string, ctx: CheckContext): Promise<SecurityCheck[]> {
  try {
    const code = await ctx.call('getCode', () => ctx.providers.getCode(address));
    if (!code || code === '0x') {
      return [{
        name: 'Contract Existence',
        passed: false,
        score: 0,
        details: 'No contract code at address',
        severity: 'CRITICAL',
      }];
    }
    return [{
      name: 'Contract Existence',
      passed: true,
      score: 100,
      details: `Contract code present (${(code.length - 2) / 2} bytes)`,
      severity: 'LOW',
    }];
  } catch (error) {
    return [apiErrorCheck('Contract Existence', error)];
  }
}

async function checkHoneypot(address: string, draft: AuditDraft, ctx: CheckContext): Promise<SecurityCheck[]> {
  try {
    const report = await ctx.call('honeypot', () => ctx.providers.getHoneypotReport(address));
    draft.isHoneypot = report.isHoneypot;
    draft.buyTax = report.buyTax;
    draft.sellTax = report.sellTax;
    if (report.holderCount !== undefined) {
      draft.holderCount = report.holderCount;
    }

    return [
      {
        name: 'Honeypot Check',
        passed: !report.isHoneypot,
        score: report.isHoneypot ? 0 : 100,
        details: report.isHoneypot ? 'Token cannot be sold' : 'Buy and sell simulation succeeded',
        severity: report.isHoneypot ? 'CRITICAL' : 'LOW',
      },
      taxCheck('Buy Tax', report.buyTax, ctx.thresholds.maxBuyTax),
      taxCheck('Sell Tax', report.sellTax, ctx.thresholds.maxSellTax),
    ];
  } catch (error) {
    return [apiErrorCheck('Honeypot API', error)];
  }
}

async function checkLiquidity(address: string, draft: AuditDraft, ctx: CheckContext): Promise<SecurityCheck[]> {
  const getLiquidity = ctx.providers.getLiquidity;
  if (!getLiquidity) return [];

  try {
    const report = await ctx.call('liquidity', () => getLiquidity.call(ctx.providers, address));
    draft.liquidityUsd = report.liquidityUsd;
    draft.tokenName = draft.tokenName ?? report.name;
    draft.tokenSymbol = draft.tokenSymbol ?? report.symbol;
    draft.totalSupply = draft.totalSupply ?? report.totalSupply;

    const ok = report.liquidityUsd >= ctx.thresholds.minLiquidityUsd;
    return [{
      name: 'Liquidity',
      passed: ok,
      score: Math.min(report.liquidityUsd / 1000, 100),
      details: `$${report.liquidityUsd.toFixed(2)} liquidity`,
      severity: ok ? 'LOW' : 'HIGH',
    }];
  } catch (error) {
    return [apiErrorCheck('Liquidity API', error)];
  }
}

/**
 * Name, symbol and supply are informational; a failed read is not a check
 */
async function readIdentity(address: string, draft: AuditDraft, ctx: CheckContext): Promise<void> {
  try {
    const identity = await ctx.call('tokenIdentity', () => ctx.providers.getTokenIdentity(address));
    draft.tokenName = identity.name ?? draft.tokenName;
    draft.tokenSymbol = identity.symbol ?? draft.tokenSymbol;
    draft.totalSupply = identity.totalSupply ?? draft.totalSupply;
  } catch (error) {
    ctx.log.debug('Token identity unavailable', { address, error: errorMessage(error) });
  }
}

/**
 * Ethereum audit path. An invalid address stops here since no other
 * check can run against it; every other check always runs.
 */
export async function runEthereumChecks(rawAddress: string, draft: AuditDraft, ctx: CheckContext): Promise<void> {
  if (!ethers.utils.isAddress(rawAddress)) {
    draft.checks.push({
      name: 'Address Validation',
      passed: false,
      score: 0,
      details: 'Invalid Ethereum address',
      severity: 'CRITICAL',
    });
    return;
  }

  const address = ethers.utils.getAddress(rawAddress);
  const [existence, honeypot, liquidity] = await Promise.all([
    checkContractExistence(address, ctx),
    checkHoneypot(address, draft, ctx),
    checkLiquidity(address, draft, ctx),
    readIdentity(address, draft, ctx),
  ]);

  draft.checks.push(...existence, ...honeypot, ...liquidity);
}
