// =========================================================
// DRY RUN — SIMULATED FILLS, PRICES AND AUDIT DATA
// =========================================================

import * as crypto from 'crypto';
import {
  AuditProviders,
  BuyFill,
  Chain,
  HoneypotReport,
  LiquidityReport,
  MintInfo,
  Position,
  RugCheckReport,
  SellFill,
  TokenIdentity,
  TradeGateway,
} from '../types';
import { ENGINE_CONFIG } from '../config';
import { logger } from '../utils/logger';

const log = logger.child('dry-run');

export interface DryRunOptions {
  balanceUsd: number;
  entryPrice: number;
  minMove: number; // fractional move per price check
  maxMove: number;
  random: () => number;
}

function generateTxRef(): string {
  return `DRYRUN-${crypto.randomBytes(8).toString('hex')}`;
}

/**
 * Paper wallet. Every buy fills at a fixed price and prices then
 * random-walk between minMove and maxMove per check.
 */
export class DryRunGateway implements TradeGateway {
  private readonly options: DryRunOptions;
  private balanceUsd: number;

  constructor(options: Partial<DryRunOptions> = {}) {
    this.options = {
      balanceUsd: ENGINE_CONFIG.dryRunBalanceUsd,
      entryPrice: ENGINE_CONFIG.dryRunEntryPrice,
      minMove: -0.05,
      maxMove: 0.15,
      random: Math.random,
      ...options,
    };
    this.balanceUsd = this.options.balanceUsd;
  }

  async buy(address: string, chain: Chain, amountUsd: number): Promise<BuyFill> {
    if (amountUsd > this.balanceUsd) {
      throw new Error(`Insufficient paper balance: ${this.balanceUsd.toFixed(2)} < ${amountUsd.toFixed(2)}`);
    }
    this.balanceUsd -= amountUsd;

    const price = this.options.entryPrice;
    const fill: BuyFill = { price, tokenAmount: amountUsd / price, txRef: generateTxRef() };
    log.debug('Paper buy filled', { address, chain, amountUsd, price });
    return fill;
  }

  async sell(position: Position): Promise<SellFill> {
    const price = position.currentPrice;
    this.balanceUsd += position.tokenAmount * price;
    log.debug('Paper sell filled', { id: position.id, price });
    return { price, txRef: generateTxRef() };
  }

  async getPrice(position: Position): Promise<number> {
    const { minMove, maxMove, random } = this.options;
    const move = minMove + random() * (maxMove - minMove);
    return position.currentPrice * (1 + move);
  }

  async getBalanceUsd(): Promise<number> {
    return this.balanceUsd;
  }
}

/**
 * Stable pseudo-random bytes for an address, so repeated audits agree
 */
function addressSeed(address: string): Buffer {
  return crypto.createHash('sha256').update(address).digest();
}

/**
 * Fabricated audit data with no network access. Roughly safeRatio of
 * addresses come back clean; the rest look like honeypots.
 */
export class SimulatedAuditProviders implements AuditProviders {
  private readonly safeRatio: number;

  constructor(safeRatio: number = 0.8) {
    this.safeRatio = safeRatio;
  }

  private profile(address: string): { safe: boolean; seed: Buffer } {
    const seed = addressSeed(address);
    return { safe: seed[0] / 256 < this.safeRatio, seed };
  }

  async getCode(address: string): Promise<string> {
    const { seed } = this.profile(address);
    return `0x6080604052${seed.toString('hex')}`;
  }

  async getTokenIdentity(address: string): Promise<TokenIdentity> {
    return {
      name: `Simulated ${address.slice(0, 6)}`,
      symbol: 'SIM',
      totalSupply: '1000000000000000000000000000',
    };
  }

  async getHoneypotReport(address: string): Promise<HoneypotReport> {
    const { safe, seed } = this.profile(address);
    return {
      isHoneypot: !safe,
      buyTax: safe ? seed[1] % 5 : 20 + (seed[1] % 10),
      sellTax: safe ? seed[2] % 5 : 25 + (seed[2] % 10),
      holderCount: 50 + seed[3],
    };
  }

  async getLiquidity(address: string): Promise<LiquidityReport> {
    const { safe, seed } = this.profile(address);
    return {
      liquidityUsd: safe ? 50000 + seed[4] * 1000 : 1000 + seed[4] * 10,
      symbol: 'SIM',
    };
  }

  async getMintInfo(address: string): Promise<MintInfo> {
    const { safe } = this.profile(address);
    return {
      mintAuthority: !safe,
      freezeAuthority: !safe,
      supply: '1000000000000000',
      decimals: 6,
    };
  }

  async getTopHolderPercent(address: string): Promise<number> {
    const { safe, seed } = this.profile(address);
    return safe ? 5 + (seed[5] % 20) : 60 + (seed[5] % 30);
  }

  async getRugCheckReport(address: string): Promise<RugCheckReport> {
    const { safe, seed } = this.profile(address);
    if (safe) {
      return { score: 80 + (seed[6] % 20), risks: [], tokenSymbol: 'SIM' };
    }
    return {
      score: 10 + (seed[6] % 30),
      risks: [{ name: 'Freeze Authority still enabled', description: 'Issuer can freeze holder accounts', level: 'danger' }],
      tokenSymbol: 'SIM',
    };
  }
}
