// =========================================================
// AUDIT PROVIDERS — CHAIN RPC AND AUDIT API CLIENTS
// =========================================================

import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { ethers } from 'ethers';
import { Connection, PublicKey } from '@solana/web3.js';
import {
  AuditProviders,
  HoneypotReport,
  LiquidityReport,
  MintInfo,
  RugCheckReport,
  TokenIdentity,
} from '../types';
import { AUDITOR_CONFIG } from '../config';

const ERC20_ABI = [
  'function name() view returns (string)',
  'function symbol() view returns (string)',
  'function totalSupply() view returns (uint256)',
];

/**
 * SPL Token mint account layout
 */
const MINT_ACCOUNT_SIZE = 82;
const MINT_SUPPLY_OFFSET = 36;
const MINT_DECIMALS_OFFSET = 44;
const MINT_FREEZE_OPTION_OFFSET = 46;

const HoneypotResponseSchema = z.object({
  honeypotResult: z.object({ isHoneypot: z.boolean().optional() }).nullish(),
  simulationResult: z.object({
    buyTax: z.coerce.number().optional(),
    sellTax: z.coerce.number().optional(),
  }).nullish(),
  holderAnalysis: z.object({ holders: z.coerce.number().optional() }).nullish(),
});

const RugCheckResponseSchema = z.object({
  score: z.coerce.number().default(0),
  risks: z.array(z.object({
    name: z.string().default('Unknown Risk'),
    description: z.string().default(''),
    level: z.string().default('medium'),
  })).nullish(),
  tokenMeta: z.object({
    name: z.string().optional(),
    symbol: z.string().optional(),
  }).nullish(),
});

const DextoolsResponseSchema = z.object({
  data: z.object({
    name: z.string().optional(),
    symbol: z.string().optional(),
    totalSupply: z.union([z.string(), z.number()]).optional(),
    liquidity: z.object({ usd: z.coerce.number().optional() }).nullish(),
  }),
});

/**
 * Missing verdicts and taxes count against the token
 */
export function parseHoneypotResponse(body: unknown): HoneypotReport {
  const data = HoneypotResponseSchema.parse(body);
  return {
    isHoneypot: data.honeypotResult?.isHoneypot ?? true,
    buyTax: data.simulationResult?.buyTax ?? 100,
    sellTax: data.simulationResult?.sellTax ?? 100,
    holderCount: data.holderAnalysis?.holders,
  };
}

export function parseRugCheckResponse(body: unknown): RugCheckReport {
  const data = RugCheckResponseSchema.parse(body);
  return {
    score: data.score,
    risks: data.risks ?? [],
    tokenName: data.tokenMeta?.name,
    tokenSymbol: data.tokenMeta?.symbol,
  };
}

export function parseDextoolsResponse(body: unknown): LiquidityReport {
  const { data } = DextoolsResponseSchema.parse(body);
  return {
    liquidityUsd: data.liquidity?.usd ?? 0,
    name: data.name,
    symbol: data.symbol,
    totalSupply: data.totalSupply === undefined ? undefined : String(data.totalSupply),
  };
}

/**
 * Decode the fixed-size SPL mint account. Option tags are little-endian u32s;
 * only the low byte is ever set.
 */
export function parseMintAccount(data: Buffer): MintInfo {
  if (data.length < MINT_ACCOUNT_SIZE) {
    throw new Error(`Mint account too small (${data.length} bytes)`);
  }
  return {
    mintAuthority: data[0] === 1,
    supply: data.readBigUInt64LE(MINT_SUPPLY_OFFSET).toString(),
    decimals: data[MINT_DECIMALS_OFFSET],
    freezeAuthority: data[MINT_FREEZE_OPTION_OFFSET] === 1,
  };
}

/**
 * Percent of supply held by one account, to two decimals
 */
export function holderPercent(holderAmount: string, supply: string): number {
  const total = BigInt(supply);
  if (total === BigInt(0)) {
    throw new Error('Token supply is zero');
  }
  return Number((BigInt(holderAmount) * BigInt(10000)) / total) / 100;
}

export interface LiveProviderOptions {
  ethereumRpcUrl: string;
  solanaRpcUrl: string;
  dextoolsApiKey: string;
  honeypotApiUrl: string;
  rugcheckApiUrl: string;
  dextoolsApiUrl: string;
  requestTimeoutMs: number;
}

/**
 * Providers backed by public RPC endpoints and audit APIs
 */
export class LiveAuditProviders implements AuditProviders {
  private readonly options: LiveProviderOptions;
  private readonly http: AxiosInstance;
  private readonly ethProvider: ethers.providers.JsonRpcProvider;
  private readonly solana: Connection;

  getLiquidity?: (address: string) => Promise<LiquidityReport>;

  constructor(options: Partial<LiveProviderOptions> = {}) {
    this.options = { ...AUDITOR_CONFIG, ...options };
    this.http = axios.create({ timeout: this.options.requestTimeoutMs });
    this.ethProvider = new ethers.providers.JsonRpcProvider(this.options.ethereumRpcUrl);
    this.solana = new Connection(this.options.solanaRpcUrl, 'confirmed');

    const apiKey = this.options.dextoolsApiKey;
    if (apiKey) {
      this.getLiquidity = async (address: string): Promise<LiquidityReport> => {
        const response = await this.http.get(`${this.options.dextoolsApiUrl}/${address}`, {
          headers: { 'X-API-Key': apiKey },
        });
        return parseDextoolsResponse(response.data);
      };
    }
  }

  async getCode(address: string): Promise<string> {
    return this.ethProvider.getCode(address);
  }

  async getTokenIdentity(address: string): Promise<TokenIdentity> {
    const contract = new ethers.Contract(address, ERC20_ABI, this.ethProvider);
    const [name, symbol, supply] = await Promise.all([
      contract.name(),
      contract.symbol(),
      contract.totalSupply(),
    ]);
    return {
      name: z.string().parse(name),
      symbol: z.string().parse(symbol),
      totalSupply: ethers.BigNumber.from(supply).toString(),
    };
  }

  async getHoneypotReport(address: string): Promise<HoneypotReport> {
    const response = await this.http.get(this.options.honeypotApiUrl, {
      params: { address, chainID: '1' },
    });
    return parseHoneypotResponse(response.data);
  }

  async getRugCheckReport(address: string): Promise<RugCheckReport> {
    const response = await this.http.get(`${this.options.rugcheckApiUrl}/${address}/report`);
    return parseRugCheckResponse(response.data);
  }

  async getMintInfo(address: string): Promise<MintInfo> {
    const info = await this.solana.getAccountInfo(new PublicKey(address));
    if (!info) {
      throw new Error('Mint account not found');
    }
    return parseMintAccount(info.data);
  }

  async getTopHolderPercent(address: string): Promise<number> {
    const mint = new PublicKey(address);
    const [largest, supply] = await Promise.all([
      this.solana.getTokenLargestAccounts(mint),
      this.solana.getTokenSupply(mint),
    ]);
    const top = largest.value[0];
    if (!top) return 0;
    return holderPercent(top.amount, supply.value.amount);
  }
}
