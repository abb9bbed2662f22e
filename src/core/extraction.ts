// =========================================================
// ADDRESS EXTRACTION — CONTRACT ADDRESSES IN CHATTER
// =========================================================

import { AddressMatch, normalizeAddress } from '../types';
import { ADDRESS_PATTERNS } from '../config/lexicon';

/**
 * Find the first contract address in a message.
 * An EVM-style match always wins over a base58-style one.
 */
export function extractAddress(text: string): AddressMatch | null {
  const evm = ADDRESS_PATTERNS.ethereum.exec(text);
  if (evm) {
    return { address: normalizeAddress(evm[0]), chain: 'ethereum' };
  }

  const base58 = ADDRESS_PATTERNS.solana.exec(text);
  if (base58) {
    return { address: base58[0], chain: 'solana' };
  }

  return null;
}
