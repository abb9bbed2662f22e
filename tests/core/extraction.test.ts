import { describe, expect, it } from 'vitest';
import bs58 from 'bs58';
import { extractAddress } from '../../src/core/extraction';

const EVM = '0x' + 'ab'.repeat(20);
const SOLANA = bs58.encode(Buffer.alloc(32, 7));

describe('extractAddress', () => {
  it('finds an EVM address', () => {
    expect(extractAddress(`CA: ${EVM} go`)).toEqual({ address: EVM, chain: 'ethereum' });
  });

  it('finds a base58 address', () => {
    expect(extractAddress(`mint ${SOLANA} live`)).toEqual({ address: SOLANA, chain: 'solana' });
  });

  it('prefers the EVM address when both appear', () => {
    expect(extractAddress(`${SOLANA} and ${EVM}`)).toEqual({ address: EVM, chain: 'ethereum' });
  });

  it('lowercases EVM addresses and keeps base58 as written', () => {
    expect(extractAddress(`CA: 0x${'AB'.repeat(20)}`)).toEqual({ address: EVM, chain: 'ethereum' });
    expect(extractAddress(`mint ${SOLANA}`)).toEqual({ address: SOLANA, chain: 'solana' });
  });

  it('returns null when nothing matches', () => {
    expect(extractAddress('no address here')).toBeNull();
    expect(extractAddress('0x1234')).toBeNull();
  });
});
