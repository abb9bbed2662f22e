import { Position } from '../../src/types';
import { applyBuyFill, createPendingPosition, transition } from '../../src/trading/position';

/**
 * An OPEN ethereum position filled at the given price
 */
export function openPosition(entryUsd: number, price: number, address: string = '0x' + 'cd'.repeat(20)): Position {
  const position = createPendingPosition(address, 'ethereum', 'TST', entryUsd);
  transition(position, 'EXECUTING');
  applyBuyFill(position, { price, tokenAmount: entryUsd / price, txRef: 'tx-buy' });
  return position;
}
