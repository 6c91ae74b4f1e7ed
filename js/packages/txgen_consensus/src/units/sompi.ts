import type { NetworkId } from '../network/network-id';
import { parseNetworkId } from '../network/network-id';
import { SOMPI_PER_KASPA } from '../network/params';
import type { Sompi } from '../types/types';

const DECIMALS = 8;
const KASPA_AMOUNT = /^(\d+)(?:\.(\d{0,8}))?$/;

/**
 * Exact decimal KAS string to sompi
 *
 * @example
 * ```typescript
 * kaspaToSompi('1.5'); // 150000000n
 * ```
 * @throws RangeError on a malformed amount or more than 8 decimals
 */
export function kaspaToSompi(kaspa: string): Sompi {
  const match = KASPA_AMOUNT.exec(kaspa.trim());
  if (!match) {
    throw new RangeError(`Invalid KAS amount: "${kaspa}"`);
  }
  const whole = BigInt(match[1]);
  const fraction = BigInt((match[2] ?? '').padEnd(DECIMALS, '0'));
  return whole * SOMPI_PER_KASPA + fraction;
}

/**
 * Sompi to a KAS decimal string without trailing zeros
 */
export function sompiToKaspaString(sompi: Sompi): string {
  const negative = sompi < 0n;
  const abs = negative ? -sompi : sompi;
  const whole = abs / SOMPI_PER_KASPA;
  const fraction = (abs % SOMPI_PER_KASPA).toString().padStart(DECIMALS, '0').replace(/0+$/, '');
  const text = fraction ? `${whole}.${fraction}` : whole.toString();
  return negative ? `-${text}` : text;
}

const CURRENCY_SUFFIXES: Record<NetworkId['type'], string> = {
  mainnet: 'KAS',
  testnet: 'TKAS',
  devnet: 'DKAS',
  simnet: 'SKAS',
};

/**
 * @example
 * ```typescript
 * sompiToKaspaStringWithSuffix(150000000n, 'testnet-10'); // '1.5 TKAS'
 * ```
 */
export function sompiToKaspaStringWithSuffix(sompi: Sompi, networkId: string | NetworkId): string {
  return `${sompiToKaspaString(sompi)} ${CURRENCY_SUFFIXES[parseNetworkId(networkId).type]}`;
}
