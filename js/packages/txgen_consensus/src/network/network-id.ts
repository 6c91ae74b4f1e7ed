import { InvalidNetworkIdError } from '../errors';

export type NetworkType = 'mainnet' | 'testnet' | 'devnet' | 'simnet';

/**
 * Parsed network identifier. Only testnets carry a numeric suffix.
 */
export interface NetworkId {
  readonly type: NetworkType;
  readonly suffix?: number;
}

const ADDRESS_PREFIXES: Record<NetworkType, string> = {
  mainnet: 'kaspa',
  testnet: 'kaspatest',
  devnet: 'kaspadev',
  simnet: 'kaspasim',
};

const NETWORK_ID_PATTERN = /^(mainnet|testnet|devnet|simnet)(?:-(\d+))?$/;

function isNetworkType(value: string): value is NetworkType {
  return value in ADDRESS_PREFIXES;
}

/**
 * Parse `mainnet`, `testnet-<n>`, `devnet` or `simnet`
 *
 * @example
 * ```typescript
 * parseNetworkId('testnet-10'); // { type: 'testnet', suffix: 10 }
 * ```
 */
export function parseNetworkId(value: string | NetworkId): NetworkId {
  if (typeof value !== 'string') {
    return parseNetworkId(networkIdToString(value));
  }

  const match = NETWORK_ID_PATTERN.exec(value.trim().toLowerCase());
  if (!match || !isNetworkType(match[1])) {
    throw new InvalidNetworkIdError(value);
  }

  const type = match[1];
  const suffixText = match[2];

  if (type === 'testnet') {
    if (suffixText === undefined) {
      throw new InvalidNetworkIdError(value);
    }
    return Object.freeze({ type, suffix: Number(suffixText) });
  }

  if (suffixText !== undefined) {
    throw new InvalidNetworkIdError(value);
  }
  return Object.freeze({ type });
}

export function networkIdToString(id: NetworkId): string {
  return id.suffix === undefined ? id.type : `${id.type}-${id.suffix}`;
}

/**
 * Canonical string form, e.g. `' TestNet-11 '` becomes `'testnet-11'`
 */
export function normalizeNetworkId(value: string | NetworkId): string {
  return networkIdToString(parseNetworkId(value));
}

/**
 * Prefixed form used in node identifiers, e.g. `kaspa-testnet-10`
 */
export function toPrefixedNetworkId(value: string | NetworkId): string {
  return `kaspa-${normalizeNetworkId(value)}`;
}

export function addressPrefix(value: string | NetworkId): string {
  return ADDRESS_PREFIXES[parseNetworkId(value).type];
}

export function isMainnet(value: string | NetworkId): boolean {
  return parseNetworkId(value).type === 'mainnet';
}
