/**
 * Amount in sompi, the smallest unit (1 KAS = 100,000,000 sompi)
 */
export type Sompi = bigint;

/**
 * Versioned locking script
 */
export interface ScriptPublicKey {
  readonly version: number;
  readonly script: Uint8Array;
}

export interface Outpoint {
  /** 32-byte transaction id, lowercase hex */
  readonly transactionId: string;
  readonly index: number;
}

/**
 * Unspent transaction output (UTXO entry). Frozen once observed.
 */
export interface Coin {
  readonly address?: string;
  readonly outpoint: Outpoint;
  readonly amount: Sompi;
  readonly scriptPublicKey: ScriptPublicKey;
  readonly blockDaaScore: bigint;
  readonly isCoinbase: boolean;
}

const TRANSACTION_ID_PATTERN = /^[0-9a-f]{64}$/;
const U32_MAX = 0xffff_ffff;

export function isTransactionId(value: string): boolean {
  return TRANSACTION_ID_PATTERN.test(value);
}

/**
 * Map key for an outpoint: `<transactionId>-<index>`
 */
export function outpointKey(outpoint: Outpoint): string {
  return `${outpoint.transactionId}-${outpoint.index}`;
}

export function coinKey(coin: Coin): string {
  return outpointKey(coin.outpoint);
}

/**
 * Validate and freeze a coin
 *
 * @throws RangeError on a malformed outpoint or a negative amount
 */
export function createCoin(fields: Coin): Coin {
  const { outpoint, scriptPublicKey } = fields;

  if (!isTransactionId(outpoint.transactionId)) {
    throw new RangeError(`Invalid transaction id: ${outpoint.transactionId}`);
  }
  if (!Number.isInteger(outpoint.index) || outpoint.index < 0 || outpoint.index > U32_MAX) {
    throw new RangeError(`Invalid outpoint index: ${outpoint.index}`);
  }
  if (fields.amount < 0n) {
    throw new RangeError(`Coin amount must not be negative, got ${fields.amount}`);
  }
  if (fields.blockDaaScore < 0n) {
    throw new RangeError(`Block DAA score must not be negative, got ${fields.blockDaaScore}`);
  }

  return Object.freeze({
    ...(fields.address === undefined ? {} : { address: fields.address }),
    outpoint: Object.freeze({ transactionId: outpoint.transactionId, index: outpoint.index }),
    amount: fields.amount,
    scriptPublicKey: Object.freeze({
      version: scriptPublicKey.version,
      script: Uint8Array.from(scriptPublicKey.script),
    }),
    blockDaaScore: fields.blockDaaScore,
    isCoinbase: fields.isCoinbase,
  });
}

export function scriptPublicKeyEquals(a: ScriptPublicKey, b: ScriptPublicKey): boolean {
  if (a.version !== b.version || a.script.length !== b.script.length) return false;
  return a.script.every((byte, i) => byte === b.script[i]);
}

/**
 * Structural check for values arriving from untyped callers
 */
export function isCoin(value: unknown): value is Coin {
  if (typeof value !== 'object' || value === null) return false;
  if (!('outpoint' in value) || !('scriptPublicKey' in value)) return false;

  const { outpoint, scriptPublicKey } = value;
  return (
    typeof outpoint === 'object' &&
    outpoint !== null &&
    'transactionId' in outpoint &&
    typeof outpoint.transactionId === 'string' &&
    'index' in outpoint &&
    typeof outpoint.index === 'number' &&
    typeof scriptPublicKey === 'object' &&
    scriptPublicKey !== null &&
    'script' in scriptPublicKey &&
    scriptPublicKey.script instanceof Uint8Array &&
    'amount' in value &&
    typeof value.amount === 'bigint' &&
    'blockDaaScore' in value &&
    typeof value.blockDaaScore === 'bigint' &&
    'isCoinbase' in value &&
    typeof value.isCoinbase === 'boolean'
  );
}
