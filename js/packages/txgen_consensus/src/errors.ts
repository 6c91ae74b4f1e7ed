import { TxgenError } from '@txgen/utils';

export class InvalidNetworkIdError extends TxgenError {
  override name = 'InvalidNetworkIdError';

  constructor(public readonly value: string) {
    super(
      'INVALID_NETWORK_ID',
      `Invalid network id "${value}" (expected mainnet, testnet-<n>, devnet or simnet)`
    );
  }
}

/**
 * Raised when a UTXO entry or transaction record cannot be converted
 */
export class InvalidUtxoRecordError extends TxgenError {
  override name = 'InvalidUtxoRecordError';

  constructor(message: string, cause?: Error) {
    super('INVALID_UTXO_RECORD', message, cause);
  }
}
