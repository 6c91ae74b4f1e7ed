export { InvalidNetworkIdError, InvalidUtxoRecordError } from './errors';

export {
  parseNetworkId,
  networkIdToString,
  normalizeNetworkId,
  toPrefixedNetworkId,
  addressPrefix,
  isMainnet,
} from './network/network-id';
export type { NetworkId, NetworkType } from './network/network-id';

export {
  SOMPI_PER_KASPA,
  getConsensusParams,
  withConsensusOverrides,
  setCoinbaseMaturity,
  setUserTransactionMaturity,
  resetMaturityOverrides,
} from './network/params';
export type { ConsensusParams } from './network/params';

export {
  outpointKey,
  coinKey,
  createCoin,
  isCoin,
  isTransactionId,
  scriptPublicKeyEquals,
} from './types/types';
export type { Coin, Outpoint, ScriptPublicKey, Sompi } from './types/types';

export { scriptPublicKeyFromHex, scriptPublicKeyToHex } from './utxo/script-public-key';
export {
  utxoEntryFromRecord,
  utxoEntryToRecord,
  describeZodError,
  hexSchema,
  u64Schema,
} from './utxo/utxo-entry';
export type { UtxoEntryRecord, UtxoEntryInput } from './utxo/utxo-entry';

export {
  TRANSACTION_VERSION,
  SUBNETWORK_ID_NATIVE,
  DEFAULT_SEQUENCE,
  computeTransactionId,
  createTransaction,
  withSignatureScripts,
  totalInputAmount,
  totalOutputAmount,
} from './transaction/transaction';
export type {
  Transaction,
  TransactionFields,
  TransactionInput,
  TransactionOutput,
} from './transaction/transaction';
export { transactionFromRecord, transactionToRecord } from './transaction/transaction-record';
export type {
  TransactionRecord,
  TransactionInputRecord,
  TransactionOutputRecord,
} from './transaction/transaction-record';

export {
  BLANK_TRANSACTION_SIZE,
  SIGNATURE_SIZE,
  MassCalculator,
  scaleFeeRate,
  calculateTransactionMass,
  calculateStorageMass,
  calculateTransactionFee,
  maximumStandardTransactionMass,
} from './mass/mass-calculator';
export type { TransactionShape } from './mass/mass-calculator';

export { kaspaToSompi, sompiToKaspaString, sompiToKaspaStringWithSuffix } from './units/sompi';
