import { U64_MAX, ceilDiv, maxBigInt, sumBigInt } from '@txgen/utils';
import type { NetworkId } from '../network/network-id';
import { getConsensusParams, type ConsensusParams } from '../network/params';
import type { Transaction } from '../transaction/transaction';
import type { Sompi } from '../types/types';

/** version 2, input count 8, output count 8, lock time 8, subnetwork id 20, gas 8, payload hash 32, payload length 8 */
export const BLANK_TRANSACTION_SIZE = 94n;
/** Schnorr signature push: opcode, 64 bytes, sighash type */
export const SIGNATURE_SIZE = 66n;

const OUTPOINT_SIZE = 36n;
// Serialized size of a standard input spending the output, used by the dust rule
const DUST_INPUT_ALLOWANCE = 148n;
const FEE_RATE_SCALE = 1_000_000n;

/**
 * Shape of a transaction as far as compute mass is concerned
 */
export interface TransactionShape {
  inputCount: number;
  outputScriptLengths: readonly number[];
  payloadLength: number;
  /** Signature operations per input */
  sigOpCount: number;
  /** Signatures per input (multisig inputs cost more) */
  minimumSignatures: number;
}

/**
 * Fee rate in sompi per gram, scaled to micro-sompi
 */
export function scaleFeeRate(feeRate: number): bigint {
  if (!Number.isFinite(feeRate) || feeRate < 0) {
    throw new RangeError(`Fee rate must be a non-negative finite number, got ${feeRate}`);
  }
  return BigInt(Math.round(feeRate * Number(FEE_RATE_SCALE)));
}

/**
 * Compute, storage and total mass plus the fee rules derived from them.
 * All arithmetic is on bigint; every division that affects a fee rounds up.
 */
export class MassCalculator {
  constructor(readonly params: ConsensusParams) {}

  static forNetwork(networkId: string | NetworkId = 'mainnet'): MassCalculator {
    return new MassCalculator(getConsensusParams(networkId));
  }

  inputSize(signatureScriptLength = 0): bigint {
    return OUTPOINT_SIZE + 8n + BigInt(signatureScriptLength) + 8n;
  }

  outputSize(scriptLength: number): bigint {
    return 8n + 2n + 8n + BigInt(scriptLength);
  }

  transactionSize(shape: TransactionShape): bigint {
    return (
      BLANK_TRANSACTION_SIZE +
      BigInt(shape.payloadLength) +
      BigInt(shape.inputCount) * this.inputSize() +
      sumBigInt(shape.outputScriptLengths.map((length) => this.outputSize(length)))
    );
  }

  computeMass(shape: TransactionShape): bigint {
    const { massPerTxByte, massPerScriptPubKeyByte, massPerSigOp } = this.params;
    const inputs = BigInt(shape.inputCount);

    const sizeMass = massPerTxByte * this.transactionSize(shape);
    const scriptMass =
      massPerScriptPubKeyByte * sumBigInt(shape.outputScriptLengths.map((length) => 2n + BigInt(length)));
    const sigOpMass = massPerSigOp * BigInt(shape.sigOpCount) * inputs;
    const signatureMass = massPerTxByte * SIGNATURE_SIZE * BigInt(shape.minimumSignatures) * inputs;

    return sizeMass + scriptMass + sigOpMass + signatureMass;
  }

  /**
   * KIP-9 storage mass. Returns `U64_MAX` when an output is zero, which no
   * limit accepts.
   */
  storageMass(inputAmounts: readonly Sompi[], outputAmounts: readonly Sompi[]): bigint {
    const C = this.params.storageMassParameter;
    if (inputAmounts.length === 0 || outputAmounts.length === 0) return 0n;

    if (outputAmounts.some((amount) => amount <= 0n)) return U64_MAX;

    const harmonicOuts = this.outputStorageMass(outputAmounts);

    const relaxed =
      outputAmounts.length === 1 ||
      inputAmounts.length === 1 ||
      (outputAmounts.length === 2 && inputAmounts.length === 2);

    let inputTerm: bigint;
    if (relaxed) {
      inputTerm = sumBigInt(inputAmounts.map((amount) => (amount > 0n ? C / amount : 0n)));
    } else {
      const count = BigInt(inputAmounts.length);
      const meanIns = sumBigInt(inputAmounts) / count;
      inputTerm = meanIns > 0n ? count * (C / meanIns) : 0n;
    }

    return harmonicOuts > inputTerm ? harmonicOuts - inputTerm : 0n;
  }

  /**
   * Output side of the storage mass, Σ⌈C/o⌉. Bounds the storage mass of any
   * transaction paying these outputs from inputs much larger than them.
   */
  outputStorageMass(outputAmounts: readonly Sompi[]): bigint {
    if (outputAmounts.some((amount) => amount <= 0n)) return U64_MAX;
    const C = this.params.storageMassParameter;
    return sumBigInt(outputAmounts.map((amount) => ceilDiv(C, amount)));
  }

  totalMass(shape: TransactionShape, inputAmounts: readonly Sompi[], outputAmounts: readonly Sompi[]): bigint {
    return maxBigInt(this.computeMass(shape), this.storageMass(inputAmounts, outputAmounts));
  }

  feeForMass(mass: bigint, feeRate: number): Sompi {
    return ceilDiv(mass * scaleFeeRate(feeRate), FEE_RATE_SCALE);
  }

  minimumRelayFee(mass: bigint): Sompi {
    const { minimumRelayTransactionFee } = this.params;
    const fee = ceilDiv(mass * minimumRelayTransactionFee, 1000n);
    return fee === 0n ? minimumRelayTransactionFee : fee;
  }

  /**
   * Fee a transaction of `mass` must pay: the rate-based fee, never below the relay minimum
   */
  networkFee(mass: bigint, feeRate: number): Sompi {
    return maxBigInt(this.feeForMass(mass, feeRate), this.minimumRelayFee(mass));
  }

  isDust(amount: Sompi, scriptLength: number): boolean {
    const serialized = this.outputSize(scriptLength) + DUST_INPUT_ALLOWANCE;
    return (amount * 1000n) / (3n * serialized) < this.params.minimumRelayTransactionFee;
  }

  exceedsLimit(mass: bigint): boolean {
    return mass > this.params.maximumStandardTransactionMass;
  }

  /**
   * Compute mass of a concrete transaction. Inputs that are not signed yet are
   * charged `minimumSignatures` signatures each.
   */
  computeMassForTransaction(tx: Transaction, minimumSignatures = 1): bigint {
    const { massPerTxByte, massPerScriptPubKeyByte, massPerSigOp } = this.params;

    let size = BLANK_TRANSACTION_SIZE + BigInt(tx.payload.length);
    let sigOps = 0n;
    let estimatedSignatures = 0n;
    for (const input of tx.inputs) {
      size += this.inputSize(input.signatureScript.length);
      sigOps += BigInt(input.sigOpCount);
      if (input.signatureScript.length === 0) {
        estimatedSignatures += BigInt(minimumSignatures);
      }
    }

    let scriptBytes = 0n;
    for (const output of tx.outputs) {
      size += this.outputSize(output.scriptPublicKey.script.length);
      scriptBytes += 2n + BigInt(output.scriptPublicKey.script.length);
    }

    return (
      massPerTxByte * size +
      massPerScriptPubKeyByte * scriptBytes +
      massPerSigOp * sigOps +
      massPerTxByte * SIGNATURE_SIZE * estimatedSignatures
    );
  }

  /**
   * Total mass of a concrete transaction. Storage mass is only counted when
   * every input carries its spent coin.
   */
  transactionMass(tx: Transaction, minimumSignatures = 1): bigint {
    const computeMass = this.computeMassForTransaction(tx, minimumSignatures);
    const inputAmounts: Sompi[] = [];
    for (const input of tx.inputs) {
      if (!input.utxo) return computeMass;
      inputAmounts.push(input.utxo.amount);
    }
    const storageMass = this.storageMass(
      inputAmounts,
      tx.outputs.map((output) => output.value)
    );
    return maxBigInt(computeMass, storageMass);
  }
}

export function calculateTransactionMass(
  networkId: string | NetworkId,
  tx: Transaction,
  minimumSignatures = 1
): bigint {
  return MassCalculator.forNetwork(networkId).transactionMass(tx, minimumSignatures);
}

export function calculateStorageMass(
  networkId: string | NetworkId,
  inputAmounts: readonly Sompi[],
  outputAmounts: readonly Sompi[]
): bigint {
  return MassCalculator.forNetwork(networkId).storageMass(inputAmounts, outputAmounts);
}

/**
 * Network fee for a transaction at `feeRate` sompi per gram (network default when omitted)
 */
export function calculateTransactionFee(
  networkId: string | NetworkId,
  tx: Transaction,
  feeRate?: number,
  minimumSignatures = 1
): Sompi {
  const calculator = MassCalculator.forNetwork(networkId);
  const mass = calculator.transactionMass(tx, minimumSignatures);
  return calculator.networkFee(mass, feeRate ?? calculator.params.defaultFeeRate);
}

export function maximumStandardTransactionMass(networkId: string | NetworkId = 'mainnet'): bigint {
  return getConsensusParams(networkId).maximumStandardTransactionMass;
}
