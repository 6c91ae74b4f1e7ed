import { MassCalculator, type Coin, type Sompi, type TransactionShape } from '@txgen/consensus';
import { sumBigInt } from '@txgen/utils';
import type { MaturitySet } from '@txgen/utxo';
import { FeeConvergenceError, InsufficientFundsError, MassExceedsLimitError, ValueConservationError } from '../errors';
import { CoinSelector, type Selection } from '../selection/coin-selector';
import type { ResolvedOutput } from '../types/types';

export const MAX_FEE_PASSES = 8;

/**
 * Builder working state for one transaction
 */
export interface CandidateTransaction {
  readonly inputs: readonly Coin[];
  /** Payment outputs, in request order */
  readonly outputs: readonly ResolvedOutput[];
  readonly change?: ResolvedOutput;
  readonly payload: Uint8Array;
  readonly computeMass: bigint;
  readonly storageMass: bigint;
  readonly mass: bigint;
  /** Mass-derived fee paid to the network */
  readonly networkFee: Sompi;
  readonly priorityFee: Sompi;
  /** Inputs minus outputs: network and priority fee plus any folded dust */
  readonly fee: Sompi;
}

export interface BuildRequest {
  available: MaturitySet | readonly Coin[];
  priorityCoins?: readonly Coin[];
  /** Payment outputs; a sweep output (`amount: 'all'`) is passed as `sweep` */
  outputs: readonly ResolvedOutput[];
  /** Receives everything that remains after the fixed outputs and fees */
  sweep?: Omit<ResolvedOutput, 'amount'>;
  change: Omit<ResolvedOutput, 'amount'>;
  priorityFee?: Sompi;
  /**
   * Value that must stay in the change output for follow-on transactions.
   * A positive reserve forces a change output.
   */
  reserve?: Sompi;
  payload?: Uint8Array;
  feeRate: number;
  sigOpCount?: number;
  minimumSignatures?: number;
}

/**
 * `split` means the inputs alone push compute mass over the limit; merging
 * coins can help. Storage mass over the limit is thrown instead, since no
 * merge changes the outputs that cause it.
 */
export type BuildResult =
  | { kind: 'complete'; transaction: CandidateTransaction }
  | { kind: 'split'; ordered: readonly Coin[]; mass: bigint };

export interface CompoundRequest {
  ordered: readonly Coin[];
  change: Omit<ResolvedOutput, 'amount'>;
  feeRate: number;
  sigOpCount?: number;
  minimumSignatures?: number;
}

interface Evaluation {
  remainder: Sompi;
  hasChange: boolean;
  computeMass: bigint;
  storageMass: bigint;
  mass: bigint;
  requiredFee: Sompi;
}

/**
 * Assembles one transaction from a coin set, iterating selection and mass
 * until the fee used for selection covers the fee the final shape requires.
 */
export class TransactionBuilder {
  constructor(
    readonly calculator: MassCalculator,
    private readonly selector = new CoinSelector()
  ) {}

  /**
   * @throws InsufficientFundsError when the coins cannot cover outputs and fees
   * @throws MassExceedsLimitError when compute mass fits but storage mass does not
   */
  build(request: BuildRequest): BuildResult {
    return request.sweep ? this.buildSweep(request, request.sweep) : this.buildPayment(request);
  }

  /**
   * Merge the longest prefix of `ordered` (at least two coins) that fits the
   * mass limit into a single change output.
   *
   * @returns `undefined` when fewer than two coins fit or nothing would be left after the fee
   */
  compound(request: CompoundRequest): CandidateTransaction | undefined {
    const { ordered, change, feeRate } = request;
    const sigOpCount = request.sigOpCount ?? 1;
    const minimumSignatures = request.minimumSignatures ?? 1;

    for (let count = ordered.length; count >= 2; count--) {
      const inputs = ordered.slice(0, count);
      const shape: TransactionShape = {
        inputCount: count,
        outputScriptLengths: [change.scriptPublicKey.script.length],
        payloadLength: 0,
        sigOpCount,
        minimumSignatures,
      };
      const computeMass = this.calculator.computeMass(shape);
      if (this.calculator.exceedsLimit(computeMass)) continue;

      const total = sumBigInt(inputs.map((coin) => coin.amount));
      let fee = this.calculator.networkFee(computeMass, feeRate);

      for (let pass = 0; pass < MAX_FEE_PASSES; pass++) {
        if (total <= fee) return undefined;
        const storageMass = this.calculator.storageMass(
          inputs.map((coin) => coin.amount),
          [total - fee]
        );
        const mass = computeMass > storageMass ? computeMass : storageMass;
        if (this.calculator.exceedsLimit(mass)) break;

        const required = this.calculator.networkFee(mass, feeRate);
        if (required <= fee) {
          return this.finish({
            inputs,
            outputs: [],
            change: { ...change, amount: total - fee },
            payload: new Uint8Array(0),
            computeMass,
            storageMass,
            mass,
            networkFee: fee,
            priorityFee: 0n,
          });
        }
        fee = required;
      }
    }
    return undefined;
  }

  private buildPayment(request: BuildRequest): BuildResult {
    const priorityFee = request.priorityFee ?? 0n;
    const reserve = request.reserve ?? 0n;
    const payload = request.payload ?? new Uint8Array(0);
    const paymentTotal = sumBigInt(request.outputs.map((output) => output.amount));
    const ordered = this.selector.order(request.available, request.priorityCoins);

    let fee = this.initialFee(request, payload);
    let selection: Selection | undefined;
    let refunded = false;

    for (let pass = 0; pass < MAX_FEE_PASSES; pass++) {
      selection ??= CoinSelector.takeUntil(ordered, paymentTotal + reserve + priorityFee + fee);

      const evaluation = this.evaluate(request, selection, fee, paymentTotal + priorityFee, reserve > 0n, payload);
      if (this.calculator.exceedsLimit(evaluation.mass)) {
        if (this.calculator.exceedsLimit(evaluation.computeMass)) {
          return { kind: 'split', ordered, mass: evaluation.mass };
        }
        // A small change output carries the storage mass: try paying it to the fee
        const folded =
          evaluation.hasChange && reserve === 0n
            ? this.withoutChange(request, selection, paymentTotal, priorityFee, payload)
            : undefined;
        if (folded) {
          return { kind: 'complete', transaction: folded };
        }
        throw this.storageMassError(evaluation.mass);
      }

      const settled =
        evaluation.requiredFee === fee ||
        (evaluation.requiredFee < fee && (!evaluation.hasChange || refunded));

      if (settled) {
        const transaction = this.finish({
          inputs: selection.chosen,
          outputs: request.outputs,
          change: evaluation.hasChange ? { ...request.change, amount: evaluation.remainder } : undefined,
          payload,
          computeMass: evaluation.computeMass,
          storageMass: evaluation.storageMass,
          mass: evaluation.mass,
          // Without change any surplus over the required fee is folded into `fee`
          networkFee: evaluation.hasChange ? fee : evaluation.requiredFee,
          priorityFee,
        });
        return { kind: 'complete', transaction };
      }

      if (evaluation.requiredFee > fee) {
        // More fee than selected for: select again against the higher target
        fee = evaluation.requiredFee;
        selection = undefined;
      } else {
        // Overpaid with a change output: hand the difference back to change, same inputs
        fee = evaluation.requiredFee;
        refunded = true;
      }
    }

    throw new FeeConvergenceError(MAX_FEE_PASSES);
  }

  private buildSweep(request: BuildRequest, sweep: Omit<ResolvedOutput, 'amount'>): BuildResult {
    const priorityFee = request.priorityFee ?? 0n;
    const payload = request.payload ?? new Uint8Array(0);
    const fixedTotal = sumBigInt(request.outputs.map((output) => output.amount));
    const ordered = this.selector.order(request.available, request.priorityCoins);
    const total = sumBigInt(ordered.map((coin) => coin.amount));

    const shape = this.shape(request, ordered.length, [...request.outputs, sweep], payload);
    const computeMass = this.calculator.computeMass(shape);
    let fee = this.calculator.networkFee(computeMass, request.feeRate);

    for (let pass = 0; pass < MAX_FEE_PASSES; pass++) {
      const sweepAmount = total - fixedTotal - priorityFee - fee;
      if (ordered.length === 0 || sweepAmount <= 0n) {
        throw new InsufficientFundsError(fixedTotal + priorityFee + fee + 1n, total);
      }

      const storageMass = this.calculator.storageMass(
        ordered.map((coin) => coin.amount),
        [...request.outputs.map((output) => output.amount), sweepAmount]
      );
      const mass = computeMass > storageMass ? computeMass : storageMass;
      if (this.calculator.exceedsLimit(mass)) {
        if (this.calculator.exceedsLimit(computeMass)) {
          return { kind: 'split', ordered, mass };
        }
        throw this.storageMassError(mass);
      }

      const required = this.calculator.networkFee(mass, request.feeRate);
      if (required <= fee) {
        const transaction = this.finish({
          inputs: ordered,
          outputs: [...request.outputs, { ...sweep, amount: sweepAmount }],
          payload,
          computeMass,
          storageMass,
          mass,
          networkFee: fee,
          priorityFee,
        });
        return { kind: 'complete', transaction };
      }
      fee = required;
    }

    throw new FeeConvergenceError(MAX_FEE_PASSES);
  }

  /**
   * The selection with no change output, everything over the outputs going to the fee.
   *
   * @returns `undefined` when that shape is still over the limit or cannot pay its own fee
   */
  private withoutChange(
    request: BuildRequest,
    selection: Selection,
    paymentTotal: Sompi,
    priorityFee: Sompi,
    payload: Uint8Array
  ): CandidateTransaction | undefined {
    const computeMass = this.calculator.computeMass(
      this.shape(request, selection.chosen.length, request.outputs, payload)
    );
    const storageMass = this.calculator.storageMass(
      selection.chosen.map((coin) => coin.amount),
      request.outputs.map((output) => output.amount)
    );
    const mass = computeMass > storageMass ? computeMass : storageMass;
    if (this.calculator.exceedsLimit(mass)) return undefined;

    const networkFee = this.calculator.networkFee(mass, request.feeRate);
    if (selection.totalSelected - paymentTotal < networkFee + priorityFee) return undefined;

    return this.finish({
      inputs: selection.chosen,
      outputs: request.outputs,
      payload,
      computeMass,
      storageMass,
      mass,
      networkFee,
      priorityFee,
    });
  }

  private storageMassError(mass: bigint): MassExceedsLimitError {
    return new MassExceedsLimitError(
      mass,
      this.calculator.params.maximumStandardTransactionMass,
      'storage mass is over the limit, an output is too small for the value it moves'
    );
  }

  /**
   * Network fee of the one-input shape with a change output
   */
  private initialFee(request: BuildRequest, payload: Uint8Array): Sompi {
    const mass = this.calculator.computeMass(this.shape(request, 1, [...request.outputs, request.change], payload));
    return this.calculator.networkFee(mass, request.feeRate);
  }

  private evaluate(
    request: BuildRequest,
    selection: Selection,
    fee: Sompi,
    committed: Sompi,
    forceChange: boolean,
    payload: Uint8Array
  ): Evaluation {
    const remainder = selection.totalSelected - committed - fee;
    const changeScriptLength = request.change.scriptPublicKey.script.length;
    const hasChange =
      forceChange || (remainder > 0n && !this.calculator.isDust(remainder, changeScriptLength));

    const outputs = hasChange ? [...request.outputs, request.change] : request.outputs;
    const computeMass = this.calculator.computeMass(this.shape(request, selection.chosen.length, outputs, payload));
    const storageMass = this.calculator.storageMass(
      selection.chosen.map((coin) => coin.amount),
      [...request.outputs.map((output) => output.amount), ...(hasChange ? [remainder] : [])]
    );
    const mass = computeMass > storageMass ? computeMass : storageMass;

    return {
      remainder,
      hasChange,
      computeMass,
      storageMass,
      mass,
      requiredFee: this.calculator.networkFee(mass, request.feeRate),
    };
  }

  private shape(
    request: Pick<BuildRequest, 'sigOpCount' | 'minimumSignatures'>,
    inputCount: number,
    outputs: readonly Pick<ResolvedOutput, 'scriptPublicKey'>[],
    payload: Uint8Array
  ): TransactionShape {
    return {
      inputCount,
      outputScriptLengths: outputs.map((output) => output.scriptPublicKey.script.length),
      payloadLength: payload.length,
      sigOpCount: request.sigOpCount ?? 1,
      minimumSignatures: request.minimumSignatures ?? 1,
    };
  }

  /**
   * Freeze the candidate and check that it balances
   */
  private finish(parts: Omit<CandidateTransaction, 'fee'>): CandidateTransaction {
    const inputTotal = sumBigInt(parts.inputs.map((coin) => coin.amount));
    const outputTotal = sumBigInt(parts.outputs.map((output) => output.amount)) + (parts.change?.amount ?? 0n);
    const fee = inputTotal - outputTotal;

    if (fee < parts.networkFee + parts.priorityFee) {
      throw new ValueConservationError(inputTotal, outputTotal, parts.networkFee + parts.priorityFee);
    }

    return Object.freeze({
      ...parts,
      inputs: Object.freeze([...parts.inputs]),
      outputs: Object.freeze([...parts.outputs]),
      fee,
    });
  }
}
