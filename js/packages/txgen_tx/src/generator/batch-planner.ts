import type { MassCalculator, ScriptPublicKey, Sompi } from '@txgen/consensus';
import { MassExceedsLimitError } from '../errors';
import type { ResolvedOutput } from '../types/types';

/**
 * An output waiting to be placed: a fixed payment or the trailing sweep
 */
export type PlannedOutput =
  | { kind: 'payment'; output: ResolvedOutput }
  | { kind: 'sweep'; output: Omit<ResolvedOutput, 'amount'> };

export interface PlanContext {
  calculator: MassCalculator;
  changeScript: ScriptPublicKey;
  payloadLength: number;
  sigOpCount: number;
  minimumSignatures: number;
  feeRate: number;
}

/**
 * Compute mass of a one-input transaction carrying `outputs` plus a change output
 */
export function singleInputMass(outputs: readonly PlannedOutput[], withPayload: boolean, context: PlanContext): bigint {
  return context.calculator.computeMass({
    inputCount: 1,
    outputScriptLengths: [
      ...outputs.map((planned) => planned.output.scriptPublicKey.script.length),
      context.changeScript.script.length,
    ],
    payloadLength: withPayload ? context.payloadLength : 0,
    sigOpCount: context.sigOpCount,
    minimumSignatures: context.minimumSignatures,
  });
}

/**
 * Mass a batch is planned against: the one-input compute mass, or the output
 * side of its storage mass when that is larger. The sweep amount is unknown
 * until the batch is built and does not count.
 */
export function batchMass(outputs: readonly PlannedOutput[], withPayload: boolean, context: PlanContext): bigint {
  const computeMass = singleInputMass(outputs, withPayload, context);
  const storageMass = context.calculator.outputStorageMass(
    outputs.flatMap((planned) => (planned.kind === 'payment' ? [planned.output.amount] : []))
  );
  return computeMass > storageMass ? computeMass : storageMass;
}

export function estimateBatchFee(outputs: readonly PlannedOutput[], withPayload: boolean, context: PlanContext): Sompi {
  return context.calculator.networkFee(batchMass(outputs, withPayload, context), context.feeRate);
}

/**
 * Split `outputs` into consecutive batches, each the largest run whose
 * `batchMass` fits the limit. Only the last batch carries the payload.
 *
 * @returns Batch sizes, in order
 * @throws MassExceedsLimitError if a single output (or the payload) cannot fit
 */
export function planBatches(outputs: readonly PlannedOutput[], context: PlanContext): number[] {
  const { calculator } = context;
  const fits = (start: number, end: number, withPayload: boolean): boolean =>
    !calculator.exceedsLimit(batchMass(outputs.slice(start, end), withPayload, context));

  const sizes: number[] = [];
  let start = 0;
  while (start < outputs.length) {
    let size = 0;
    while (start + size < outputs.length && fits(start, start + size + 1, false)) {
      size++;
    }
    if (size === 0) {
      throw new MassExceedsLimitError(
        batchMass(outputs.slice(start, start + 1), false, context),
        calculator.params.maximumStandardTransactionMass,
        'a single output does not fit in a transaction'
      );
    }
    sizes.push(size);
    start += size;
  }

  const last = sizes.pop();
  if (last === undefined) return sizes;

  // Shrink the last batch from the front until the payload fits beside it
  let tail = last;
  while (tail > 0 && !fits(outputs.length - tail, outputs.length, true)) {
    tail--;
  }
  if (tail === 0) {
    throw new MassExceedsLimitError(
      batchMass(outputs.slice(outputs.length - 1), true, context),
      calculator.params.maximumStandardTransactionMass,
      'the payload does not fit in a transaction'
    );
  }
  if (tail < last) {
    sizes.push(last - tail);
  }
  sizes.push(tail);
  return sizes;
}
