/**
 * Transaction generator
 *
 * Turns one payment request into an ordered chain of transactions: output
 * batches that fit the mass ceiling, linked by their change outputs, with
 * compounding transactions inserted when too many small coins are needed.
 */

import { coinKey, createCoin, MassCalculator, type Coin, type Sompi } from '@txgen/consensus';
import { createLogger, sumBigInt, U64_MAX } from '@txgen/utils';
import { v4 as uuidv4 } from 'uuid';
import { TransactionBuilder, type CandidateTransaction } from '../builder/transaction-builder';
import { MassExceedsLimitError } from '../errors';
import { PendingTransaction, type PendingTransactionKind } from '../pending/pending-transaction';
import type { GeneratorSummary } from '../types/types';
import { estimateBatchFee, planBatches, type PlanContext, type PlannedOutput } from './batch-planner';
import { resolveSettings, type GeneratorOptions, type GeneratorSettings, type ResolvedSettings } from './settings';

const generatorLogger = createLogger('txgen:tx:generator');

/**
 * Returned by `next()` once the final transaction has been produced
 */
export const END: unique symbol = Symbol('txgen.generator.end');
export type End = typeof END;

export type GeneratorState = 'idle' | 'producing' | 'exhausted' | 'failed';

/**
 * One pass over a resolved request. Holds the coins still unspent, the
 * outputs still unpaid and the chained change output.
 */
class GeneratorRun {
  readonly runId = uuidv4();
  private readonly builder: TransactionBuilder;
  private readonly context: PlanContext;
  private available: Coin[];
  private priority: Coin[];
  private carry: Coin | undefined;
  private remaining: PlannedOutput[];
  private readonly virtualKeys = new Set<string>();
  private readonly totals: GeneratorSummary;
  private done = false;

  constructor(private readonly settings: ResolvedSettings) {
    const calculator = new MassCalculator(settings.params);
    this.builder = new TransactionBuilder(calculator);
    this.context = {
      calculator,
      changeScript: settings.change.scriptPublicKey,
      payloadLength: settings.payload.length,
      sigOpCount: settings.sigOpCount,
      minimumSignatures: settings.minimumSignatures,
      feeRate: settings.feeRate,
    };
    this.available = [...settings.entries];
    this.priority = [...settings.priorityEntries];
    this.remaining = [
      ...settings.outputs.map((output): PlannedOutput => ({ kind: 'payment', output })),
      ...(settings.sweep ? [{ kind: 'sweep', output: settings.sweep } satisfies PlannedOutput] : []),
    ];
    this.totals = {
      networkId: settings.networkId,
      transactionsProduced: 0,
      totalFees: 0n,
      totalMass: 0n,
      totalInputsConsumed: 0,
    };
  }

  get summary(): GeneratorSummary {
    return { ...this.totals };
  }

  get isDone(): boolean {
    return this.done;
  }

  step(): PendingTransaction | End {
    if (this.done) return END;

    const plan = planBatches(this.remaining, this.context);
    const batchSize = plan[0] ?? this.remaining.length;
    const batch = this.remaining.slice(0, batchSize);
    const rest = this.remaining.slice(batchSize);
    const isFinal = rest.length === 0;

    const payments = batch.flatMap((planned) => (planned.kind === 'payment' ? [planned.output] : []));
    const sweep = batch.find((planned) => planned.kind === 'sweep')?.output;
    const priorityCoins = this.carry ? [this.carry, ...this.priority] : this.priority;

    const result = this.builder.build({
      available: this.available,
      priorityCoins,
      outputs: payments,
      ...(sweep ? { sweep } : {}),
      change: this.settings.change,
      priorityFee: isFinal ? this.settings.priorityFee : 0n,
      reserve: isFinal ? 0n : this.reserveFor(rest, plan.slice(1)),
      payload: isFinal ? this.settings.payload : new Uint8Array(0),
      feeRate: this.settings.feeRate,
      sigOpCount: this.settings.sigOpCount,
      minimumSignatures: this.settings.minimumSignatures,
    });

    if (result.kind === 'complete') {
      const pending = this.emit(result.transaction, 'payment', isFinal);
      this.remaining = rest;
      if (isFinal) {
        this.done = true;
        this.totals.finalAmount = pending.paymentAmount;
        this.totals.finalTransactionId = pending.id;
      } else {
        this.chain(pending, result.transaction.outputs.length);
      }
      return pending;
    }

    const compound = result.ordered.length >= 2
      ? this.builder.compound({
          ordered: result.ordered,
          change: this.settings.change,
          feeRate: this.settings.feeRate,
          sigOpCount: this.settings.sigOpCount,
          minimumSignatures: this.settings.minimumSignatures,
        })
      : undefined;
    if (!compound) {
      throw new MassExceedsLimitError(
        result.mass,
        this.settings.params.maximumStandardTransactionMass,
        'inputs cannot be merged into a transaction under the limit'
      );
    }

    const pending = this.emit(compound, 'compound', false);
    this.chain(pending, 0);
    return pending;
  }

  /**
   * Value the change output must keep for the outputs and fees of later batches
   */
  private reserveFor(rest: readonly PlannedOutput[], laterSizes: readonly number[]): Sompi {
    const laterPayments = sumBigInt(rest.flatMap((planned) => (planned.kind === 'payment' ? [planned.output.amount] : [])));

    let laterFees = 0n;
    let offset = 0;
    laterSizes.forEach((size, index) => {
      const withPayload = index === laterSizes.length - 1;
      laterFees += estimateBatchFee(rest.slice(offset, offset + size), withPayload, this.context);
      offset += size;
    });

    const reserve = laterPayments + this.settings.priorityFee + laterFees;
    return reserve > 0n ? reserve : 1n;
  }

  private emit(candidate: CandidateTransaction, kind: PendingTransactionKind, isFinal: boolean): PendingTransaction {
    const pending = new PendingTransaction(candidate, { kind, isFinal, sigOpCount: this.settings.sigOpCount });

    const spent = new Set(candidate.inputs.map(coinKey));
    this.available = this.available.filter((coin) => !spent.has(coinKey(coin)));
    this.priority = this.priority.filter((coin) => !spent.has(coinKey(coin)));
    if (this.carry && spent.has(coinKey(this.carry))) {
      this.carry = undefined;
    }

    this.totals.transactionsProduced++;
    this.totals.totalFees += candidate.fee;
    this.totals.totalMass += candidate.mass;
    this.totals.totalInputsConsumed += [...spent].filter((key) => !this.virtualKeys.has(key)).length;

    generatorLogger.debug('Produced transaction', {
      runId: this.runId,
      transactionId: pending.id,
      kind,
      isFinal,
      inputs: candidate.inputs.length,
      outputs: pending.transaction.outputs.length,
      mass: candidate.mass.toString(),
      fee: candidate.fee.toString(),
    });

    return pending;
  }

  /**
   * Make the change output at `index` the first input of the next transaction
   */
  private chain(pending: PendingTransaction, index: number): void {
    const output = pending.transaction.outputs[index];
    if (!output) {
      throw new RangeError(`Transaction ${pending.id} has no output ${index} to chain`);
    }
    const carry = createCoin({
      address: this.settings.change.address,
      outpoint: { transactionId: pending.id, index },
      amount: output.value,
      scriptPublicKey: output.scriptPublicKey,
      blockDaaScore: U64_MAX,
      isCoinbase: false,
    });
    this.virtualKeys.add(coinKey(carry));
    this.carry = carry;
  }
}

/**
 * Produces the transactions of one request, one per `next()` call.
 *
 * The coin set is pinned at construction. The run is pull-based: nothing is
 * built until asked for, and abandoning a generator has no side effects.
 *
 * @example
 * ```typescript
 * const generator = new Generator(
 *   { entries: tracker.snapshot(address), outputs: [{ address: to, amount: 150_000_000n }], changeAddress: address },
 *   { scripts }
 * );
 *
 * for (const pending of generator) {
 *   await pending.sign(signer);
 *   await pending.submit(submitter);
 * }
 * console.log(generator.summary());
 * ```
 */
export class Generator {
  private readonly settings: ResolvedSettings;
  private readonly run: GeneratorRun;
  private status: GeneratorState = 'idle';
  private failure: { error: unknown } | undefined;

  /**
   * @throws InvalidSettingsError when `settings` fails validation
   */
  constructor(settings: GeneratorSettings, options: GeneratorOptions) {
    this.settings = resolveSettings(settings, options);
    this.run = new GeneratorRun(this.settings);
    generatorLogger.debug('Generator created', {
      runId: this.run.runId,
      networkId: this.settings.networkId,
      entries: this.settings.entries.length,
      outputs: this.settings.outputs.length,
      sweep: this.settings.sweep !== undefined,
    });
  }

  get state(): GeneratorState {
    return this.status;
  }

  get runId(): string {
    return this.run.runId;
  }

  /**
   * Produce the next transaction, or `END` after the final one.
   * A failure is sticky: every later call throws the same error.
   */
  next(): PendingTransaction | End {
    if (this.failure) throw this.failure.error;
    if (this.status === 'exhausted') return END;

    try {
      const result = this.run.step();
      this.status = this.run.isDone ? 'exhausted' : 'producing';
      return result;
    } catch (error) {
      this.status = 'failed';
      this.failure = { error };
      generatorLogger.error(
        'Transaction generation failed',
        error instanceof Error ? error : { error: String(error) },
        { runId: this.run.runId }
      );
      throw error;
    }
  }

  /**
   * Totals of the transactions produced so far
   */
  summary(): GeneratorSummary {
    return this.run.summary;
  }

  /**
   * Totals of the full run, computed on a fresh copy of the request.
   * Does not advance this generator.
   */
  estimate(): GeneratorSummary {
    const run = new GeneratorRun(this.settings);
    while (run.step() !== END) {
      // drain
    }
    generatorLogger.debug('Estimated run', { runId: run.runId, transactions: run.summary.transactionsProduced });
    return run.summary;
  }

  *[Symbol.iterator](): IterableIterator<PendingTransaction> {
    for (;;) {
      const pending = this.next();
      if (pending === END) return;
      yield pending;
    }
  }
}

/**
 * Summary of the transactions a request would produce
 */
export function estimateTransactions(settings: GeneratorSettings, options: GeneratorOptions): GeneratorSummary {
  return new Generator(settings, options).estimate();
}

/**
 * Produce every transaction of a request at once
 */
export function createTransactions(
  settings: GeneratorSettings,
  options: GeneratorOptions
): { transactions: PendingTransaction[]; summary: GeneratorSummary } {
  const generator = new Generator(settings, options);
  const transactions = [...generator];
  return { transactions, summary: generator.summary() };
}
