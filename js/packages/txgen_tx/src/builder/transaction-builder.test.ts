import {
  createCoin,
  getConsensusParams,
  MassCalculator,
  withConsensusOverrides,
  type Coin,
} from '@txgen/consensus';
import { InsufficientFundsError, MassExceedsLimitError } from '../errors';
import type { ResolvedOutput } from '../types/types';
import { TransactionBuilder, type BuildResult, type CandidateTransaction } from './transaction-builder';

const p2pk = (fill: number) => ({ version: 0, script: Uint8Array.from([0x20, ...new Array<number>(32).fill(fill), 0xac]) });

const CHANGE = { address: 'kaspa:change', scriptPublicKey: p2pk(1) };

function pay(amount: bigint): ResolvedOutput {
  return { address: 'kaspa:payee', amount, scriptPublicKey: p2pk(2) };
}

function coin(n: number, amount: bigint): Coin {
  return createCoin({
    address: 'kaspa:owner',
    outpoint: { transactionId: n.toString(16).padStart(64, '0'), index: 0 },
    amount,
    scriptPublicKey: p2pk(3),
    blockDaaScore: 0n,
    isCoinbase: false,
  });
}

function complete(result: BuildResult): CandidateTransaction {
  if (result.kind !== 'complete') {
    throw new Error(`expected a complete transaction, got a split at mass ${result.mass}`);
  }
  return result.transaction;
}

function conserved(tx: CandidateTransaction): bigint {
  const inputs = tx.inputs.reduce((sum, c) => sum + c.amount, 0n);
  const outputs = tx.outputs.reduce((sum, o) => sum + o.amount, 0n) + (tx.change?.amount ?? 0n);
  return inputs - outputs - tx.fee;
}

describe('TransactionBuilder', () => {
  const mainnet = getConsensusParams('mainnet');
  // Storage mass off so only compute mass drives the fee
  const computeOnly = new TransactionBuilder(new MassCalculator(withConsensusOverrides(mainnet, { storageMassParameter: 0n })));

  test('pays from the smallest sufficient prefix and returns change', () => {
    const noRelayFloor = new TransactionBuilder(
      new MassCalculator(
        withConsensusOverrides(mainnet, { storageMassParameter: 0n, minimumRelayTransactionFee: 0n })
      )
    );

    const tx = complete(
      noRelayFloor.build({
        available: [coin(1, 5n), coin(2, 3n), coin(3, 2n)],
        outputs: [pay(6n)],
        change: CHANGE,
        feeRate: 0.0001,
      })
    );

    expect(tx.inputs.map((c) => c.amount)).toEqual([5n, 3n]);
    expect(tx.change?.amount).toBe(1n);
    expect(tx.fee).toBe(1n);
    expect(tx.mass).toBe(3154n);
    expect(conserved(tx)).toBe(0n);
  });

  test('one input, one payment and change', () => {
    const tx = complete(
      computeOnly.build({ available: [coin(1, 100_000_000n)], outputs: [pay(50_000_000n)], change: CHANGE, feeRate: 1 })
    );

    // 94 + 1118 + 2 × 412
    expect(tx.computeMass).toBe(2036n);
    expect(tx.networkFee).toBe(2036n);
    expect(tx.fee).toBe(2036n);
    expect(tx.change).toEqual({ ...CHANGE, amount: 49_997_964n });
  });

  test('dust change is folded into the fee', () => {
    const tx = complete(
      computeOnly.build({ available: [coin(1, 10_000n)], outputs: [pay(7_500n)], change: CHANGE, feeRate: 1 })
    );

    expect(tx.change).toBeUndefined();
    expect(tx.mass).toBe(1624n);
    expect(tx.networkFee).toBe(1624n);
    expect(tx.fee).toBe(2_500n);
    expect(conserved(tx)).toBe(0n);
  });

  test('change just above the dust threshold is kept', () => {
    const tx = complete(
      computeOnly.build({ available: [coin(1, 10_000n)], outputs: [pay(6_000n)], change: CHANGE, feeRate: 1 })
    );

    expect(tx.change?.amount).toBe(1_964n);
    expect(tx.fee).toBe(2_036n);
  });

  test('a reserve forces a change output even for dust', () => {
    const tx = complete(
      computeOnly.build({
        available: [coin(1, 100_000_000n)],
        outputs: [pay(99_997_500n)],
        change: CHANGE,
        reserve: 1n,
        feeRate: 1,
      })
    );

    expect(tx.change?.amount).toBe(464n);
    expect(tx.fee).toBe(2_036n);
  });

  test('the priority fee is paid on top of the network fee', () => {
    const tx = complete(
      computeOnly.build({
        available: [coin(1, 100_000_000n)],
        outputs: [pay(50_000_000n)],
        change: CHANGE,
        priorityFee: 2_000n,
        feeRate: 1,
      })
    );

    expect(tx.networkFee).toBe(2_036n);
    expect(tx.priorityFee).toBe(2_000n);
    expect(tx.fee).toBe(4_036n);
    expect(tx.change?.amount).toBe(49_995_964n);
  });

  test('the payload adds its length to the mass', () => {
    const tx = complete(
      computeOnly.build({
        available: [coin(1, 100_000_000n)],
        outputs: [pay(50_000_000n)],
        change: CHANGE,
        payload: new Uint8Array(100),
        feeRate: 1,
      })
    );

    expect(tx.mass).toBe(2_136n);
    expect(tx.payload).toHaveLength(100);
  });

  test('priority coins are spent first', () => {
    const small = coin(2, 1_000_000n);
    const tx = complete(
      computeOnly.build({
        available: [coin(1, 100_000_000n), small],
        priorityCoins: [small],
        outputs: [pay(500_000n)],
        change: CHANGE,
        feeRate: 1,
      })
    );

    expect(tx.inputs).toEqual([small]);
    expect(tx.change?.amount).toBe(497_964n);
  });

  test('storage mass raises the fee and the selection is redone', () => {
    const builder = new TransactionBuilder(new MassCalculator(mainnet));
    const tx = complete(
      builder.build({ available: [coin(1, 1_000_000_000n)], outputs: [pay(100_000_000n)], change: CHANGE, feeRate: 1 })
    );

    // 10^12/10^8 + ⌈10^12/899,989,888⌉ − 10^12/10^9
    expect(tx.storageMass).toBe(10_112n);
    expect(tx.computeMass).toBe(2_036n);
    expect(tx.mass).toBe(10_112n);
    expect(tx.fee).toBe(10_112n);
    expect(tx.change?.amount).toBe(899_989_888n);
  });

  test('insufficient funds when the coins cannot cover outputs and fee', () => {
    expect(() =>
      computeOnly.build({ available: [coin(1, 1_000n)], outputs: [pay(5_000n)], change: CHANGE, feeRate: 1 })
    ).toThrow(InsufficientFundsError);
  });

  describe('sweep', () => {
    test('spends every coin into the sweep output without change', () => {
      const tx = complete(
        computeOnly.build({
          available: [coin(1, 1_000_000n), coin(2, 2_000_000n)],
          outputs: [],
          sweep: CHANGE,
          change: CHANGE,
          feeRate: 1,
        })
      );

      expect(tx.inputs.map((c) => c.amount)).toEqual([2_000_000n, 1_000_000n]);
      expect(tx.change).toBeUndefined();
      expect(tx.outputs).toEqual([{ ...CHANGE, amount: 2_997_258n }]);
      expect(tx.fee).toBe(2_742n);
    });

    test('fixed outputs come before the sweep output', () => {
      const tx = complete(
        computeOnly.build({
          available: [coin(1, 1_000_000n), coin(2, 2_000_000n)],
          outputs: [pay(1_000_000n)],
          sweep: CHANGE,
          change: CHANGE,
          feeRate: 1,
        })
      );

      expect(tx.outputs.map((o) => o.amount)).toEqual([1_000_000n, 1_996_846n]);
      expect(tx.fee).toBe(3_154n);
    });

    test('nothing left to sweep is insufficient funds', () => {
      expect(() =>
        computeOnly.build({ available: [coin(1, 1_000n)], outputs: [], sweep: CHANGE, change: CHANGE, feeRate: 1 })
      ).toThrow(InsufficientFundsError);
    });
  });

  describe('storage mass over the limit', () => {
    const builder = new TransactionBuilder(new MassCalculator(mainnet));

    test('a small change output is folded into the fee', () => {
      const tx = complete(
        builder.build({
          available: [coin(1, 100_000_000n), coin(2, 50_000_000n)],
          outputs: [pay(149_940_000n)],
          change: CHANGE,
          feeRate: 1,
        })
      );

      expect(tx.inputs).toHaveLength(2);
      expect(tx.change).toBeUndefined();
      // 94 + 2 × 1118 + 412; storage ⌈10^12/149,940,000⌉ is under 10^12/10^8 + 10^12/(5·10^7)
      expect(tx.computeMass).toBe(2_742n);
      expect(tx.storageMass).toBe(0n);
      expect(tx.networkFee).toBe(2_742n);
      expect(tx.fee).toBe(60_000n);
      expect(conserved(tx)).toBe(0n);
    });

    test('a forced change output cannot be folded', () => {
      let caught: unknown;
      try {
        builder.build({
          available: [coin(1, 100_000_000n)],
          outputs: [pay(99_990_000n)],
          change: CHANGE,
          reserve: 1n,
          feeRate: 1,
        });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(MassExceedsLimitError);
      // change of 7,964 sompi alone is ⌈10^12/7,964⌉
      expect(caught).toMatchObject({ mass: 125_565_045n, limit: 100_000n });
    });

    test('a sweep beside a small fixed output throws rather than splitting', () => {
      let caught: unknown;
      try {
        builder.build({
          available: [coin(1, 100_000_000n)],
          outputs: [pay(1_000_000n)],
          sweep: CHANGE,
          change: CHANGE,
          feeRate: 1,
        });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(MassExceedsLimitError);
      // 10^6 + ⌈10^12/98,997,964⌉ − 10^4
      expect(caught).toMatchObject({ mass: 1_000_102n, limit: 100_000n });
    });
  });

  describe('mass limit', () => {
    const small = new TransactionBuilder(
      new MassCalculator(withConsensusOverrides(mainnet, { maximumStandardTransactionMass: 10_000n, storageMassParameter: 0n }))
    );
    const coins = Array.from({ length: 12 }, (_, i) => coin(i + 1, 100_000_000n));

    test('too many inputs yields a split with the candidate order', () => {
      const result = small.build({ available: coins, outputs: [pay(1_000_000_000n)], change: CHANGE, feeRate: 1 });

      expect(result.kind).toBe('split');
      if (result.kind === 'split') {
        expect(result.ordered).toHaveLength(12);
        expect(result.mass).toBe(13_216n);
      }
    });

    test('compound merges the longest prefix that fits', () => {
      const tx = small.compound({ ordered: coins, change: CHANGE, feeRate: 1 });

      expect(tx?.inputs).toHaveLength(8);
      expect(tx?.outputs).toEqual([]);
      expect(tx?.fee).toBe(9_450n);
      expect(tx?.change?.amount).toBe(799_990_550n);
    });

    test('compound gives up below two inputs', () => {
      expect(small.compound({ ordered: coins.slice(0, 1), change: CHANGE, feeRate: 1 })).toBeUndefined();
    });
  });
});
