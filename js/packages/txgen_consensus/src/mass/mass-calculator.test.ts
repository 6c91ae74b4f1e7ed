import { U64_MAX } from '@txgen/utils';
import { getConsensusParams, withConsensusOverrides } from '../network/params';
import { createTransaction, withSignatureScripts } from '../transaction/transaction';
import { createCoin } from '../types/types';
import {
  MassCalculator,
  calculateTransactionFee,
  calculateTransactionMass,
  maximumStandardTransactionMass,
  scaleFeeRate,
  type TransactionShape,
} from './mass-calculator';

const P2PK_LENGTH = 34;
const p2pk = (fill: number) => ({ version: 0, script: Uint8Array.from([0x20, ...new Array<number>(32).fill(fill), 0xac]) });

function shape(partial: Partial<TransactionShape>): TransactionShape {
  return {
    inputCount: 1,
    outputScriptLengths: [P2PK_LENGTH],
    payloadLength: 0,
    sigOpCount: 1,
    minimumSignatures: 1,
    ...partial,
  };
}

describe('MassCalculator', () => {
  const calculator = MassCalculator.forNetwork('mainnet');

  describe('compute mass', () => {
    test('one P2PK input and one P2PK output', () => {
      // 94 blank + 1118 per input + 412 per output
      expect(calculator.computeMass(shape({}))).toBe(1624n);
    });

    test('two inputs and two outputs', () => {
      expect(
        calculator.computeMass(shape({ inputCount: 2, outputScriptLengths: [P2PK_LENGTH, P2PK_LENGTH] }))
      ).toBe(3154n);
    });

    test('payload bytes and extra signatures add mass', () => {
      expect(calculator.computeMass(shape({ payloadLength: 10 }))).toBe(1634n);
      expect(calculator.computeMass(shape({ minimumSignatures: 2 }))).toBe(1690n);
      expect(calculator.computeMass(shape({ sigOpCount: 2 }))).toBe(2624n);
    });

    test('adding an input or an output never lowers the mass', () => {
      let previous = calculator.computeMass(shape({ inputCount: 0, outputScriptLengths: [] }));
      for (let inputs = 1; inputs <= 5; inputs++) {
        for (let outputs = 0; outputs <= 5; outputs++) {
          const mass = calculator.computeMass(
            shape({ inputCount: inputs, outputScriptLengths: new Array<number>(outputs).fill(P2PK_LENGTH) })
          );
          const fewerOutputs = calculator.computeMass(
            shape({
              inputCount: inputs,
              outputScriptLengths: new Array<number>(Math.max(outputs - 1, 0)).fill(P2PK_LENGTH),
            })
          );
          expect(mass).toBeGreaterThanOrEqual(fewerOutputs);
          if (outputs === 0) {
            expect(mass).toBeGreaterThan(previous);
            previous = mass;
          }
        }
      }
    });
  });

  describe('storage mass', () => {
    test('is zero when value is not fragmented', () => {
      expect(calculator.storageMass([100_000_000n], [100_000_000n])).toBe(0n);
    });

    test('charges for splitting one input into small outputs', () => {
      expect(calculator.storageMass([100_000_000n], [50_000_000n, 50_000_000n])).toBe(30_000n);
    });

    test('uses the arithmetic mean of inputs for larger transactions', () => {
      expect(
        calculator.storageMass([200_000_000n, 200_000_000n, 200_000_000n], [10_000_000n, 10_000_000n, 10_000_000n])
      ).toBe(285_000n);
      expect(
        calculator.storageMass([100_000_000n, 100_000_000n, 100_000_000n], [100_000_000n, 100_000_000n])
      ).toBe(0n);
    });

    test('rounds output terms up and input terms down', () => {
      const small = new MassCalculator(
        withConsensusOverrides(getConsensusParams('mainnet'), { storageMassParameter: 10n })
      );

      // ceil(10 / 3) - floor(10 / 3)
      expect(small.storageMass([3n], [3n])).toBe(1n);
    });

    test('a zero output is unbounded', () => {
      expect(calculator.storageMass([100n], [0n])).toBe(U64_MAX);
      expect(calculator.exceedsLimit(U64_MAX)).toBe(true);
    });

    test('the output side alone', () => {
      // 10^12/5·10^7 twice
      expect(calculator.outputStorageMass([50_000_000n, 50_000_000n])).toBe(40_000n);
      expect(calculator.outputStorageMass([100n, 0n])).toBe(U64_MAX);
      expect(calculator.outputStorageMass([])).toBe(0n);
    });

    test('total mass is the larger of the two', () => {
      expect(
        calculator.totalMass(shape({ outputScriptLengths: [P2PK_LENGTH, P2PK_LENGTH] }), [100_000_000n], [
          50_000_000n,
          50_000_000n,
        ])
      ).toBe(30_000n);
      expect(calculator.totalMass(shape({}), [100_000_000n], [100_000_000n])).toBe(1624n);
    });
  });

  describe('fees', () => {
    test('fee for mass rounds up', () => {
      expect(calculator.feeForMass(1624n, 1)).toBe(1624n);
      expect(calculator.feeForMass(1624n, 0.5)).toBe(812n);
      expect(calculator.feeForMass(3154n, 0.0001)).toBe(1n);
      expect(calculator.feeForMass(0n, 0.0001)).toBe(0n);
    });

    test('fee rate is scaled to micro-sompi', () => {
      expect(scaleFeeRate(1)).toBe(1_000_000n);
      expect(scaleFeeRate(0.0001)).toBe(100n);
      expect(() => scaleFeeRate(-1)).toThrow(RangeError);
      expect(() => scaleFeeRate(Number.NaN)).toThrow(RangeError);
    });

    test('minimum relay fee is never zero', () => {
      expect(calculator.minimumRelayFee(1624n)).toBe(1624n);
      expect(calculator.minimumRelayFee(0n)).toBe(1_000n);
    });

    test('network fee is the larger of rate fee and relay minimum', () => {
      expect(calculator.networkFee(1624n, 0.5)).toBe(1624n);
      expect(calculator.networkFee(1624n, 2)).toBe(3248n);
    });

    test('dust threshold for a P2PK output is 600 sompi', () => {
      expect(calculator.isDust(599n, P2PK_LENGTH)).toBe(true);
      expect(calculator.isDust(600n, P2PK_LENGTH)).toBe(false);
    });

    test('mass limit', () => {
      expect(calculator.exceedsLimit(100_000n)).toBe(false);
      expect(calculator.exceedsLimit(100_001n)).toBe(true);
      expect(maximumStandardTransactionMass('testnet-11')).toBe(100_000n);
    });
  });

  describe('concrete transactions', () => {
    const coin = createCoin({
      outpoint: { transactionId: 'ab'.repeat(32), index: 0 },
      amount: 100_000_000n,
      scriptPublicKey: p2pk(1),
      blockDaaScore: 10n,
      isCoinbase: false,
    });
    const tx = createTransaction({
      inputs: [
        { previousOutpoint: coin.outpoint, signatureScript: new Uint8Array(0), sequence: 0n, sigOpCount: 1, utxo: coin },
      ],
      outputs: [{ value: 99_998_376n, scriptPublicKey: p2pk(2) }],
    });

    test('matches the shape-based figure before and after signing', () => {
      expect(calculateTransactionMass('mainnet', tx)).toBe(1624n);

      const signed = withSignatureScripts(tx, [new Uint8Array(66).fill(7)]);
      expect(calculator.transactionMass(signed)).toBe(1624n);
    });

    test('fee at the default rate', () => {
      expect(calculateTransactionFee('mainnet', tx)).toBe(1624n);
      expect(calculateTransactionFee('mainnet', tx, 3)).toBe(4872n);
    });
  });
});
