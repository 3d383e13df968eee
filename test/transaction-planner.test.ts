import { describe, expect, it } from 'vitest';
import {
    BitcoinChain,
    ConstantFeeCalculator,
    LinearFeeCalculator,
    SigningError,
    TransactionPlanner,
    ZcashChain,
} from '../src/index.js';
import { createSigningInput, createUtxo, PRIVATE_KEY_A, p2pkhScript } from './utils/fixtures.js';

const ownScript = p2pkhScript(PRIVATE_KEY_A);

describe('FeeCalculator', () => {
    it('should scale the linear estimate with the byte fee', () => {
        const calculator = new LinearFeeCalculator(10, 148, 34);

        expect(calculator.calculate(1, 2, 1n)).toBe(226n);
        expect(calculator.calculate(2, 2, 3n, 15)).toBe(1167n);
        expect(calculator.calculateSingleInput(2n)).toBe(296n);
    });

    it('should charge the constant fee whatever the size', () => {
        const calculator = new ConstantFeeCalculator(10_000n);

        expect(calculator.calculate(5, 5, 100n)).toBe(10_000n);
        expect(calculator.calculateSingleInput(100n)).toBe(0n);
    });
});

describe('TransactionPlanner', () => {
    const planner = new TransactionPlanner(BitcoinChain);

    it('should plan a payment with change', () => {
        const input = createSigningInput();
        const plan = planner.plan(input);

        expect(plan.error).toBeUndefined();
        expect(plan.amount).toBe(10_000n);
        expect(plan.availableAmount).toBe(100_000n);
        expect(plan.fee).toBe(226n);
        expect(plan.change).toBe(89_774n);
        expect(plan.utxos).toEqual(input.utxos);
        expect(plan.branchId.byteLength).toBe(0);
    });

    it('should select the largest UTXOs first and keep the input order', () => {
        const small = createUtxo(1, 0, 5_000n, ownScript);
        const large = createUtxo(2, 0, 40_000n, ownScript);
        const medium = createUtxo(3, 0, 20_000n, ownScript);

        const plan = planner.plan(createSigningInput({ amount: 50_000n, utxos: [small, large, medium] }));

        // 40000 + 20000 covers 50000 + 374
        expect(plan.utxos).toEqual([large, medium]);
        expect(plan.fee).toBe(374n);
        expect(plan.change).toBe(9_626n);
    });

    it('should add every UTXO when needed', () => {
        const utxos = [
            createUtxo(1, 0, 30_000n, ownScript),
            createUtxo(2, 0, 20_000n, ownScript),
            createUtxo(3, 0, 10_000n, ownScript),
        ];

        const plan = planner.plan(createSigningInput({ amount: 50_000n, utxos }));

        expect(plan.utxos).toEqual(utxos);
        expect(plan.fee).toBe(522n);
        expect(plan.change).toBe(9_478n);
    });

    it('should fold dust change into the fee', () => {
        const plan = planner.plan(
            createSigningInput({ utxos: [createUtxo(1, 0, 10_300n, ownScript)] }),
        );

        expect(plan.change).toBe(0n);
        expect(plan.fee).toBe(300n);
    });

    it('should account for the OP_RETURN output', () => {
        const plan = planner.plan(createSigningInput({ outputOpReturn: Buffer.from('memo') }));

        expect(TransactionPlanner.opReturnOutputSize(Buffer.from('memo'))).toBe(15);
        expect(plan.fee).toBe(241n);
        expect(plan.outputOpReturn.toString()).toBe('memo');
    });

    it('should reserve value for extra outputs', () => {
        const plan = planner.plan(
            createSigningInput({ extraOutputs: [{ value: 1_000n, script: ownScript }] }),
        );

        // 10 + 148 + 3 * 34
        expect(plan.fee).toBe(260n);
        expect(plan.change).toBe(100_000n - 10_000n - 1_000n - 260n);
    });

    it.each([
        ['no UTXO', { utxos: [] }, SigningError.MISSING_INPUT_UTXOS],
        ['a zero amount', { amount: 0n }, SigningError.ZERO_AMOUNT_REQUESTED],
        ['a dust amount', { amount: 100n }, SigningError.DUST_AMOUNT_REQUESTED],
        ['more than available', { amount: 200_000n }, SigningError.LOW_BALANCE],
        [
            'no room for the fee',
            { utxos: [createUtxo(1, 0, 10_100n, ownScript)] },
            SigningError.NOT_ENOUGH_UTXOS,
        ],
    ])('should fail with %s', (_name, overrides, error) => {
        const plan = planner.plan(createSigningInput(overrides));

        expect(plan.error).toBe(error);
        expect(plan.amount).toBe(0n);
        expect(plan.fee).toBe(0n);
        expect(plan.utxos).toEqual([]);
    });

    describe('max amount', () => {
        it('should send everything minus the fee and skip UTXOs not worth spending', () => {
            const worth = createUtxo(1, 0, 100_000n, ownScript);
            const dust = createUtxo(2, 0, 100n, ownScript);

            const plan = planner.plan(createSigningInput({ useMaxAmount: true, utxos: [worth, dust] }));

            // 10 + 148 + 34
            expect(plan.fee).toBe(192n);
            expect(plan.amount).toBe(99_808n);
            expect(plan.change).toBe(0n);
            expect(plan.utxos).toEqual([worth]);
        });

        it('should fail when no UTXO covers its own cost', () => {
            const plan = planner.plan(
                createSigningInput({ useMaxAmount: true, utxos: [createUtxo(1, 0, 148n, ownScript)] }),
            );

            expect(plan.error).toBe(SigningError.NOT_ENOUGH_UTXOS);
        });

        it('should fail when the remainder is dust', () => {
            const plan = planner.plan(
                createSigningInput({ useMaxAmount: true, utxos: [createUtxo(1, 0, 600n, ownScript)] }),
            );

            expect(plan.error).toBe(SigningError.DUST_AMOUNT_REQUESTED);
        });
    });

    it('should use the flat zcash fee and copy the branch id', () => {
        const plan = new TransactionPlanner(ZcashChain).plan(createSigningInput({ amount: 50_000n }));

        expect(plan.fee).toBe(10_000n);
        expect(plan.change).toBe(40_000n);
        expect(plan.branchId.toString('hex')).toBe('bb09b876');
    });
});
