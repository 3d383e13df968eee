import { ChainConfig } from '../chains/IChainConfig.js';
import { SigningError } from '../result/SigningError.js';
import { SigningInput, UnspentOutput } from '../transaction/interfaces/ISigningInput.js';
import { TransactionPlan } from '../transaction/interfaces/ITransactionPlan.js';

const MAX_DIRECT_PUSH = 75;

/**
 * Selects inputs and computes fee and change for one chain.
 */
export class TransactionPlanner {
    constructor(protected readonly config: ChainConfig) {}

    /**
     * @description Size in bytes of an OP_RETURN output carrying `data`.
     */
    public static opReturnOutputSize(data: Buffer): number {
        if (data.byteLength === 0) return 0;

        const pushOpcodes = data.byteLength <= MAX_DIRECT_PUSH ? 1 : 2;

        // value + script length + OP_RETURN + push + payload
        return 8 + 1 + 1 + pushOpcodes + data.byteLength;
    }

    private static sumAmounts(values: readonly { readonly amount: bigint }[]): bigint {
        return values.reduce((total, value) => total + value.amount, 0n);
    }

    public plan(input: SigningInput): TransactionPlan {
        const outputOpReturn = input.outputOpReturn ?? Buffer.alloc(0);
        const availableAmount = TransactionPlanner.sumAmounts(input.utxos);
        const template: TransactionPlan = {
            amount: 0n,
            availableAmount,
            fee: 0n,
            change: 0n,
            utxos: [],
            branchId: this.config.BRANCH_ID,
            outputOpReturn,
            preBlockHash: input.preBlockHash,
            preBlockHeight: input.preBlockHeight,
        };

        if (input.utxos.length === 0) {
            return { ...template, error: SigningError.MISSING_INPUT_UTXOS };
        }

        if (input.useMaxAmount) {
            return this.planMaxAmount(input, template);
        }

        if (input.amount === 0n) {
            return { ...template, error: SigningError.ZERO_AMOUNT_REQUESTED };
        }

        if (input.amount < this.config.DUST_THRESHOLD) {
            return { ...template, error: SigningError.DUST_AMOUNT_REQUESTED };
        }

        const extraOutputs = input.extraOutputs ?? [];
        const extraValue = extraOutputs.reduce((total, output) => total + output.value, 0n);
        const target = input.amount + extraValue;

        if (availableAmount < target) {
            return { ...template, error: SigningError.LOW_BALANCE };
        }

        const extraBytes = TransactionPlanner.opReturnOutputSize(outputOpReturn);

        // payment + extra outputs + change
        const outputCount = 1 + extraOutputs.length + 1;

        const byAmount = [...input.utxos].sort((a, b) =>
            a.amount === b.amount ? 0 : a.amount > b.amount ? -1 : 1,
        );

        const chosen = new Set<UnspentOutput>();
        let selectedAmount = 0n;
        let fee = 0n;
        for (const utxo of byAmount) {
            chosen.add(utxo);
            selectedAmount += utxo.amount;
            fee = this.config.FEE_CALCULATOR.calculate(
                chosen.size,
                outputCount,
                input.byteFee,
                extraBytes,
            );

            if (selectedAmount >= target + fee) break;
        }

        if (selectedAmount < target + fee) {
            return { ...template, error: SigningError.NOT_ENOUGH_UTXOS };
        }

        let change = selectedAmount - target - fee;
        if (change < this.config.DUST_THRESHOLD) {
            fee += change;
            change = 0n;
        }

        return {
            ...template,
            amount: input.amount,
            fee,
            change,
            utxos: input.utxos.filter((utxo) => chosen.has(utxo)),
        };
    }

    private planMaxAmount(input: SigningInput, template: TransactionPlan): TransactionPlan {
        const calculator = this.config.FEE_CALCULATOR;
        const inputCost = calculator.calculateSingleInput(input.byteFee);
        const utxos = input.utxos.filter((utxo) => utxo.amount > inputCost);

        if (utxos.length === 0) {
            return { ...template, error: SigningError.NOT_ENOUGH_UTXOS };
        }

        const extraOutputs = input.extraOutputs ?? [];
        const extraValue = extraOutputs.reduce((total, output) => total + output.value, 0n);
        const selectedAmount = TransactionPlanner.sumAmounts(utxos);
        const fee = calculator.calculate(
            utxos.length,
            1 + extraOutputs.length,
            input.byteFee,
            TransactionPlanner.opReturnOutputSize(template.outputOpReturn),
        );

        const amount = selectedAmount - extraValue - fee;
        if (amount <= 0n) {
            return { ...template, error: SigningError.NOT_ENOUGH_UTXOS };
        }

        if (amount < this.config.DUST_THRESHOLD) {
            return { ...template, error: SigningError.DUST_AMOUNT_REQUESTED };
        }

        return { ...template, amount, fee, change: 0n, utxos };
    }
}
