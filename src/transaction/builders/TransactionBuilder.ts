import { ChainConfig } from '../../chains/IChainConfig.js';
import { TransactionPlanner } from '../../planning/TransactionPlanner.js';
import { SigningError } from '../../result/SigningError.js';
import { failure, SigningFailure, SigningResult, success } from '../../result/SigningResult.js';
import { ScriptUtils } from '../../script/ScriptUtils.js';
import { errorMessage } from '../../utils/errors.js';
import { SigningInput } from '../interfaces/ISigningInput.js';
import { TransactionPlan } from '../interfaces/ITransactionPlan.js';
import { OutPoint } from '../OutPoint.js';
import { Transaction } from '../Transaction.js';
import { TransactionInput } from '../TransactionInput.js';
import { TransactionOutput } from '../TransactionOutput.js';
import { ChainTransactionBuilder } from './ChainTransactionBuilder.js';

/**
 * Turns a plan into an unsigned transaction.
 * @description Subclasses only decide which transaction type (and header fields) a chain uses.
 * @abstract
 * @class TransactionBuilder
 */
export abstract class TransactionBuilder<T extends Transaction>
    implements ChainTransactionBuilder<T>
{
    public static readonly MAX_OP_RETURN_SIZE: number = 80;

    protected readonly planner: TransactionPlanner;

    protected constructor(public readonly config: ChainConfig) {
        this.planner = new TransactionPlanner(config);
    }

    public abstract createTransaction(input: SigningInput, plan?: TransactionPlan): T;

    public plan(input: SigningInput): TransactionPlan {
        return this.planner.plan(input);
    }

    public build(plan: TransactionPlan, input: SigningInput): SigningResult<T> {
        if (plan.error !== undefined) {
            return failure(plan.error, `Invalid plan: ${SigningError[plan.error]}`);
        }

        if (plan.utxos.length === 0) {
            return failure(SigningError.MISSING_INPUT_UTXOS, 'Plan selects no UTXO');
        }

        if (plan.outputOpReturn.byteLength > TransactionBuilder.MAX_OP_RETURN_SIZE) {
            return failure(
                SigningError.INVALID_MEMO,
                `OP_RETURN data exceeds ${TransactionBuilder.MAX_OP_RETURN_SIZE} bytes`,
            );
        }

        const rejected = this.verifyPlan(plan, input);
        if (rejected) return rejected;

        const transaction = this.createTransaction(input, plan);

        if (input.toScript.byteLength === 0) {
            return failure(SigningError.INVALID_ADDRESS, 'Missing payment output script');
        }

        transaction.outputs.push(
            new TransactionOutput(plan.amount, this.createOutputScript(input.toScript, plan)),
        );

        if (plan.change > 0n) {
            if (input.changeScript.byteLength === 0) {
                return failure(SigningError.INVALID_ADDRESS, 'Missing change output script');
            }

            transaction.outputs.push(
                new TransactionOutput(plan.change, this.createOutputScript(input.changeScript, plan)),
            );
        }

        if (plan.outputOpReturn.byteLength > 0) {
            transaction.outputs.push(
                new TransactionOutput(0n, ScriptUtils.buildOpReturn(plan.outputOpReturn)),
            );
        }

        for (const output of input.extraOutputs ?? []) {
            transaction.outputs.push(
                new TransactionOutput(output.value, this.createOutputScript(output.script, plan)),
            );
        }

        for (const utxo of plan.utxos) {
            let previousOutput: OutPoint;
            try {
                previousOutput = OutPoint.fromTransactionId(
                    utxo.outPoint.transactionId,
                    utxo.outPoint.index,
                    utxo.outPoint.sequence,
                );
            } catch (e) {
                return failure(SigningError.INVALID_UTXO, errorMessage(e));
            }

            transaction.inputs.push(new TransactionInput(previousOutput));
        }

        return success(transaction);
    }

    /**
     * @description Chain-specific plan requirements, checked before anything is built.
     * @protected
     */
    protected verifyPlan(_plan: TransactionPlan, _input: SigningInput): SigningFailure | undefined {
        return undefined;
    }

    /**
     * @description Locking script written for a payment, change or extra output.
     * @protected
     */
    protected createOutputScript(script: Buffer, _plan: TransactionPlan): Buffer {
        return script;
    }
}
