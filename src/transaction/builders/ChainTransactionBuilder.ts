import { ChainConfig } from '../../chains/IChainConfig.js';
import { SigningResult } from '../../result/SigningResult.js';
import { SigningInput } from '../interfaces/ISigningInput.js';
import { TransactionPlan } from '../interfaces/ITransactionPlan.js';
import { Transaction } from '../Transaction.js';

/**
 * What a chain has to provide for the signer to plan, build and rebuild its transactions.
 */
export interface ChainTransactionBuilder<T extends Transaction> {
    readonly config: ChainConfig;

    plan(input: SigningInput): TransactionPlan;

    /**
     * @description Unsigned transaction spending the plan's UTXOs.
     */
    build(plan: TransactionPlan, input: SigningInput): SigningResult<T>;

    /**
     * @description Empty transaction carrying the chain's header fields.
     */
    createTransaction(input: SigningInput, plan?: TransactionPlan): T;
}
