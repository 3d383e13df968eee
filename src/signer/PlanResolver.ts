import { ChainTransactionBuilder } from '../transaction/builders/ChainTransactionBuilder.js';
import { SigningInput } from '../transaction/interfaces/ISigningInput.js';
import { TransactionPlan } from '../transaction/interfaces/ITransactionPlan.js';
import { Transaction } from '../transaction/Transaction.js';

export class PlanResolver {
    /**
     * @description The caller's plan when one is supplied (not re-validated), the chain
     * planner's otherwise.
     */
    public static resolve(
        input: SigningInput,
        builder: Pick<ChainTransactionBuilder<Transaction>, 'plan'>,
    ): TransactionPlan {
        return input.plan ?? builder.plan(input);
    }
}
