import { ChainId } from '../../chains/ChainId.js';
import { ChainConfig } from '../../chains/IChainConfig.js';
import { ZcashChain } from '../../chains/metadata/ZcashChain.js';
import { ZcashTransaction } from '../chains/ZcashTransaction.js';
import { SigningInput } from '../interfaces/ISigningInput.js';
import { TransactionPlan } from '../interfaces/ITransactionPlan.js';
import { TransactionBuilder } from './TransactionBuilder.js';

export class ZcashTransactionBuilder extends TransactionBuilder<ZcashTransaction> {
    constructor(config: ChainConfig<ChainId.ZCASH> = ZcashChain) {
        super(config);
    }

    public createTransaction(input: SigningInput, plan?: TransactionPlan): ZcashTransaction {
        // The branch id negotiated in the plan wins over the configured one.
        const branchId =
            plan && plan.branchId.byteLength > 0 ? plan.branchId : this.config.BRANCH_ID;

        return new ZcashTransaction(
            this.config.TRANSACTION_VERSION,
            input.lockTime,
            input.expiryHeight ?? 0,
            branchId,
        );
    }
}
