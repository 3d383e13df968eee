import { ChainId } from '../../chains/ChainId.js';
import { ChainConfig } from '../../chains/IChainConfig.js';
import { VergeChain } from '../../chains/metadata/VergeChain.js';
import { VergeTransaction } from '../chains/VergeTransaction.js';
import { SigningInput } from '../interfaces/ISigningInput.js';
import { TransactionBuilder } from './TransactionBuilder.js';

export class VergeTransactionBuilder extends TransactionBuilder<VergeTransaction> {
    constructor(config: ChainConfig<ChainId.VERGE> = VergeChain) {
        super(config);
    }

    public createTransaction(input: SigningInput): VergeTransaction {
        return new VergeTransaction(this.config.TRANSACTION_VERSION, input.lockTime, input.time ?? 0);
    }
}
