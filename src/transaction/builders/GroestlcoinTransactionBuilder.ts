import { ChainId } from '../../chains/ChainId.js';
import { ChainConfig } from '../../chains/IChainConfig.js';
import { GroestlcoinChain } from '../../chains/metadata/GroestlcoinChain.js';
import { GroestlcoinTransaction } from '../chains/GroestlcoinTransaction.js';
import { SigningInput } from '../interfaces/ISigningInput.js';
import { TransactionBuilder } from './TransactionBuilder.js';

export class GroestlcoinTransactionBuilder extends TransactionBuilder<GroestlcoinTransaction> {
    constructor(config: ChainConfig<ChainId.GROESTLCOIN> = GroestlcoinChain) {
        super(config);
    }

    public createTransaction(input: SigningInput): GroestlcoinTransaction {
        return new GroestlcoinTransaction(this.config.TRANSACTION_VERSION, input.lockTime);
    }
}
