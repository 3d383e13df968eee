import { ChainId } from '../../chains/ChainId.js';
import { ChainConfig } from '../../chains/IChainConfig.js';
import { BitcoinChain } from '../../chains/metadata/BitcoinChain.js';
import { BitcoinTransaction } from '../chains/BitcoinTransaction.js';
import { SigningInput } from '../interfaces/ISigningInput.js';
import { TransactionBuilder } from './TransactionBuilder.js';

export class BitcoinTransactionBuilder extends TransactionBuilder<BitcoinTransaction> {
    constructor(config: ChainConfig<ChainId.BITCOIN> = BitcoinChain) {
        super(config);
    }

    public createTransaction(input: SigningInput): BitcoinTransaction {
        return new BitcoinTransaction(this.config.TRANSACTION_VERSION, input.lockTime);
    }
}
