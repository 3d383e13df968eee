import { ChainId } from '../../chains/ChainId.js';
import { ChainConfig } from '../../chains/IChainConfig.js';
import { BitcoinDiamondChain } from '../../chains/metadata/BitcoinDiamondChain.js';
import { SigningError } from '../../result/SigningError.js';
import { failure, SigningFailure } from '../../result/SigningResult.js';
import { HASH_BYTE_LENGTH } from '../../utils/lengths.js';
import { BitcoinDiamondTransaction } from '../chains/BitcoinDiamondTransaction.js';
import { SigningInput } from '../interfaces/ISigningInput.js';
import { TransactionPlan } from '../interfaces/ITransactionPlan.js';
import { TransactionBuilder } from './TransactionBuilder.js';

export class BitcoinDiamondTransactionBuilder extends TransactionBuilder<BitcoinDiamondTransaction> {
    constructor(config: ChainConfig<ChainId.BITCOIN_DIAMOND> = BitcoinDiamondChain) {
        super(config);
    }

    public createTransaction(input: SigningInput, plan?: TransactionPlan): BitcoinDiamondTransaction {
        const preBlockHash = plan?.preBlockHash ?? input.preBlockHash;

        return new BitcoinDiamondTransaction(
            this.config.TRANSACTION_VERSION,
            input.lockTime,
            preBlockHash ?? Buffer.alloc(HASH_BYTE_LENGTH),
        );
    }

    protected override verifyPlan(plan: TransactionPlan): SigningFailure | undefined {
        if (plan.preBlockHash?.byteLength !== HASH_BYTE_LENGTH) {
            return failure(
                SigningError.INPUT_PARSE,
                'Bitcoin Diamond transactions need a 32-byte previous block hash',
            );
        }

        return undefined;
    }
}
