import { ChainId } from '../../chains/ChainId.js';
import { ChainConfig } from '../../chains/IChainConfig.js';
import { ZenChain } from '../../chains/metadata/ZenChain.js';
import { SigningError } from '../../result/SigningError.js';
import { failure, SigningFailure } from '../../result/SigningResult.js';
import { OutputScriptType, ScriptUtils } from '../../script/ScriptUtils.js';
import { HASH_BYTE_LENGTH } from '../../utils/lengths.js';
import { ZenTransaction } from '../chains/ZenTransaction.js';
import { SigningInput } from '../interfaces/ISigningInput.js';
import { TransactionPlan } from '../interfaces/ITransactionPlan.js';
import { TransactionBuilder } from './TransactionBuilder.js';

/**
 * Replay-protects every P2PKH and P2SH output with the block the plan commits to.
 */
export class ZenTransactionBuilder extends TransactionBuilder<ZenTransaction> {
    constructor(config: ChainConfig<ChainId.ZEN> = ZenChain) {
        super(config);
    }

    public createTransaction(input: SigningInput): ZenTransaction {
        return new ZenTransaction(this.config.TRANSACTION_VERSION, input.lockTime);
    }

    protected override verifyPlan(plan: TransactionPlan): SigningFailure | undefined {
        if (plan.preBlockHash?.byteLength !== HASH_BYTE_LENGTH || plan.preBlockHeight === undefined) {
            return failure(
                SigningError.INPUT_PARSE,
                'Zen outputs need a 32-byte block hash and its height',
            );
        }

        return undefined;
    }

    protected override createOutputScript(script: Buffer, plan: TransactionPlan): Buffer {
        const type = ScriptUtils.classify(script);
        if (type !== OutputScriptType.P2PKH && type !== OutputScriptType.P2SH) {
            return script;
        }

        if (!plan.preBlockHash || plan.preBlockHeight === undefined) {
            throw new Error('Zen outputs need a block hash and its height');
        }

        return ScriptUtils.buildReplayProtected(script, plan.preBlockHash, plan.preBlockHeight);
    }
}
