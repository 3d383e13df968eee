import { ConstantFeeCalculator } from '../../planning/FeeCalculator.js';
import { ZcashTransaction } from '../../transaction/chains/ZcashTransaction.js';
import { ChainId } from '../ChainId.js';
import { ChainConfig } from '../IChainConfig.js';

export const ZcashChain: ChainConfig<ChainId.ZCASH> = {
    CHAIN: ChainId.ZCASH,
    CHAIN_NAME: 'Zcash',

    TRANSACTION_VERSION: ZcashTransaction.SAPLING_VERSION,

    DUST_THRESHOLD: 546n,

    // Transparent transactions pay the conventional flat fee.
    FEE_CALCULATOR: new ConstantFeeCalculator(10000n),

    BRANCH_ID: ZcashTransaction.SAPLING_BRANCH_ID,
};
