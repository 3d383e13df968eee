import { DEFAULT_FEE_CALCULATOR } from '../../planning/FeeCalculator.js';
import { BitcoinDiamondTransaction } from '../../transaction/chains/BitcoinDiamondTransaction.js';
import { ChainId } from '../ChainId.js';
import { ChainConfig } from '../IChainConfig.js';

export const BitcoinDiamondChain: ChainConfig<ChainId.BITCOIN_DIAMOND> = {
    CHAIN: ChainId.BITCOIN_DIAMOND,
    CHAIN_NAME: 'Bitcoin Diamond',

    TRANSACTION_VERSION: BitcoinDiamondTransaction.PREBLOCK_VERSION,

    DUST_THRESHOLD: 546n,

    FEE_CALCULATOR: DEFAULT_FEE_CALCULATOR,

    BRANCH_ID: Buffer.alloc(0),
};
