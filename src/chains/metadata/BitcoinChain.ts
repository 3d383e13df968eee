import { DEFAULT_FEE_CALCULATOR } from '../../planning/FeeCalculator.js';
import { ChainId } from '../ChainId.js';
import { ChainConfig } from '../IChainConfig.js';

export const BitcoinChain: ChainConfig<ChainId.BITCOIN> = {
    CHAIN: ChainId.BITCOIN,
    CHAIN_NAME: 'Bitcoin',

    TRANSACTION_VERSION: 2,

    DUST_THRESHOLD: 546n,

    FEE_CALCULATOR: DEFAULT_FEE_CALCULATOR,

    BRANCH_ID: Buffer.alloc(0),
};
