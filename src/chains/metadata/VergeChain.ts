import { DEFAULT_FEE_CALCULATOR } from '../../planning/FeeCalculator.js';
import { ChainId } from '../ChainId.js';
import { ChainConfig } from '../IChainConfig.js';

export const VergeChain: ChainConfig<ChainId.VERGE> = {
    CHAIN: ChainId.VERGE,
    CHAIN_NAME: 'Verge',

    TRANSACTION_VERSION: 1,

    DUST_THRESHOLD: 546n,

    FEE_CALCULATOR: DEFAULT_FEE_CALCULATOR,

    BRANCH_ID: Buffer.alloc(0),
};
