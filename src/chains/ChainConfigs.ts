import { ChainId } from './ChainId.js';
import { ChainConfig } from './IChainConfig.js';
import { BitcoinChain } from './metadata/BitcoinChain.js';
import { BitcoinDiamondChain } from './metadata/BitcoinDiamondChain.js';
import { GroestlcoinChain } from './metadata/GroestlcoinChain.js';
import { VergeChain } from './metadata/VergeChain.js';
import { ZcashChain } from './metadata/ZcashChain.js';
import { ZenChain } from './metadata/ZenChain.js';

export const ChainConfigs: { readonly [key in ChainId]: ChainConfig<key> } = {
    [ChainId.BITCOIN]: BitcoinChain,
    [ChainId.GROESTLCOIN]: GroestlcoinChain,
    [ChainId.VERGE]: VergeChain,
    [ChainId.ZCASH]: ZcashChain,
    [ChainId.ZEN]: ZenChain,
    [ChainId.BITCOIN_DIAMOND]: BitcoinDiamondChain,
};
