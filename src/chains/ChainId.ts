/**
 * @description Chains sharing the UTXO signing pipeline.
 */
export enum ChainId {
    BITCOIN = 0,
    GROESTLCOIN = 1,
    VERGE = 2,
    ZCASH = 3,
    ZEN = 4,
    BITCOIN_DIAMOND = 5,
}
