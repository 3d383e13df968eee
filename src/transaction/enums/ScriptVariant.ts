/**
 * Spending construction declared for each UTXO.
 *
 * Only {@link ScriptVariant.P2PKH} is claimed through a scriptSig; every other variant is
 * claimed through the witness stack.
 */
export enum ScriptVariant {
    P2PKH = 0,
    P2WPKH = 1,
    P2TR_KEY_PATH = 2,
    BRC20_TRANSFER = 3,
    NFT_INSCRIPTION = 4,
}

export function isLegacyScriptVariant(variant: ScriptVariant): boolean {
    return variant === ScriptVariant.P2PKH;
}
