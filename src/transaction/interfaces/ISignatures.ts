/**
 * Signature hash of one input and the public key expected to sign it.
 */
export interface HashPubkey {
    readonly hash: Buffer;
    readonly publicKey: Buffer;
}

/**
 * Signature produced out of process, DER-encoded without the hash type byte.
 */
export interface SignaturePubkey {
    readonly signature: Buffer;
    readonly publicKey: Buffer;
}

export type HashPubkeyList = readonly HashPubkey[];
export type SignaturePubkeyList = readonly SignaturePubkey[];
