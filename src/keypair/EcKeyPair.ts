import * as ecc from '@bitcoinerlab/secp256k1';
import { crypto } from 'bitcoinjs-lib';
import { ECPairAPI, ECPairFactory, ECPairInterface } from 'ecpair';

/**
 * Class for handling EC key pairs
 * @class EcKeyPair
 * @module EcKeyPair
 * @typicalname EcKeyPair
 */
export class EcKeyPair {
    public static ECPair: ECPairAPI = ECPairFactory(ecc);

    /**
     * Generate a compressed keypair from a private key
     * @param {Buffer | Uint8Array} privateKey - The private key to use
     * @returns {ECPairInterface} - The generated keypair
     * @throws {Error} - If the private key is outside the curve order
     */
    public static fromPrivateKey(privateKey: Buffer | Uint8Array): ECPairInterface {
        return this.ECPair.fromPrivateKey(
            !Buffer.isBuffer(privateKey) ? Buffer.from(privateKey) : privateKey,
            { compressed: true },
        );
    }

    /**
     * HASH160 of a public key, as committed to by P2PKH and P2WPKH outputs.
     */
    public static publicKeyHash(publicKey: Buffer): Buffer {
        return crypto.hash160(publicKey);
    }

    /**
     * Verify a 64-byte compact signature.
     */
    public static verify(hash: Buffer, publicKey: Buffer, signature: Buffer): boolean {
        return ecc.verify(hash, publicKey, signature);
    }
}
