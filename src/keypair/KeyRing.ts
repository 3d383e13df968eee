import { ECPairInterface } from 'ecpair';
import { SigningError } from '../result/SigningError.js';
import { failure, SigningResult, success } from '../result/SigningResult.js';
import { errorMessage } from '../utils/errors.js';
import { EcKeyPair } from './EcKeyPair.js';

/**
 * Keys available to one signing call, indexed by public key hash (hex).
 */
export class KeyRing {
    private readonly signers: Map<string, ECPairInterface> = new Map();
    private readonly publicKeys: Map<string, Buffer> = new Map();

    private constructor() {}

    public static fromKeys(
        privateKeys: readonly Buffer[],
        publicKeys: readonly Buffer[] = [],
    ): SigningResult<KeyRing> {
        const ring = new KeyRing();

        for (const [index, privateKey] of privateKeys.entries()) {
            let signer: ECPairInterface;
            try {
                signer = EcKeyPair.fromPrivateKey(privateKey);
            } catch (e) {
                return failure(
                    SigningError.INVALID_PRIVATE_KEY,
                    `Invalid private key at index ${index}: ${errorMessage(e)}`,
                );
            }

            const hash = EcKeyPair.publicKeyHash(signer.publicKey).toString('hex');
            ring.signers.set(hash, signer);
            ring.publicKeys.set(hash, signer.publicKey);
        }

        for (const publicKey of publicKeys) {
            const hash = EcKeyPair.publicKeyHash(publicKey).toString('hex');
            if (!ring.publicKeys.has(hash)) {
                ring.publicKeys.set(hash, publicKey);
            }
        }

        return success(ring);
    }

    public getSigner(publicKeyHash: Buffer): ECPairInterface | undefined {
        return this.signers.get(publicKeyHash.toString('hex'));
    }

    public getPublicKey(publicKeyHash: Buffer): Buffer | undefined {
        return this.publicKeys.get(publicKeyHash.toString('hex'));
    }
}
