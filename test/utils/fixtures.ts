import {
    ChainId,
    EcKeyPair,
    ScriptUtils,
    ScriptVariant,
    SighashType,
    SigningInput,
    TransactionSequence,
    UnspentOutput,
} from '../../src/index.js';

export const PRIVATE_KEY_A = Buffer.alloc(32, 1);
export const PRIVATE_KEY_B = Buffer.alloc(32, 2);
export const PRIVATE_KEY_C = Buffer.alloc(32, 3);

export function publicKeyOf(privateKey: Buffer): Buffer {
    return EcKeyPair.fromPrivateKey(privateKey).publicKey;
}

export function p2pkhScript(privateKey: Buffer): Buffer {
    return ScriptUtils.buildPayToPublicKeyHash(EcKeyPair.publicKeyHash(publicKeyOf(privateKey)));
}

export function p2wpkhScript(privateKey: Buffer): Buffer {
    return ScriptUtils.buildPayToWitnessPublicKeyHash(
        EcKeyPair.publicKeyHash(publicKeyOf(privateKey)),
    );
}

/**
 * Distinct, non-palindromic transaction id (display order).
 */
export function transactionId(seed: number): string {
    return Buffer.from(Array.from({ length: 32 }, (_, i) => (seed + i) & 0xff)).toString('hex');
}

export function createUtxo(
    seed: number,
    index: number,
    amount: bigint,
    script: Buffer,
    variant: ScriptVariant = ScriptVariant.P2PKH,
): UnspentOutput {
    return {
        outPoint: {
            transactionId: transactionId(seed),
            index,
            sequence: TransactionSequence.FINAL,
        },
        script,
        amount,
        variant,
    };
}

export function createSigningInput(overrides: Partial<SigningInput> = {}): SigningInput {
    return {
        chain: ChainId.BITCOIN,
        hashType: SighashType.ALL,
        amount: 10_000n,
        byteFee: 1n,
        toScript: p2pkhScript(PRIVATE_KEY_C),
        changeScript: p2pkhScript(PRIVATE_KEY_A),
        privateKeys: [PRIVATE_KEY_A],
        utxos: [createUtxo(1, 0, 100_000n, p2pkhScript(PRIVATE_KEY_A))],
        useMaxAmount: false,
        lockTime: 0,
        isAlternateScheme: false,
        ...overrides,
    };
}
