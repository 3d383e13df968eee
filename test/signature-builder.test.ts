import { Transaction as BitcoinJsTransaction, payments, script } from 'bitcoinjs-lib';
import { describe, expect, it } from 'vitest';
import {
    BitcoinTransaction,
    BitcoinTransactionBuilder,
    ChainTransactionBuilder,
    EcKeyPair,
    ScriptUtils,
    ScriptVariant,
    SighashType,
    SignatureBuilder,
    SignaturePubkeyList,
    SigningError,
    SigningInput,
    SigningMode,
    SigningResult,
    Transaction,
    TransactionPlan,
    ZcashTransactionBuilder,
} from '../src/index.js';
import {
    createSigningInput,
    createUtxo,
    PRIVATE_KEY_A,
    PRIVATE_KEY_B,
    p2pkhScript,
    p2wpkhScript,
    publicKeyOf,
} from './utils/fixtures.js';

interface Prepared<T extends Transaction> {
    readonly plan: TransactionPlan;
    readonly transaction: T;
}

function prepare<T extends Transaction>(
    input: SigningInput,
    builder: ChainTransactionBuilder<T>,
): Prepared<T> {
    const plan = builder.plan(input);
    const built = builder.build(plan, input);
    if (!built.success) {
        throw new Error(built.message);
    }

    return { plan, transaction: built.payload };
}

function signWith(
    input: SigningInput,
    mode: SigningMode,
    externalSignatures?: SignaturePubkeyList,
): SigningResult<BitcoinTransaction> {
    const { plan, transaction } = prepare(input, new BitcoinTransactionBuilder());

    return new SignatureBuilder({ input, plan, transaction, mode, externalSignatures }).sign();
}

function pushes(scriptSig: Buffer): Buffer[] {
    const chunks = script.decompile(scriptSig) ?? [];

    return chunks.filter((chunk): chunk is Buffer => Buffer.isBuffer(chunk));
}

function p2pkScript(publicKey: Buffer): Buffer {
    const output = payments.p2pk({ pubkey: publicKey }).output;
    if (!output) {
        throw new Error('Failed to build P2PK script');
    }

    return output;
}

describe('SignatureBuilder', () => {
    describe('normal mode', () => {
        it('should sign a P2PKH input into the scriptSig', () => {
            const input = createSigningInput();
            const result = signWith(input, SigningMode.NORMAL);

            expect(result.success).toBe(true);
            if (!result.success) return;

            const tx = result.payload;
            expect(tx.inputs[0].scriptWitness).toEqual([]);

            const [signature, publicKey] = pushes(tx.inputs[0].script);
            expect(publicKey.equals(publicKeyOf(PRIVATE_KEY_A))).toBe(true);

            const decoded = script.signature.decode(signature);
            expect(decoded.hashType).toBe(SighashType.ALL);

            const sighash = BitcoinJsTransaction.fromBuffer(tx.encode()).hashForSignature(
                0,
                input.utxos[0].script,
                SighashType.ALL,
            );
            expect(EcKeyPair.verify(sighash, publicKey, decoded.signature)).toBe(true);
        });

        it('should sign a P2WPKH input into the witness', () => {
            const utxo = createUtxo(1, 0, 100_000n, p2wpkhScript(PRIVATE_KEY_A), ScriptVariant.P2WPKH);
            const input = createSigningInput({ utxos: [utxo] });
            const result = signWith(input, SigningMode.NORMAL);

            expect(result.success).toBe(true);
            if (!result.success) return;

            const tx = result.payload;
            expect(tx.inputs[0].script.byteLength).toBe(0);
            expect(tx.inputs[0].scriptWitness).toHaveLength(2);

            const [signature, publicKey] = tx.inputs[0].scriptWitness;
            const sighash = BitcoinJsTransaction.fromBuffer(tx.encode()).hashForWitnessV0(
                0,
                p2pkhScript(PRIVATE_KEY_A),
                100_000,
                SighashType.ALL,
            );

            expect(EcKeyPair.verify(sighash, publicKey, script.signature.decode(signature).signature)).toBe(
                true,
            );
        });

        it('should sign a P2SH-P2WPKH input with the redeem script', () => {
            const redeemScript = p2wpkhScript(PRIVATE_KEY_A);
            const utxo = createUtxo(
                1,
                0,
                100_000n,
                ScriptUtils.buildPayToScriptHash(redeemScript),
                ScriptVariant.P2WPKH,
            );
            const input = createSigningInput({
                utxos: [utxo],
                scripts: new Map([[EcKeyPair.publicKeyHash(redeemScript).toString('hex'), redeemScript]]),
            });
            const result = signWith(input, SigningMode.NORMAL);

            expect(result.success).toBe(true);
            if (!result.success) return;

            const tx = result.payload;
            expect(pushes(tx.inputs[0].script)).toEqual([redeemScript]);
            expect(tx.inputs[0].scriptWitness).toHaveLength(2);
            expect(tx.inputs[0].scriptWitness[1].equals(publicKeyOf(PRIVATE_KEY_A))).toBe(true);
        });

        it('should sign a P2PK input with the signature alone', () => {
            const utxo = createUtxo(1, 0, 100_000n, p2pkScript(publicKeyOf(PRIVATE_KEY_A)));
            const result = signWith(createSigningInput({ utxos: [utxo] }), SigningMode.NORMAL);

            expect(result.success).toBe(true);
            if (!result.success) return;

            expect(pushes(result.payload.inputs[0].script)).toHaveLength(1);
        });

        it('should fail without the redeem script', () => {
            const utxo = createUtxo(
                1,
                0,
                100_000n,
                ScriptUtils.buildPayToScriptHash(p2wpkhScript(PRIVATE_KEY_A)),
            );

            expect(signWith(createSigningInput({ utxos: [utxo] }), SigningMode.NORMAL)).toMatchObject({
                success: false,
                error: SigningError.SCRIPT_REDEEM,
            });
        });

        it('should fail on unsupported output scripts', () => {
            const p2wsh = Buffer.concat([Buffer.from([0x00, 0x20]), Buffer.alloc(32, 7)]);
            const utxo = createUtxo(1, 0, 100_000n, p2wsh, ScriptVariant.P2WPKH);

            expect(signWith(createSigningInput({ utxos: [utxo] }), SigningMode.NORMAL)).toMatchObject({
                success: false,
                error: SigningError.SCRIPT_OUTPUT,
            });
        });

        it('should fail without the private key', () => {
            const utxo = createUtxo(1, 0, 100_000n, p2pkhScript(PRIVATE_KEY_B));

            expect(signWith(createSigningInput({ utxos: [utxo] }), SigningMode.NORMAL)).toMatchObject({
                success: false,
                error: SigningError.MISSING_PRIVATE_KEY,
            });
        });

        it('should reject an invalid private key', () => {
            expect(
                signWith(createSigningInput({ privateKeys: [Buffer.alloc(32)] }), SigningMode.NORMAL),
            ).toMatchObject({
                success: false,
                error: SigningError.INVALID_PRIVATE_KEY,
            });
        });

        it('should refuse witness spends on chains without witness support', () => {
            const utxo = createUtxo(1, 0, 100_000n, p2wpkhScript(PRIVATE_KEY_A), ScriptVariant.P2WPKH);
            const input = createSigningInput({ utxos: [utxo] });
            const { plan, transaction } = prepare(input, new ZcashTransactionBuilder());

            const result = new SignatureBuilder({
                input,
                plan,
                transaction,
                mode: SigningMode.NORMAL,
            }).sign();

            expect(result).toMatchObject({
                success: false,
                error: SigningError.SCRIPT_WITNESS_PROGRAM,
            });
        });

        it('should fail when an input has no UTXO in the plan', () => {
            const input = createSigningInput();
            const { plan, transaction } = prepare(input, new BitcoinTransactionBuilder());

            const result = new SignatureBuilder({
                input,
                plan: { ...plan, utxos: [] },
                transaction,
                mode: SigningMode.NORMAL,
            }).sign();

            expect(result).toEqual({
                success: false,
                error: SigningError.INVALID_UTXO,
                message: 'No UTXO in the plan for input 0',
            });
        });
    });

    describe('size estimation mode', () => {
        it('should fill placeholders without any key', () => {
            const input = createSigningInput({
                privateKeys: [],
                utxos: [
                    createUtxo(1, 0, 60_000n, p2pkhScript(PRIVATE_KEY_A)),
                    createUtxo(2, 1, 60_000n, p2wpkhScript(PRIVATE_KEY_B), ScriptVariant.P2WPKH),
                ],
                amount: 100_000n,
            });
            const result = signWith(input, SigningMode.SIZE_ESTIMATION_ONLY);

            expect(result.success).toBe(true);
            if (!result.success) return;

            const [legacy, witness] = result.payload.inputs;

            // push(72) + push(33)
            expect(legacy.script.byteLength).toBe(107);
            expect(witness.script.byteLength).toBe(0);
            expect(witness.scriptWitness.map((item) => item.byteLength)).toEqual([72, 33]);
        });
    });

    describe('hash only mode', () => {
        it('should record hashes and leave scripts empty', () => {
            const input = createSigningInput();
            const { plan, transaction } = prepare(input, new BitcoinTransactionBuilder());
            const builder = new SignatureBuilder({
                input,
                plan,
                transaction,
                mode: SigningMode.HASH_ONLY,
            });

            const result = builder.sign();
            expect(result.success).toBe(true);
            expect(transaction.inputs[0].script.byteLength).toBe(0);

            const hashes = builder.getHashesForSigning();
            expect(hashes).toHaveLength(1);
            expect(hashes[0].publicKey.equals(publicKeyOf(PRIVATE_KEY_A))).toBe(true);
            expect(
                hashes[0].hash.equals(
                    BitcoinJsTransaction.fromBuffer(transaction.encode()).hashForSignature(
                        0,
                        input.utxos[0].script,
                        SighashType.ALL,
                    ),
                ),
            ).toBe(true);

            // a second run starts over
            builder.sign();
            expect(builder.getHashesForSigning()).toHaveLength(1);
        });

        it('should use public keys when no private key is given', () => {
            const input = createSigningInput({
                privateKeys: [],
                publicKeys: [publicKeyOf(PRIVATE_KEY_A)],
            });
            const { plan, transaction } = prepare(input, new BitcoinTransactionBuilder());
            const builder = new SignatureBuilder({
                input,
                plan,
                transaction,
                mode: SigningMode.HASH_ONLY,
            });

            expect(builder.sign().success).toBe(true);
            expect(builder.getHashesForSigning()).toHaveLength(1);
        });
    });

    describe('external mode', () => {
        const publicKey = publicKeyOf(PRIVATE_KEY_A);

        function derSignature(hash: Buffer): Buffer {
            const compact = EcKeyPair.fromPrivateKey(PRIVATE_KEY_A).sign(hash);

            return script.signature.encode(compact, SighashType.ALL).subarray(0, -1);
        }

        it('should fail without a signature', () => {
            expect(signWith(createSigningInput({ privateKeys: [] }), SigningMode.EXTERNAL, [])).toEqual({
                success: false,
                error: SigningError.MISSING_PRIVATE_KEY,
                message: `No key for public key hash ${EcKeyPair.publicKeyHash(publicKey).toString('hex')}`,
            });
        });

        it('should reject a signature that does not verify', () => {
            const result = signWith(createSigningInput({ privateKeys: [] }), SigningMode.EXTERNAL, [
                { signature: derSignature(Buffer.alloc(32, 9)), publicKey },
            ]);

            expect(result).toEqual({
                success: false,
                error: SigningError.SIGNING,
                message: 'External signature for input 0 does not verify',
            });
        });

        it('should reject a signature for another public key', () => {
            const result = signWith(createSigningInput(), SigningMode.EXTERNAL, [
                { signature: derSignature(Buffer.alloc(32, 9)), publicKey: publicKeyOf(PRIVATE_KEY_B) },
            ]);

            expect(result).toEqual({
                success: false,
                error: SigningError.SIGNING,
                message: 'External signature for input 0 has an unexpected public key',
            });
        });
    });
});
