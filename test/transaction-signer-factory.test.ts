import { script } from 'bitcoinjs-lib';
import { describe, expect, it } from 'vitest';
import {
    BitcoinDiamondTransaction,
    ChainConfigs,
    ChainId,
    EcKeyPair,
    GroestlcoinTransaction,
    ScriptUtils,
    SighashType,
    SignatureVersion,
    SigningError,
    Transaction,
    TransactionSignerFactory,
    VergeTransaction,
    ZcashTransaction,
    ZenTransaction,
} from '../src/index.js';
import {
    createSigningInput,
    createUtxo,
    PRIVATE_KEY_A,
    PRIVATE_KEY_C,
    p2pkhScript,
    p2wpkhScript,
} from './utils/fixtures.js';

function verifyFirstInput(tx: Transaction, scriptCode: Buffer, amount: bigint): boolean {
    const chunks = (script.decompile(tx.inputs[0].script) ?? []).filter(
        (chunk): chunk is Buffer => Buffer.isBuffer(chunk),
    );
    const [signature, publicKey] = chunks;

    const sighash = tx.getSignatureHash({
        index: 0,
        scriptCode,
        amount,
        hashType: SighashType.ALL,
        version: SignatureVersion.BASE,
    });

    return EcKeyPair.verify(sighash, publicKey, script.signature.decode(signature).signature);
}

describe('TransactionSignerFactory', () => {
    it.each([
        ChainId.BITCOIN,
        ChainId.GROESTLCOIN,
        ChainId.VERGE,
        ChainId.ZCASH,
        ChainId.ZEN,
        ChainId.BITCOIN_DIAMOND,
    ])(
        'should configure the signer of chain %i',
        (chain) => {
            const signer = TransactionSignerFactory.forChain(chain);

            expect(signer.builder.config).toBe(ChainConfigs[chain]);
        },
    );

    it('should sign a zcash transaction with the flat fee', () => {
        const input = createSigningInput({ chain: ChainId.ZCASH, expiryHeight: 2_500_000 });
        const result = TransactionSignerFactory.sign(input);

        expect(result.success).toBe(true);
        if (!result.success) return;

        const tx = result.payload;
        expect(tx).toBeInstanceOf(ZcashTransaction);
        expect(tx.toHex().startsWith('04000080' + '85202f89')).toBe(true);
        expect(tx.outputs.map((output) => output.value)).toEqual([10_000n, 80_000n]);
        expect(verifyFirstInput(tx, input.utxos[0].script, input.utxos[0].amount)).toBe(true);
    });

    it('should sign a verge transaction with its time', () => {
        const result = TransactionSignerFactory.sign(
            createSigningInput({ chain: ChainId.VERGE, time: 1_600_000_000 }),
        );

        expect(result.success).toBe(true);
        if (!result.success) return;

        expect(result.payload).toBeInstanceOf(VergeTransaction);
        if (!(result.payload instanceof VergeTransaction)) return;

        expect(result.payload.time).toBe(1_600_000_000);
        expect(result.payload.version).toBe(1);
    });

    it('should sign a groestlcoin transaction', () => {
        const input = createSigningInput({ chain: ChainId.GROESTLCOIN });
        const signer = TransactionSignerFactory.groestlcoin();
        const result = signer.sign(input);

        expect(result.success).toBe(true);
        if (!result.success) return;

        expect(result.payload).toBeInstanceOf(GroestlcoinTransaction);
        expect(verifyFirstInput(result.payload, input.utxos[0].script, input.utxos[0].amount)).toBe(true);
    });

    it('should sign with the key of the spent output', () => {
        const result = TransactionSignerFactory.verge().preImageHashes(
            createSigningInput({ chain: ChainId.VERGE }),
        );

        expect(result.success).toBe(true);
        if (!result.success) return;

        expect(result.payload[0].publicKey.equals(EcKeyPair.fromPrivateKey(PRIVATE_KEY_A).publicKey)).toBe(
            true,
        );
    });

    describe('zen', () => {
        const preBlockHash = Buffer.alloc(32, 0x11);
        const replaySuffix = '20' + '11'.repeat(32) + '02e803' + 'b4';

        it('should replay-protect payment and change outputs', () => {
            const input = createSigningInput({
                chain: ChainId.ZEN,
                preBlockHash,
                preBlockHeight: 1_000,
            });
            const result = TransactionSignerFactory.sign(input);

            expect(result.success).toBe(true);
            if (!result.success) return;

            const tx = result.payload;
            expect(tx).toBeInstanceOf(ZenTransaction);
            expect(tx.version).toBe(1);
            expect(tx.outputs.map((output) => output.value)).toEqual([10_000n, 89_774n]);
            expect(tx.outputs[0].script.toString('hex')).toBe(
                p2pkhScript(PRIVATE_KEY_C).toString('hex') + replaySuffix,
            );
            expect(tx.outputs[1].script.toString('hex')).toBe(
                p2pkhScript(PRIVATE_KEY_A).toString('hex') + replaySuffix,
            );
            expect(verifyFirstInput(tx, input.utxos[0].script, input.utxos[0].amount)).toBe(true);
        });

        it('should spend a replay-protected output', () => {
            const protectedScript = ScriptUtils.buildReplayProtected(
                p2pkhScript(PRIVATE_KEY_A),
                preBlockHash,
                1_000,
            );
            const input = createSigningInput({
                chain: ChainId.ZEN,
                preBlockHash,
                preBlockHeight: 1_000,
                utxos: [createUtxo(1, 0, 100_000n, protectedScript)],
            });
            const result = TransactionSignerFactory.zen().sign(input);

            expect(result.success).toBe(true);
            if (!result.success) return;

            expect(verifyFirstInput(result.payload, protectedScript, 100_000n)).toBe(true);
        });

        it('should require the block to commit to', () => {
            expect(TransactionSignerFactory.zen().sign(createSigningInput({ chain: ChainId.ZEN }))).toEqual({
                success: false,
                error: SigningError.INPUT_PARSE,
                message: 'Zen outputs need a 32-byte block hash and its height',
            });
        });

        it('should refuse witness spends', () => {
            const result = TransactionSignerFactory.zen().sign(
                createSigningInput({
                    chain: ChainId.ZEN,
                    preBlockHash,
                    preBlockHeight: 1_000,
                    utxos: [createUtxo(1, 0, 100_000n, p2wpkhScript(PRIVATE_KEY_A))],
                }),
            );

            expect(result).toMatchObject({
                success: false,
                error: SigningError.SCRIPT_WITNESS_PROGRAM,
            });
        });
    });

    describe('bitcoin diamond', () => {
        const preBlockHash = Buffer.alloc(32, 0x22);

        it('should sign a version 12 transaction over the previous block hash', () => {
            const input = createSigningInput({ chain: ChainId.BITCOIN_DIAMOND, preBlockHash });
            const result = TransactionSignerFactory.sign(input);

            expect(result.success).toBe(true);
            if (!result.success) return;

            const tx = result.payload;
            expect(tx).toBeInstanceOf(BitcoinDiamondTransaction);
            expect(tx.toHex().startsWith('0c000000' + '22'.repeat(32) + '01')).toBe(true);
            expect(verifyFirstInput(tx, input.utxos[0].script, input.utxos[0].amount)).toBe(true);
        });

        it('should produce signatures bound to the previous block hash', () => {
            const input = createSigningInput({ chain: ChainId.BITCOIN_DIAMOND, preBlockHash });
            const result = TransactionSignerFactory.bitcoinDiamond().sign(input);

            expect(result.success).toBe(true);
            if (!result.success) return;

            result.payload.preBlockHash = Buffer.alloc(32, 0x33);

            expect(verifyFirstInput(result.payload, input.utxos[0].script, input.utxos[0].amount)).toBe(
                false,
            );
        });

        it('should require the previous block hash', () => {
            expect(
                TransactionSignerFactory.bitcoinDiamond().sign(
                    createSigningInput({ chain: ChainId.BITCOIN_DIAMOND }),
                ),
            ).toEqual({
                success: false,
                error: SigningError.INPUT_PARSE,
                message: 'Bitcoin Diamond transactions need a 32-byte previous block hash',
            });
        });
    });
});
