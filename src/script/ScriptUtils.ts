import * as ecc from '@bitcoinerlab/secp256k1';
import { initEccLib, opcodes, payments, script } from 'bitcoinjs-lib';
import {
    isP2MS,
    isP2PK,
    isP2PKH,
    isP2SHScript,
    isP2TR,
    isP2WPKH,
    isP2WSHScript,
} from 'bitcoinjs-lib/src/psbt/psbtutils.js';

export enum OutputScriptType {
    P2PKH = 'p2pkh',
    P2SH = 'p2sh',
    P2WPKH = 'p2wpkh',
    P2WSH = 'p2wsh',
    P2TR = 'p2tr',
    P2PK = 'p2pk',
    P2MS = 'p2ms',
    UNKNOWN = 'unknown',
}

initEccLib(ecc);

/**
 * Zen replay protection: `<block hash> <block height> OP_CHECKBLOCKATHEIGHT`.
 */
export const OP_CHECKBLOCKATHEIGHT: number = 0xb4;

/**
 * Taproot output committing to a single script leaf.
 */
export interface TaprootScriptOutput {
    /** P2TR locking script */
    readonly output: Buffer;
    /** Leaf script revealed by the spending witness */
    readonly spendingScript: Buffer;
    readonly controlBlock: Buffer;
}

export class ScriptUtils {
    public static readonly TAP_SCRIPT_VERSION: number = 192;
    public static readonly MAX_SCRIPT_ELEMENT_SIZE: number = 520;
    public static readonly BRC20_MIME_TYPE: string = 'text/plain;charset=utf-8';

    private static readonly P2PKH_LENGTH: number = 25;
    private static readonly P2SH_LENGTH: number = 23;

    public static classify(output: Buffer): OutputScriptType {
        if (isP2PKH(output)) return OutputScriptType.P2PKH;
        if (isP2SHScript(output)) return OutputScriptType.P2SH;
        if (isP2WPKH(output)) return OutputScriptType.P2WPKH;
        if (isP2WSHScript(output)) return OutputScriptType.P2WSH;
        if (isP2TR(output)) return OutputScriptType.P2TR;
        if (isP2PK(output)) return OutputScriptType.P2PK;
        if (isP2MS(output)) return OutputScriptType.P2MS;

        return OutputScriptType.UNKNOWN;
    }

    /**
     * @description HASH160 committed to by a P2PKH, P2WPKH or P2SH output.
     * @throws {Error} - For any other script
     */
    public static getCommittedHash(output: Buffer): Buffer {
        switch (ScriptUtils.classify(output)) {
            case OutputScriptType.P2PKH:
                return output.subarray(3, 23);
            case OutputScriptType.P2WPKH:
                return output.subarray(2, 22);
            case OutputScriptType.P2SH:
                return output.subarray(2, 22);
            default:
                throw new Error(`Script does not commit to a HASH160: ${output.toString('hex')}`);
        }
    }

    /**
     * @description Public key of a P2PK output.
     */
    public static getPayToPublicKey(output: Buffer): Buffer {
        const pubkey = payments.p2pk({ output }).pubkey;
        if (!pubkey) {
            throw new Error('Not a P2PK script');
        }

        return pubkey;
    }

    public static buildPayToPublicKeyHash(hash: Buffer): Buffer {
        const output = payments.p2pkh({ hash }).output;
        if (!output) {
            throw new Error('Failed to build P2PKH script');
        }

        return output;
    }

    public static buildPayToWitnessPublicKeyHash(hash: Buffer): Buffer {
        const output = payments.p2wpkh({ hash }).output;
        if (!output) {
            throw new Error('Failed to build P2WPKH script');
        }

        return output;
    }

    public static buildPayToScriptHash(redeemScript: Buffer): Buffer {
        const output = payments.p2sh({ redeem: { output: redeemScript } }).output;
        if (!output) {
            throw new Error('Failed to build P2SH script');
        }

        return output;
    }

    public static buildOpReturn(data: Buffer): Buffer {
        const output = payments.embed({ data: [data] }).output;
        if (!output) {
            throw new Error('Failed to build OP_RETURN script');
        }

        return output;
    }

    /**
     * @description P2PKH or P2SH output followed by the Zen replay protection suffix.
     */
    public static buildReplayProtected(output: Buffer, blockHash: Buffer, blockHeight: number): Buffer {
        const type = ScriptUtils.classify(output);
        if (type !== OutputScriptType.P2PKH && type !== OutputScriptType.P2SH) {
            throw new Error(`Replay protection applies to P2PKH and P2SH outputs only, got ${type}`);
        }

        const height = script.number.encode(blockHeight);

        return Buffer.concat([
            output,
            Buffer.from([blockHash.byteLength]),
            blockHash,
            Buffer.from([height.byteLength]),
            height,
            Buffer.from([OP_CHECKBLOCKATHEIGHT]),
        ]);
    }

    /**
     * @description Base script of a replay-protected output; any other script is returned as is.
     */
    public static stripReplayProtection(output: Buffer): Buffer {
        for (const baseLength of [ScriptUtils.P2PKH_LENGTH, ScriptUtils.P2SH_LENGTH]) {
            const suffix = output.subarray(baseLength);

            // push(32) hash push(n) height OP_CHECKBLOCKATHEIGHT
            if (suffix.byteLength < 35 || suffix[0] !== 32) continue;
            if (suffix.byteLength !== 35 + suffix[33]) continue;
            if (suffix[suffix.byteLength - 1] !== OP_CHECKBLOCKATHEIGHT) continue;

            const base = output.subarray(0, baseLength);
            if (isP2PKH(base) || isP2SHScript(base)) return base;
        }

        return output;
    }

    /**
     * @description BIP86 key-path output for a compressed or x-only public key.
     */
    public static buildPayToTaprootKeyPath(publicKey: Buffer): Buffer {
        const output = payments.p2tr({ internalPubkey: ScriptUtils.toXOnly(publicKey) }).output;
        if (!output) {
            throw new Error('Failed to build P2TR script');
        }

        return output;
    }

    /**
     * @description Ordinals envelope spendable by `publicKey`.
     */
    public static buildInscriptionScript(publicKey: Buffer, mimeType: string, payload: Buffer): Buffer {
        const chunks: Buffer[] = [];
        for (let i = 0; i < payload.byteLength; i += ScriptUtils.MAX_SCRIPT_ELEMENT_SIZE) {
            chunks.push(payload.subarray(i, i + ScriptUtils.MAX_SCRIPT_ELEMENT_SIZE));
        }

        const head = script.compile([
            ScriptUtils.toXOnly(publicKey),
            opcodes.OP_CHECKSIG,
            opcodes.OP_FALSE,
            opcodes.OP_IF,
            Buffer.from('ord', 'utf8'),
        ]);

        // Content type tag, pushed as one data byte and not as OP_1.
        const contentTypeTag = Buffer.from([0x01, 0x01]);

        const body = script.compile([
            Buffer.from(mimeType, 'utf8'),
            opcodes.OP_0,
            ...chunks,
            opcodes.OP_ENDIF,
        ]);

        return Buffer.concat([head, contentTypeTag, body]);
    }

    public static buildNftInscription(
        publicKey: Buffer,
        mimeType: string,
        payload: Buffer,
    ): TaprootScriptOutput {
        const internalPubkey = ScriptUtils.toXOnly(publicKey);
        const spendingScript = ScriptUtils.buildInscriptionScript(internalPubkey, mimeType, payload);

        const tapData = payments.p2tr({
            internalPubkey,
            scriptTree: { output: spendingScript, version: ScriptUtils.TAP_SCRIPT_VERSION },
            redeem: { output: spendingScript, redeemVersion: ScriptUtils.TAP_SCRIPT_VERSION },
        });

        const output = tapData.output;
        const witness = tapData.witness;
        if (!output || !witness || witness.length === 0) {
            throw new Error('Failed to build inscription output');
        }

        return { output, spendingScript, controlBlock: witness[witness.length - 1] };
    }

    /**
     * @description BRC-20 transfer inscription of `amount` units of a 4-byte ticker.
     */
    public static buildBrc20TransferInscription(
        publicKey: Buffer,
        ticker: string,
        amount: bigint,
    ): TaprootScriptOutput {
        if (Buffer.byteLength(ticker, 'utf8') !== 4) {
            throw new Error(`BRC-20 ticker must be 4 bytes, got "${ticker}"`);
        }

        const payload = JSON.stringify({
            p: 'brc-20',
            op: 'transfer',
            tick: ticker,
            amt: amount.toString(),
        });

        return ScriptUtils.buildNftInscription(
            publicKey,
            ScriptUtils.BRC20_MIME_TYPE,
            Buffer.from(payload, 'utf8'),
        );
    }

    /**
     * @description Script made of data pushes only (scriptSig).
     */
    public static buildPushOnly(chunks: readonly Buffer[]): Buffer {
        return script.compile([...chunks]);
    }

    private static toXOnly(publicKey: Buffer): Buffer {
        if (publicKey.byteLength === 32 && ecc.isXOnlyPoint(publicKey)) {
            return publicKey;
        }

        if (publicKey.byteLength === 33 && ecc.isPoint(publicKey)) {
            return publicKey.subarray(1, 33);
        }

        throw new Error(`Invalid public key: ${publicKey.toString('hex')}`);
    }
}
