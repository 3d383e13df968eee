import { crypto } from 'bitcoinjs-lib';
import { BinaryWriter } from '../../buffer/BinaryWriter.js';
import { SIGHASH_BASE_MASK, SighashType } from '../enums/SighashType.js';
import { SignatureVersion } from '../enums/SignatureVersion.js';
import { SignatureHashParameters, Transaction } from '../Transaction.js';
import { TransactionOutput } from '../TransactionOutput.js';

const ZERO_HASH: Buffer = Buffer.alloc(32);

/**
 * Returned by legacy SIGHASH_SINGLE when the input has no matching output.
 */
const ONE_HASH: Buffer = Buffer.from(
    '0100000000000000000000000000000000000000000000000000000000000000',
    'hex',
);

const BLANK_OUTPUT: TransactionOutput = new TransactionOutput(
    18446744073709551615n,
    Buffer.alloc(0),
);

/**
 * @description Bitcoin serialization (BIP144 when witnesses are present) with the legacy and
 * BIP143 signature hashes. Chains sharing this layout override the hash function or the header.
 * @class BitcoinTransaction
 */
export class BitcoinTransaction extends Transaction {
    public static readonly DEFAULT_VERSION: number = 1;

    constructor(version: number = BitcoinTransaction.DEFAULT_VERSION, lockTime: number = 0) {
        super(version, lockTime);
    }

    public get supportsWitness(): boolean {
        return true;
    }

    public encode(withWitness: boolean = true): Buffer {
        const writer = new BinaryWriter();
        const segwit = withWitness && this.hasWitness();

        writer.writeI32(this.version);
        this.writeHeader(writer);

        if (segwit) {
            writer.writeU8(0x00);
            writer.writeU8(0x01);
        }

        writer.writeVarInt(this.inputs.length);
        for (const input of this.inputs) {
            input.write(writer);
        }

        writer.writeVarInt(this.outputs.length);
        for (const output of this.outputs) {
            output.write(writer);
        }

        if (segwit) {
            for (const input of this.inputs) {
                input.writeWitness(writer);
            }
        }

        writer.writeU32(this.lockTime);

        return writer.getBuffer();
    }

    public hash(): Buffer {
        return this.hashData(this.encode(false));
    }

    public getSignatureHash(parameters: SignatureHashParameters): Buffer {
        if (parameters.index < 0 || parameters.index >= this.inputs.length) {
            throw new Error(`Input index ${parameters.index} out of range`);
        }

        if (parameters.version === SignatureVersion.WITNESS_V0) {
            return this.getWitnessV0SignatureHash(parameters);
        }

        return this.getLegacySignatureHash(parameters);
    }

    /**
     * @description Fields written right after the version. Empty for Bitcoin.
     * @protected
     */
    protected writeHeader(_writer: BinaryWriter): void {}

    /**
     * @description Fields following the version in the BIP143 preimage. Empty for Bitcoin.
     * @protected
     */
    protected writeWitnessV0Header(_writer: BinaryWriter): void {}

    protected hashData(data: Buffer): Buffer {
        return crypto.hash256(data);
    }

    protected getLegacySignatureHash({
        index,
        scriptCode,
        hashType,
    }: SignatureHashParameters): Buffer {
        const baseType = hashType & SIGHASH_BASE_MASK;
        const anyoneCanPay = (hashType & SighashType.ANYONECANPAY) !== 0;

        if (baseType === SighashType.SINGLE && index >= this.outputs.length) {
            return Buffer.from(ONE_HASH);
        }

        const writer = new BinaryWriter();
        writer.writeI32(this.version);
        this.writeHeader(writer);

        const inputIndices = anyoneCanPay ? [index] : this.inputs.map((_input, i) => i);
        writer.writeVarInt(inputIndices.length);

        for (const i of inputIndices) {
            const input = this.inputs[i];
            const zeroSequence =
                i !== index &&
                (baseType === SighashType.NONE || baseType === SighashType.SINGLE);

            input.previousOutput.write(writer);
            writer.writeVarBytes(i === index ? scriptCode : Buffer.alloc(0));
            writer.writeU32(zeroSequence ? 0 : input.sequence);
        }

        let outputs: TransactionOutput[];
        if (baseType === SighashType.NONE) {
            outputs = [];
        } else if (baseType === SighashType.SINGLE) {
            outputs = this.outputs
                .slice(0, index + 1)
                .map((output, i) => (i === index ? output : BLANK_OUTPUT));
        } else {
            outputs = this.outputs;
        }

        writer.writeVarInt(outputs.length);
        for (const output of outputs) {
            output.write(writer);
        }

        writer.writeU32(this.lockTime);
        writer.writeU32(hashType >>> 0);

        return this.hashData(writer.getBuffer());
    }

    protected getWitnessV0SignatureHash({
        index,
        scriptCode,
        amount,
        hashType,
    }: SignatureHashParameters): Buffer {
        const baseType = hashType & SIGHASH_BASE_MASK;
        const anyoneCanPay = (hashType & SighashType.ANYONECANPAY) !== 0;
        const singleOrNone = baseType === SighashType.SINGLE || baseType === SighashType.NONE;

        let hashPrevouts = ZERO_HASH;
        if (!anyoneCanPay) {
            const writer = new BinaryWriter();
            for (const input of this.inputs) {
                input.previousOutput.write(writer);
            }

            hashPrevouts = this.hashData(writer.getBuffer());
        }

        let hashSequence = ZERO_HASH;
        if (!anyoneCanPay && !singleOrNone) {
            const writer = new BinaryWriter();
            for (const input of this.inputs) {
                writer.writeU32(input.sequence);
            }

            hashSequence = this.hashData(writer.getBuffer());
        }

        let hashOutputs = ZERO_HASH;
        if (!singleOrNone) {
            const writer = new BinaryWriter();
            for (const output of this.outputs) {
                output.write(writer);
            }

            hashOutputs = this.hashData(writer.getBuffer());
        } else if (baseType === SighashType.SINGLE && index < this.outputs.length) {
            const writer = new BinaryWriter();
            this.outputs[index].write(writer);

            hashOutputs = this.hashData(writer.getBuffer());
        }

        const input = this.inputs[index];
        const writer = new BinaryWriter();
        writer.writeI32(this.version);
        this.writeWitnessV0Header(writer);
        writer.writeBytes(hashPrevouts);
        writer.writeBytes(hashSequence);
        input.previousOutput.write(writer);
        writer.writeVarBytes(scriptCode);
        writer.writeU64(amount);
        writer.writeU32(input.sequence);
        writer.writeBytes(hashOutputs);
        writer.writeU32(this.lockTime);
        writer.writeU32(hashType >>> 0);

        return this.hashData(writer.getBuffer());
    }
}
