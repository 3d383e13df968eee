import { blake2b } from '@noble/hashes/blake2b';
import { crypto } from 'bitcoinjs-lib';
import { BinaryWriter } from '../../buffer/BinaryWriter.js';
import { SIGHASH_BASE_MASK, SighashType } from '../enums/SighashType.js';
import { SignatureHashParameters, Transaction } from '../Transaction.js';

const ZERO_HASH: Buffer = Buffer.alloc(32);

const PREVOUTS_PERSONALIZATION = Buffer.from('ZcashPrevoutHash', 'ascii');
const SEQUENCE_PERSONALIZATION = Buffer.from('ZcashSequencHash', 'ascii');
const OUTPUTS_PERSONALIZATION = Buffer.from('ZcashOutputsHash', 'ascii');
const SIGHASH_PERSONALIZATION_PREFIX = Buffer.from('ZcashSigHash', 'ascii');

const OVERWINTERED_FLAG = 0x80000000;

/**
 * @description Transparent-only Sapling (v4) transaction with the ZIP-243 signature hash.
 * @class ZcashTransaction
 */
export class ZcashTransaction extends Transaction {
    public static readonly SAPLING_VERSION: number = 4;
    public static readonly SAPLING_VERSION_GROUP_ID: number = 0x892f2085;

    /** Sapling consensus branch id, little-endian */
    public static readonly SAPLING_BRANCH_ID: Buffer = Buffer.from([0xbb, 0x09, 0xb8, 0x76]);

    constructor(
        version: number = ZcashTransaction.SAPLING_VERSION,
        lockTime: number = 0,
        public expiryHeight: number = 0,
        public branchId: Buffer = ZcashTransaction.SAPLING_BRANCH_ID,
        public versionGroupId: number = ZcashTransaction.SAPLING_VERSION_GROUP_ID,
    ) {
        super(version, lockTime);
    }

    public get supportsWitness(): boolean {
        return false;
    }

    public get header(): number {
        return (this.version | OVERWINTERED_FLAG) >>> 0;
    }

    public encode(_withWitness: boolean = true): Buffer {
        const writer = new BinaryWriter();
        writer.writeU32(this.header);
        writer.writeU32(this.versionGroupId);

        writer.writeVarInt(this.inputs.length);
        for (const input of this.inputs) {
            input.write(writer);
        }

        writer.writeVarInt(this.outputs.length);
        for (const output of this.outputs) {
            output.write(writer);
        }

        writer.writeU32(this.lockTime);
        writer.writeU32(this.expiryHeight);

        // valueBalance, then empty spend, output and joinsplit vectors
        writer.writeI64(0n);
        writer.writeVarInt(0);
        writer.writeVarInt(0);
        writer.writeVarInt(0);

        return writer.getBuffer();
    }

    public hash(): Buffer {
        return crypto.hash256(this.encode(false));
    }

    public getSignatureHash({
        index,
        scriptCode,
        amount,
        hashType,
    }: SignatureHashParameters): Buffer {
        if (index < 0 || index >= this.inputs.length) {
            throw new Error(`Input index ${index} out of range`);
        }

        const baseType = hashType & SIGHASH_BASE_MASK;
        const anyoneCanPay = (hashType & SighashType.ANYONECANPAY) !== 0;
        const singleOrNone = baseType === SighashType.SINGLE || baseType === SighashType.NONE;

        let hashPrevouts = ZERO_HASH;
        if (!anyoneCanPay) {
            const writer = new BinaryWriter();
            for (const input of this.inputs) {
                input.previousOutput.write(writer);
            }

            hashPrevouts = this.personalizedHash(writer.getBuffer(), PREVOUTS_PERSONALIZATION);
        }

        let hashSequence = ZERO_HASH;
        if (!anyoneCanPay && !singleOrNone) {
            const writer = new BinaryWriter();
            for (const input of this.inputs) {
                writer.writeU32(input.sequence);
            }

            hashSequence = this.personalizedHash(writer.getBuffer(), SEQUENCE_PERSONALIZATION);
        }

        let hashOutputs = ZERO_HASH;
        if (!singleOrNone) {
            const writer = new BinaryWriter();
            for (const output of this.outputs) {
                output.write(writer);
            }

            hashOutputs = this.personalizedHash(writer.getBuffer(), OUTPUTS_PERSONALIZATION);
        } else if (baseType === SighashType.SINGLE && index < this.outputs.length) {
            const writer = new BinaryWriter();
            this.outputs[index].write(writer);

            hashOutputs = this.personalizedHash(writer.getBuffer(), OUTPUTS_PERSONALIZATION);
        }

        const input = this.inputs[index];
        const writer = new BinaryWriter();
        writer.writeU32(this.header);
        writer.writeU32(this.versionGroupId);
        writer.writeBytes(hashPrevouts);
        writer.writeBytes(hashSequence);
        writer.writeBytes(hashOutputs);
        writer.writeBytes(ZERO_HASH); // joinsplits
        writer.writeBytes(ZERO_HASH); // shielded spends
        writer.writeBytes(ZERO_HASH); // shielded outputs
        writer.writeU32(this.lockTime);
        writer.writeU32(this.expiryHeight);
        writer.writeI64(0n);
        writer.writeU32(hashType >>> 0);

        input.previousOutput.write(writer);
        writer.writeVarBytes(scriptCode);
        writer.writeU64(amount);
        writer.writeU32(input.sequence);

        const personalization = Buffer.concat([SIGHASH_PERSONALIZATION_PREFIX, this.branchId]);

        return this.personalizedHash(writer.getBuffer(), personalization);
    }

    private personalizedHash(data: Buffer, personalization: Buffer): Buffer {
        return Buffer.from(blake2b(data, { dkLen: 32, personalization }));
    }
}
