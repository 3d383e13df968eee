import { BinaryWriter } from '../buffer/BinaryWriter.js';
import { BufferHelper } from '../utils/BufferHelper.js';
import { HASH_BYTE_LENGTH } from '../utils/lengths.js';
import { TransactionSequence } from './enums/TransactionSequence.js';

/**
 * Reference to the previous output being spent.
 */
export class OutPoint {
    /**
     * @description Previous transaction hash, in internal (non-reversed) byte order.
     */
    public readonly hash: Buffer;

    public readonly index: number;

    public readonly sequence: number;

    constructor(hash: Uint8Array, index: number, sequence: number = TransactionSequence.FINAL) {
        if (hash.byteLength !== HASH_BYTE_LENGTH) {
            throw new Error(`Outpoint hash must be ${HASH_BYTE_LENGTH} bytes, got ${hash.byteLength}`);
        }

        this.hash = Buffer.from(hash);
        this.index = index;
        this.sequence = sequence;
    }

    public static fromTransactionId(
        transactionId: string,
        index: number,
        sequence: number = TransactionSequence.FINAL,
    ): OutPoint {
        return new OutPoint(BufferHelper.transactionIdToHash(transactionId), index, sequence);
    }

    public get transactionId(): string {
        return BufferHelper.hashToTransactionId(this.hash);
    }

    public equals(other: OutPoint): boolean {
        return this.index === other.index && BufferHelper.equals(this.hash, other.hash);
    }

    public write(writer: BinaryWriter): void {
        writer.writeBytes(this.hash);
        writer.writeU32(this.index);
    }
}
