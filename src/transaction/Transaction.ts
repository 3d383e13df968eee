import { SignatureVersion } from './enums/SignatureVersion.js';
import { TransactionInput } from './TransactionInput.js';
import { TransactionOutput } from './TransactionOutput.js';
import { BufferHelper } from '../utils/BufferHelper.js';

/**
 * Parameters of a single signature hash computation.
 */
export interface SignatureHashParameters {
    /** Index of the input being signed */
    readonly index: number;
    /** Script committed to by the signature (scriptCode) */
    readonly scriptCode: Buffer;
    /** Value of the output being spent */
    readonly amount: bigint;
    readonly hashType: number;
    readonly version: SignatureVersion;
}

/**
 * @description Native transaction shared by every supported chain.
 *
 * Chains may add header fields and change hashing, but the input/output shape stays the same
 * so that planning, signing and reconstruction work on any of them.
 * @abstract
 * @class Transaction
 */
export abstract class Transaction {
    public readonly inputs: TransactionInput[] = [];
    public readonly outputs: TransactionOutput[] = [];

    protected constructor(
        public version: number,
        public lockTime: number = 0,
    ) {}

    /**
     * @description Whether the chain accepts segregated witness data.
     */
    public abstract get supportsWitness(): boolean;

    /**
     * @description Consensus serialization.
     * @param {boolean} withWitness - include witness data when any input carries some
     */
    public abstract encode(withWitness?: boolean): Buffer;

    public abstract getSignatureHash(parameters: SignatureHashParameters): Buffer;

    /**
     * @description Hash used for the transaction id.
     */
    public abstract hash(): Buffer;

    public getTransactionId(): string {
        return BufferHelper.hashToTransactionId(this.hash());
    }

    public hasWitness(): boolean {
        return this.inputs.some((input) => input.hasWitness());
    }

    public getSize(): number {
        return this.encode(true).byteLength;
    }

    public getWeight(): number {
        const base = this.encode(false).byteLength;
        const total = this.getSize();

        return base * 3 + total;
    }

    public getVirtualSize(): number {
        return Math.ceil(this.getWeight() / 4);
    }

    public toHex(): string {
        return this.encode(true).toString('hex');
    }
}
