import { BinaryWriter } from '../buffer/BinaryWriter.js';
import { OutPoint } from './OutPoint.js';

export class TransactionInput {
    public readonly previousOutput: OutPoint;
    public sequence: number;

    /**
     * @description Claiming script (scriptSig). Empty for witness spends.
     */
    public script: Buffer;

    /**
     * @description Witness stack. Empty for legacy spends.
     */
    public scriptWitness: Buffer[];

    constructor(
        previousOutput: OutPoint,
        script: Buffer = Buffer.alloc(0),
        sequence: number = previousOutput.sequence,
        scriptWitness: Buffer[] = [],
    ) {
        this.previousOutput = previousOutput;
        this.script = script;
        this.sequence = sequence;
        this.scriptWitness = scriptWitness;
    }

    public hasWitness(): boolean {
        return this.scriptWitness.length > 0;
    }

    public write(writer: BinaryWriter): void {
        this.previousOutput.write(writer);
        writer.writeVarBytes(this.script);
        writer.writeU32(this.sequence);
    }

    public writeWitness(writer: BinaryWriter): void {
        writer.writeVector(this.scriptWitness);
    }
}
