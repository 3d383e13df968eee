import { BinaryWriter } from '../buffer/BinaryWriter.js';

export class TransactionOutput {
    constructor(
        public readonly value: bigint,
        public readonly script: Buffer,
    ) {}

    public write(writer: BinaryWriter): void {
        writer.writeU64(this.value);
        writer.writeVarBytes(this.script);
    }
}
