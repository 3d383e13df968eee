import { BinaryWriter } from '../../buffer/BinaryWriter.js';
import { BitcoinTransaction } from './BitcoinTransaction.js';

/**
 * Bitcoin layout with a transaction timestamp following the version.
 */
export class VergeTransaction extends BitcoinTransaction {
    constructor(
        version: number = BitcoinTransaction.DEFAULT_VERSION,
        lockTime: number = 0,
        public time: number = 0,
    ) {
        super(version, lockTime);
    }

    protected override writeHeader(writer: BinaryWriter): void {
        writer.writeU32(this.time);
    }
}
