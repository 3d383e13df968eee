import { BinaryWriter } from '../../buffer/BinaryWriter.js';
import { HASH_BYTE_LENGTH } from '../../utils/lengths.js';
import { BitcoinTransaction } from './BitcoinTransaction.js';

/**
 * @description Bitcoin layout where version {@link PREBLOCK_VERSION} transactions commit to a
 * recent block hash. The hash follows the version in the serialization and in both signature
 * hash preimages.
 * @class BitcoinDiamondTransaction
 */
export class BitcoinDiamondTransaction extends BitcoinTransaction {
    public static readonly PREBLOCK_VERSION: number = 12;

    constructor(
        version: number = BitcoinDiamondTransaction.PREBLOCK_VERSION,
        lockTime: number = 0,
        public preBlockHash: Buffer = Buffer.alloc(HASH_BYTE_LENGTH),
    ) {
        super(version, lockTime);
    }

    protected override writeHeader(writer: BinaryWriter): void {
        if (this.version === BitcoinDiamondTransaction.PREBLOCK_VERSION) {
            writer.writeBytes(this.preBlockHash);
        }
    }

    protected override writeWitnessV0Header(writer: BinaryWriter): void {
        this.writeHeader(writer);
    }
}
