import { crypto } from 'bitcoinjs-lib';
import { BitcoinTransaction } from './BitcoinTransaction.js';

/**
 * Bitcoin layout; transaction ids and signature hashes use a single SHA-256.
 */
export class GroestlcoinTransaction extends BitcoinTransaction {
    protected override hashData(data: Buffer): Buffer {
        return crypto.sha256(data);
    }
}
