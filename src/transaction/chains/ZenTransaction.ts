import { BitcoinTransaction } from './BitcoinTransaction.js';

/**
 * Bitcoin layout without segregated witness.
 */
export class ZenTransaction extends BitcoinTransaction {
    public override get supportsWitness(): boolean {
        return false;
    }

    public override encode(_withWitness: boolean = false): Buffer {
        return super.encode(false);
    }
}
