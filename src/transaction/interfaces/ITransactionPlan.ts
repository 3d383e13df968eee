import { SigningError } from '../../result/SigningError.js';
import { UnspentOutput } from './ISigningInput.js';

export interface TransactionPlan {
    /** Amount sent to the payment output */
    readonly amount: bigint;
    /** Sum of every UTXO offered */
    readonly availableAmount: bigint;
    readonly fee: bigint;
    readonly change: bigint;
    /** Selected UTXOs, in input order */
    readonly utxos: readonly UnspentOutput[];
    /** Consensus branch id, for chains that sign over one */
    readonly branchId: Buffer;
    readonly outputOpReturn: Buffer;
    /** Block the transaction commits to (Zen replay protection, Bitcoin Diamond header) */
    readonly preBlockHash?: Buffer;
    readonly preBlockHeight?: number;
    /** Set when planning failed; building refuses such a plan */
    readonly error?: Exclude<SigningError, SigningError.OK>;
}
