import { ChainId } from '../../chains/ChainId.js';
import { ScriptVariant } from '../enums/ScriptVariant.js';
import { TransactionPlan } from './ITransactionPlan.js';

/**
 * Previous-output reference of a UTXO.
 */
export interface UnspentOutPoint {
    /** Transaction id, display (byte-reversed) hex */
    readonly transactionId: string;
    /** Output index (vout) */
    readonly index: number;
    /** Sequence number the spending input will carry */
    readonly sequence: number;
}

export interface UnspentOutput {
    readonly outPoint: UnspentOutPoint;
    /** Locking script of the output being spent */
    readonly script: Buffer;
    readonly amount: bigint;
    /** How the UTXO is claimed; drives scriptSig vs witness on the alternate scheme */
    readonly variant: ScriptVariant;
}

export interface OutputSpecification {
    readonly value: bigint;
    readonly script: Buffer;
}

/**
 * Everything needed to plan, build and sign one transaction.
 * Never mutated by the signer.
 */
export interface SigningInput {
    readonly chain: ChainId;

    /** Sighash type applied to every signature */
    readonly hashType: number;

    /** Amount to send, ignored with {@link useMaxAmount} */
    readonly amount: bigint;

    /** Fee per byte (or vbyte) */
    readonly byteFee: bigint;

    /** Locking script of the payment output */
    readonly toScript: Buffer;

    /** Locking script receiving change */
    readonly changeScript: Buffer;

    readonly privateKeys: readonly Buffer[];

    /** Public keys usable when only hashes or external signatures are produced */
    readonly publicKeys?: readonly Buffer[];

    /** Redeem scripts keyed by the HASH160 (hex) they hash to */
    readonly scripts?: ReadonlyMap<string, Buffer>;

    readonly utxos: readonly UnspentOutput[];

    /** Spend every UTXO, sending everything minus the fee */
    readonly useMaxAmount: boolean;

    readonly lockTime: number;

    /** Transaction timestamp for chains carrying one */
    readonly time?: number;

    /** Expiry height for chains carrying one */
    readonly expiryHeight?: number;

    /** Recent block hash, in serialization order, for chains committing to one */
    readonly preBlockHash?: Buffer;

    /** Height of {@link preBlockHash} */
    readonly preBlockHeight?: number;

    /** Data for an OP_RETURN output */
    readonly outputOpReturn?: Buffer;

    /** Outputs appended after payment, change and OP_RETURN */
    readonly extraOutputs?: readonly OutputSpecification[];

    /** Pre-negotiated plan, used as-is when present */
    readonly plan?: TransactionPlan;

    /** Build and sign through the commit/reveal engine */
    readonly isAlternateScheme: boolean;
}
