import { SigningError } from '../../result/SigningError.js';
import { ScriptVariant } from '../../transaction/enums/ScriptVariant.js';

/**
 * Previous-output reference as exchanged with the engine.
 * The hash is hex text in internal (non-reversed) byte order.
 */
export interface AlternateSchemePreviousOutput {
    readonly hash: string;
    readonly index: number;
    readonly sequence: number;
}

export interface AlternateSchemeUtxo {
    readonly previousOutput: AlternateSchemePreviousOutput;
    readonly amount: bigint;
    readonly script: Buffer;
    /** Tag travelling with the UTXO; decides scriptSig vs witness on the way back */
    readonly variant: ScriptVariant;
}

export interface AlternateSchemeRequest {
    readonly hashType: number;
    readonly amount: bigint;
    readonly byteFee: bigint;
    readonly toScript: Buffer;
    readonly changeScript: Buffer;
    readonly lockTime: number;
    readonly useMaxAmount: boolean;
    readonly outputOpReturn: Buffer;
    readonly privateKeys: readonly Buffer[];
    readonly utxos: readonly AlternateSchemeUtxo[];
}

export interface AlternateSchemeInput {
    readonly previousOutput: AlternateSchemePreviousOutput;
    /** Claiming data; scriptSig or single witness item depending on the UTXO variant */
    readonly script: Buffer;
    readonly sequence: number;
}

export interface AlternateSchemeOutput {
    readonly value: bigint;
    readonly script: Buffer;
}

export interface AlternateSchemeTransaction {
    readonly version: number;
    readonly locktime: number;
    readonly inputs: readonly AlternateSchemeInput[];
    readonly outputs: readonly AlternateSchemeOutput[];
}

export interface AlternateSchemeResponse {
    /** {@link SigningError.OK} when the transaction is present */
    readonly error: SigningError;
    readonly errorMessage: string;
    readonly transaction?: AlternateSchemeTransaction;
}

/**
 * Engine building and signing commit/reveal transactions.
 * Takes an encoded {@link AlternateSchemeRequest}, returns an encoded {@link AlternateSchemeResponse}.
 */
export interface ExternalSigningEngine {
    buildAndSign(request: Uint8Array): Uint8Array;
}
