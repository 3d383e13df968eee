import { Logger } from '@btc-vision/logger';
import { script } from 'bitcoinjs-lib';
import { EcKeyPair } from '../keypair/EcKeyPair.js';
import { KeyRing } from '../keypair/KeyRing.js';
import { SigningError } from '../result/SigningError.js';
import { failure, SigningResult, success } from '../result/SigningResult.js';
import { OutputScriptType, ScriptUtils } from '../script/ScriptUtils.js';
import { SignatureVersion } from '../transaction/enums/SignatureVersion.js';
import { SigningInput, UnspentOutput } from '../transaction/interfaces/ISigningInput.js';
import { HashPubkey, HashPubkeyList, SignaturePubkeyList } from '../transaction/interfaces/ISignatures.js';
import { TransactionPlan } from '../transaction/interfaces/ITransactionPlan.js';
import { Transaction } from '../transaction/Transaction.js';
import { BufferHelper } from '../utils/BufferHelper.js';
import { errorMessage } from '../utils/errors.js';
import { SigningMode } from './SigningMode.js';

export interface SignatureBuilderParameters<T extends Transaction> {
    readonly input: SigningInput;
    readonly plan: TransactionPlan;
    readonly transaction: T;
    readonly mode: SigningMode;
    readonly externalSignatures?: SignaturePubkeyList;
}

export interface ISignatureBuilder<T extends Transaction> {
    sign(): SigningResult<T>;

    /**
     * @description (hash, public key) pairs recorded by the last {@link sign} in hash-only mode.
     */
    getHashesForSigning(): HashPubkeyList;
}

export type SignatureBuilderFactory<T extends Transaction> = (
    parameters: SignatureBuilderParameters<T>,
) => ISignatureBuilder<T>;

interface ClaimingData {
    readonly script: Buffer;
    readonly witness: Buffer[];
}

interface SignatureRequest {
    readonly index: number;
    readonly scriptCode: Buffer;
    readonly amount: bigint;
    readonly version: SignatureVersion;
    readonly publicKey: Buffer;
}

/**
 * @description Fills the scriptSig or witness of every input of an unsigned transaction.
 * @class SignatureBuilder
 */
export class SignatureBuilder<T extends Transaction>
    extends Logger
    implements ISignatureBuilder<T>
{
    public static readonly PLACEHOLDER_SIGNATURE_LENGTH: number = 72;
    public static readonly PLACEHOLDER_PUBLIC_KEY_LENGTH: number = 33;

    public readonly logColor: string = '#e0a526';

    protected readonly input: SigningInput;
    protected readonly plan: TransactionPlan;
    protected readonly transaction: T;
    protected readonly mode: SigningMode;
    protected readonly externalSignatures: SignaturePubkeyList;

    private readonly hashesForSigning: HashPubkey[] = [];
    private externalSignatureIndex: number = 0;

    constructor(parameters: SignatureBuilderParameters<T>) {
        super();

        this.input = parameters.input;
        this.plan = parameters.plan;
        this.transaction = parameters.transaction;
        this.mode = parameters.mode;
        this.externalSignatures = parameters.externalSignatures ?? [];
    }

    public static create<T extends Transaction>(
        parameters: SignatureBuilderParameters<T>,
    ): ISignatureBuilder<T> {
        return new SignatureBuilder<T>(parameters);
    }

    public getHashesForSigning(): HashPubkeyList {
        return [...this.hashesForSigning];
    }

    public sign(): SigningResult<T> {
        this.hashesForSigning.length = 0;
        this.externalSignatureIndex = 0;

        const keys = KeyRing.fromKeys(this.input.privateKeys, this.input.publicKeys);
        if (!keys.success) {
            this.error(keys.message);
            return keys;
        }

        for (const [index, txInput] of this.transaction.inputs.entries()) {
            const utxo = this.findUtxo(index);
            if (!utxo) {
                this.error(`No UTXO in the plan for input ${index}.`);
                return failure(SigningError.INVALID_UTXO, `No UTXO in the plan for input ${index}`);
            }

            const claim = this.signInput(index, utxo, keys.payload);
            if (!claim.success) {
                this.error(`Failed to sign input ${index}: ${claim.message}`);
                return claim;
            }

            if (this.mode !== SigningMode.HASH_ONLY) {
                txInput.script = claim.payload.script;
                txInput.scriptWitness = claim.payload.witness;
            }
        }

        return success(this.transaction);
    }

    private findUtxo(index: number): UnspentOutput | undefined {
        const previousOutput = this.transaction.inputs[index].previousOutput;

        return this.plan.utxos.find(
            (utxo) =>
                utxo.outPoint.index === previousOutput.index &&
                BufferHelper.equals(
                    BufferHelper.transactionIdToHash(utxo.outPoint.transactionId),
                    previousOutput.hash,
                ),
        );
    }

    private signInput(index: number, utxo: UnspentOutput, keys: KeyRing): SigningResult<ClaimingData> {
        // Replay-protected outputs are signed as their base script; the suffix stays in the scriptCode.
        const lockingScript = ScriptUtils.stripReplayProtection(utxo.script);
        const type = ScriptUtils.classify(lockingScript);

        switch (type) {
            case OutputScriptType.P2PKH: {
                const publicKey = this.resolvePublicKey(ScriptUtils.getCommittedHash(lockingScript), keys);
                if (!publicKey.success) return publicKey;

                const signature = this.createSignature(
                    {
                        index,
                        scriptCode: utxo.script,
                        amount: utxo.amount,
                        version: SignatureVersion.BASE,
                        publicKey: publicKey.payload,
                    },
                    keys,
                );
                if (!signature.success) return signature;

                return success({
                    script: ScriptUtils.buildPushOnly([signature.payload, publicKey.payload]),
                    witness: [],
                });
            }
            case OutputScriptType.P2PK: {
                const publicKey = ScriptUtils.getPayToPublicKey(lockingScript);
                const signature = this.createSignature(
                    {
                        index,
                        scriptCode: utxo.script,
                        amount: utxo.amount,
                        version: SignatureVersion.BASE,
                        publicKey,
                    },
                    keys,
                );
                if (!signature.success) return signature;

                return success({
                    script: ScriptUtils.buildPushOnly([signature.payload]),
                    witness: [],
                });
            }
            case OutputScriptType.P2WPKH: {
                const witness = this.signWitnessPublicKeyHash(index, utxo, lockingScript, keys);
                if (!witness.success) return witness;

                return success({ script: Buffer.alloc(0), witness: witness.payload });
            }
            case OutputScriptType.P2SH: {
                const scriptHash = ScriptUtils.getCommittedHash(lockingScript).toString('hex');
                const redeemScript = this.input.scripts?.get(scriptHash);
                if (!redeemScript) {
                    return failure(SigningError.SCRIPT_REDEEM, `Missing redeem script for ${scriptHash}`);
                }

                if (ScriptUtils.classify(redeemScript) !== OutputScriptType.P2WPKH) {
                    return failure(
                        SigningError.SCRIPT_REDEEM,
                        `Unsupported redeem script ${redeemScript.toString('hex')}`,
                    );
                }

                const witness = this.signWitnessPublicKeyHash(index, utxo, redeemScript, keys);
                if (!witness.success) return witness;

                return success({
                    script: ScriptUtils.buildPushOnly([redeemScript]),
                    witness: witness.payload,
                });
            }
            default:
                return failure(
                    SigningError.SCRIPT_OUTPUT,
                    `Unsupported ${type} script for input ${index}`,
                );
        }
    }

    private signWitnessPublicKeyHash(
        index: number,
        utxo: UnspentOutput,
        witnessProgram: Buffer,
        keys: KeyRing,
    ): SigningResult<Buffer[]> {
        if (!this.transaction.supportsWitness) {
            return failure(
                SigningError.SCRIPT_WITNESS_PROGRAM,
                `Witness spend on a chain without witness support (input ${index})`,
            );
        }

        const hash = ScriptUtils.getCommittedHash(witnessProgram);
        const publicKey = this.resolvePublicKey(hash, keys);
        if (!publicKey.success) return publicKey;

        const signature = this.createSignature(
            {
                index,
                scriptCode: ScriptUtils.buildPayToPublicKeyHash(hash),
                amount: utxo.amount,
                version: SignatureVersion.WITNESS_V0,
                publicKey: publicKey.payload,
            },
            keys,
        );
        if (!signature.success) return signature;

        return success([signature.payload, publicKey.payload]);
    }

    private resolvePublicKey(publicKeyHash: Buffer, keys: KeyRing): SigningResult<Buffer> {
        const known = keys.getPublicKey(publicKeyHash);
        if (known) return success(known);

        if (this.mode === SigningMode.SIZE_ESTIMATION_ONLY) {
            return success(Buffer.alloc(SignatureBuilder.PLACEHOLDER_PUBLIC_KEY_LENGTH));
        }

        // External signatures carry their public key.
        if (this.mode === SigningMode.EXTERNAL) {
            const next = this.externalSignatures[this.externalSignatureIndex];
            if (
                next &&
                BufferHelper.equals(EcKeyPair.publicKeyHash(next.publicKey), publicKeyHash)
            ) {
                return success(next.publicKey);
            }
        }

        return failure(
            SigningError.MISSING_PRIVATE_KEY,
            `No key for public key hash ${publicKeyHash.toString('hex')}`,
        );
    }

    private createSignature(request: SignatureRequest, keys: KeyRing): SigningResult<Buffer> {
        const mode = this.mode;
        if (mode === SigningMode.SIZE_ESTIMATION_ONLY) {
            return success(Buffer.alloc(SignatureBuilder.PLACEHOLDER_SIGNATURE_LENGTH));
        }

        const sighash = this.transaction.getSignatureHash({
            index: request.index,
            scriptCode: request.scriptCode,
            amount: request.amount,
            hashType: this.input.hashType,
            version: request.version,
        });

        switch (mode) {
            case SigningMode.HASH_ONLY:
                this.hashesForSigning.push({ hash: sighash, publicKey: request.publicKey });
                return success(Buffer.alloc(0));
            case SigningMode.EXTERNAL:
                return this.takeExternalSignature(request, sighash);
            case SigningMode.NORMAL:
                return this.signWithKey(request, sighash, keys);
        }
    }

    private signWithKey(request: SignatureRequest, sighash: Buffer, keys: KeyRing): SigningResult<Buffer> {
        const signer = keys.getSigner(EcKeyPair.publicKeyHash(request.publicKey));
        if (!signer) {
            return failure(
                SigningError.MISSING_PRIVATE_KEY,
                `No private key for public key ${request.publicKey.toString('hex')}`,
            );
        }

        try {
            return success(script.signature.encode(signer.sign(sighash), this.input.hashType));
        } catch (e) {
            return failure(SigningError.SIGNING, errorMessage(e));
        }
    }

    private takeExternalSignature(request: SignatureRequest, sighash: Buffer): SigningResult<Buffer> {
        const external = this.externalSignatures[this.externalSignatureIndex];
        if (!external) {
            return failure(
                SigningError.SIGNING,
                `Missing external signature for input ${request.index}`,
            );
        }

        this.externalSignatureIndex++;

        if (!BufferHelper.equals(external.publicKey, request.publicKey)) {
            return failure(
                SigningError.SIGNING,
                `External signature for input ${request.index} has an unexpected public key`,
            );
        }

        try {
            const decoded = script.signature.decode(
                Buffer.concat([external.signature, Buffer.from([this.input.hashType])]),
            );

            if (!EcKeyPair.verify(sighash, request.publicKey, decoded.signature)) {
                return failure(
                    SigningError.SIGNING,
                    `External signature for input ${request.index} does not verify`,
                );
            }

            return success(script.signature.encode(decoded.signature, this.input.hashType));
        } catch (e) {
            return failure(SigningError.SIGNING, errorMessage(e));
        }
    }
}
