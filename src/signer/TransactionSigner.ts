import { Logger } from '@btc-vision/logger';
import { AlternateSchemeAssembler } from '../alternate/AlternateSchemeAssembler.js';
import { ExternalSigningEngine } from '../alternate/interfaces/IAlternateScheme.js';
import { SigningError } from '../result/SigningError.js';
import { failure, SigningResult, success } from '../result/SigningResult.js';
import { ChainTransactionBuilder } from '../transaction/builders/ChainTransactionBuilder.js';
import { SigningInput } from '../transaction/interfaces/ISigningInput.js';
import { HashPubkeyList, SignaturePubkeyList } from '../transaction/interfaces/ISignatures.js';
import { TransactionPlan } from '../transaction/interfaces/ITransactionPlan.js';
import { Transaction } from '../transaction/Transaction.js';
import { PlanResolver } from './PlanResolver.js';
import { SignatureBuilder, SignatureBuilderFactory } from './SignatureBuilder.js';
import { SigningMode } from './SigningMode.js';

export interface TransactionSignerOptions<T extends Transaction> {
    /** Engine used for inputs flagged with the commit/reveal scheme */
    readonly alternateSchemeEngine?: ExternalSigningEngine;

    /** Replaces the default {@link SignatureBuilder} */
    readonly signatureBuilderFactory?: SignatureBuilderFactory<T>;
}

/**
 * Plans, builds and signs transactions of one chain.
 * @description Stateless between calls: the builder decides the chain, every call owns its
 * plan and transaction.
 * @class TransactionSigner
 */
export class TransactionSigner<
    T extends Transaction,
    B extends ChainTransactionBuilder<T> = ChainTransactionBuilder<T>,
> extends Logger {
    public readonly logColor: string = '#f7931a';

    protected readonly createSignatureBuilder: SignatureBuilderFactory<T>;
    protected readonly alternateScheme: AlternateSchemeAssembler<T> | null;

    constructor(
        public readonly builder: B,
        options: TransactionSignerOptions<T> = {},
    ) {
        super();

        this.createSignatureBuilder = options.signatureBuilderFactory ?? SignatureBuilder.create;
        this.alternateScheme = options.alternateSchemeEngine
            ? new AlternateSchemeAssembler<T>(options.alternateSchemeEngine, builder)
            : null;
    }

    /**
     * @description Estimation wins over external signatures.
     */
    public static selectSigningMode(
        estimationMode: boolean,
        externalSignatures?: SignaturePubkeyList,
    ): SigningMode {
        if (estimationMode) return SigningMode.SIZE_ESTIMATION_ONLY;
        if (externalSignatures) return SigningMode.EXTERNAL;

        return SigningMode.NORMAL;
    }

    public plan(input: SigningInput): TransactionPlan {
        return PlanResolver.resolve(input, this.builder);
    }

    public sign(
        input: SigningInput,
        estimationMode: boolean = false,
        externalSignatures?: SignaturePubkeyList,
    ): SigningResult<T> {
        if (input.isAlternateScheme) {
            return this.signAlternateScheme(input);
        }

        const plan = this.plan(input);
        const unsigned = this.builder.build(plan, input);
        if (!unsigned.success) {
            this.warn(`Could not build ${this.chainName} transaction: ${unsigned.message}`);
            return unsigned;
        }

        const signer = this.createSignatureBuilder({
            input,
            plan,
            transaction: unsigned.payload,
            mode: TransactionSigner.selectSigningMode(estimationMode, externalSignatures),
            externalSignatures,
        });

        return signer.sign();
    }

    public preImageHashes(input: SigningInput): SigningResult<HashPubkeyList> {
        const plan = this.plan(input);
        const unsigned = this.builder.build(plan, input);
        if (!unsigned.success) {
            this.warn(`Could not build ${this.chainName} transaction: ${unsigned.message}`);
            return unsigned;
        }

        const signer = this.createSignatureBuilder({
            input,
            plan,
            transaction: unsigned.payload,
            mode: SigningMode.HASH_ONLY,
        });

        const signed = signer.sign();
        if (!signed.success) {
            return signed;
        }

        return success(signer.getHashesForSigning());
    }

    protected get chainName(): string {
        return this.builder.config.CHAIN_NAME;
    }

    private signAlternateScheme(input: SigningInput): SigningResult<T> {
        if (!this.alternateScheme) {
            this.error(`No alternate scheme engine configured for ${this.chainName}.`);

            return failure(
                SigningError.NOT_SUPPORTED,
                'Alternate scheme signing requires an external signing engine',
            );
        }

        return this.alternateScheme.assemble(input);
    }
}
