import { Logger } from '@btc-vision/logger';
import { SigningError } from '../result/SigningError.js';
import { failure, SigningResult, success } from '../result/SigningResult.js';
import { ChainTransactionBuilder } from '../transaction/builders/ChainTransactionBuilder.js';
import { isLegacyScriptVariant } from '../transaction/enums/ScriptVariant.js';
import { SigningInput } from '../transaction/interfaces/ISigningInput.js';
import { OutPoint } from '../transaction/OutPoint.js';
import { Transaction } from '../transaction/Transaction.js';
import { TransactionInput } from '../transaction/TransactionInput.js';
import { TransactionOutput } from '../transaction/TransactionOutput.js';
import { BufferHelper } from '../utils/BufferHelper.js';
import { errorMessage } from '../utils/errors.js';
import { AlternateSchemeCodec } from './AlternateSchemeCodec.js';
import {
    AlternateSchemeRequest,
    AlternateSchemeResponse,
    AlternateSchemeTransaction,
    ExternalSigningEngine,
} from './interfaces/IAlternateScheme.js';

/**
 * @description Signs commit/reveal transactions through an external engine and rebuilds the
 * native transaction from its answer.
 *
 * Each response input is matched to the request UTXO at the same position; the UTXO's variant
 * decides whether the returned bytes become the scriptSig or the single witness item.
 * @class AlternateSchemeAssembler
 */
export class AlternateSchemeAssembler<T extends Transaction> extends Logger {
    public readonly logColor: string = '#b45cff';

    constructor(
        protected readonly engine: ExternalSigningEngine,
        protected readonly builder: ChainTransactionBuilder<T>,
    ) {
        super();
    }

    /**
     * @description Request carrying only what the engine needs.
     * @throws {Error} - If a UTXO transaction id is not 32 bytes of hex
     */
    public static createRequest(input: SigningInput): AlternateSchemeRequest {
        return {
            hashType: input.hashType,
            amount: input.amount,
            byteFee: input.byteFee,
            toScript: input.toScript,
            changeScript: input.changeScript,
            lockTime: input.lockTime,
            useMaxAmount: input.useMaxAmount,
            outputOpReturn: input.outputOpReturn ?? Buffer.alloc(0),
            privateKeys: input.privateKeys,
            utxos: input.utxos.map((utxo) => ({
                previousOutput: {
                    hash: BufferHelper.transactionIdToHash(utxo.outPoint.transactionId).toString('hex'),
                    index: utxo.outPoint.index,
                    sequence: utxo.outPoint.sequence,
                },
                amount: utxo.amount,
                script: utxo.script,
                variant: utxo.variant,
            })),
        };
    }

    public assemble(input: SigningInput): SigningResult<T> {
        let request: AlternateSchemeRequest;
        try {
            request = AlternateSchemeAssembler.createRequest(input);
        } catch (e) {
            return failure(SigningError.INVALID_UTXO, errorMessage(e));
        }

        let rawRequest: Uint8Array;
        try {
            rawRequest = AlternateSchemeCodec.encodeRequest(request);
        } catch (e) {
            this.error(`Could not encode alternate scheme request: ${errorMessage(e)}`);
            return failure(SigningError.INPUT_PARSE, errorMessage(e));
        }

        let rawResponse: Uint8Array;
        try {
            rawResponse = this.engine.buildAndSign(rawRequest);
        } catch (e) {
            this.error(`Alternate scheme engine failed: ${errorMessage(e)}`);
            return failure(SigningError.SIGNING, errorMessage(e));
        }

        let response: AlternateSchemeResponse;
        try {
            response = AlternateSchemeCodec.decodeResponse(rawResponse);
        } catch (e) {
            this.error(`Malformed alternate scheme response: ${errorMessage(e)}`);
            return failure(SigningError.INPUT_PARSE, errorMessage(e));
        }

        if (response.error !== SigningError.OK) {
            this.warn(`Alternate scheme engine rejected the request: ${response.errorMessage}`);
            return failure(response.error, response.errorMessage);
        }

        if (!response.transaction) {
            return failure(SigningError.INPUT_PARSE, 'Response carries no transaction');
        }

        return this.reconstruct(input, request, response.transaction);
    }

    /**
     * @description Native transaction from the engine's transaction.
     */
    public reconstruct(
        input: SigningInput,
        request: AlternateSchemeRequest,
        engineTransaction: AlternateSchemeTransaction,
    ): SigningResult<T> {
        if (engineTransaction.inputs.length !== request.utxos.length) {
            return failure(
                SigningError.INPUT_PARSE,
                `Engine returned ${engineTransaction.inputs.length} inputs for ${request.utxos.length} UTXOs`,
            );
        }

        if (engineTransaction.outputs.length === 0) {
            return failure(SigningError.INPUT_PARSE, 'Engine returned no outputs');
        }

        const transaction = this.builder.createTransaction(input);
        transaction.version = engineTransaction.version;
        transaction.lockTime = engineTransaction.locktime;

        for (const [index, engineInput] of engineTransaction.inputs.entries()) {
            const utxo = request.utxos[index];
            const previousOutput = engineInput.previousOutput;

            let hash: Buffer;
            try {
                hash = BufferHelper.hexToHash(previousOutput.hash);
            } catch (e) {
                return failure(SigningError.INPUT_PARSE, `Input ${index}: ${errorMessage(e)}`);
            }

            if (
                hash.toString('hex') !== utxo.previousOutput.hash.toLowerCase() ||
                previousOutput.index !== utxo.previousOutput.index
            ) {
                return failure(
                    SigningError.INPUT_PARSE,
                    `Input ${index} spends ${previousOutput.hash}:${previousOutput.index}, expected ${utxo.previousOutput.hash}:${utxo.previousOutput.index}`,
                );
            }

            const outPoint = new OutPoint(hash, previousOutput.index, previousOutput.sequence);
            const claimingData = Buffer.from(engineInput.script);
            if (claimingData.byteLength === 0) {
                return failure(SigningError.INPUT_PARSE, `Input ${index} carries no claiming data`);
            }

            if (isLegacyScriptVariant(utxo.variant)) {
                transaction.inputs.push(
                    new TransactionInput(outPoint, claimingData, engineInput.sequence),
                );
            } else if (!transaction.supportsWitness) {
                return failure(
                    SigningError.SCRIPT_WITNESS_PROGRAM,
                    `Witness claim on a chain without witness support (input ${index})`,
                );
            } else {
                transaction.inputs.push(
                    new TransactionInput(outPoint, Buffer.alloc(0), engineInput.sequence, [
                        claimingData,
                    ]),
                );
            }
        }

        for (const output of engineTransaction.outputs) {
            transaction.outputs.push(new TransactionOutput(output.value, Buffer.from(output.script)));
        }

        this.log(
            `Reconstructed alternate scheme transaction with ${transaction.inputs.length} inputs and ${transaction.outputs.length} outputs.`,
        );

        return success(transaction);
    }
}
