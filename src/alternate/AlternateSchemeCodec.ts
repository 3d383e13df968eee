import { BinaryReader } from '../buffer/BinaryReader.js';
import { BinaryWriter } from '../buffer/BinaryWriter.js';
import { isSigningError, SigningError } from '../result/SigningError.js';
import { ScriptVariant } from '../transaction/enums/ScriptVariant.js';
import {
    AlternateSchemeInput,
    AlternateSchemeOutput,
    AlternateSchemePreviousOutput,
    AlternateSchemeRequest,
    AlternateSchemeResponse,
    AlternateSchemeTransaction,
    AlternateSchemeUtxo,
} from './interfaces/IAlternateScheme.js';

/**
 * Format version for compatibility with the engine
 */
export const ALTERNATE_SCHEME_FORMAT_VERSION = 1;

export const ALTERNATE_SCHEME_REQUEST_MAGIC = 0x51; // 'Q'
export const ALTERNATE_SCHEME_RESPONSE_MAGIC = 0x52; // 'R'

const MAX_SCRIPT_LENGTH = 10_000;
const MAX_PRIVATE_KEY_LENGTH = 32;

/**
 * Binary encoding of the messages exchanged with the commit/reveal engine.
 * Integers are little-endian, byte strings carry a u32 length, text a u16 length and
 * lists a u16 count.
 */
export class AlternateSchemeCodec {
    public static encodeRequest(request: AlternateSchemeRequest): Uint8Array {
        const writer = new BinaryWriter();
        this.writeHeader(writer, ALTERNATE_SCHEME_REQUEST_MAGIC);

        writer.writeU32(request.hashType);
        writer.writeU64(request.amount);
        writer.writeU64(request.byteFee);
        writer.writeBytesWithLength(request.toScript);
        writer.writeBytesWithLength(request.changeScript);
        writer.writeU32(request.lockTime);
        writer.writeBoolean(request.useMaxAmount);
        writer.writeBytesWithLength(request.outputOpReturn);

        writer.writeU16(request.privateKeys.length);
        for (const privateKey of request.privateKeys) {
            writer.writeBytesWithLength(privateKey);
        }

        writer.writeU16(request.utxos.length);
        for (const utxo of request.utxos) {
            this.writePreviousOutput(writer, utxo.previousOutput);
            writer.writeU64(utxo.amount);
            writer.writeBytesWithLength(utxo.script);
            writer.writeU8(utxo.variant);
        }

        return writer.getBuffer();
    }

    /**
     * @throws Error if the data is not a well-formed request
     */
    public static decodeRequest(data: Uint8Array): AlternateSchemeRequest {
        const reader = new BinaryReader(data);
        this.readHeader(reader, ALTERNATE_SCHEME_REQUEST_MAGIC);

        const hashType = reader.readU32();
        const amount = reader.readU64();
        const byteFee = reader.readU64();
        const toScript = this.readScript(reader);
        const changeScript = this.readScript(reader);
        const lockTime = reader.readU32();
        const useMaxAmount = reader.readBoolean();
        const outputOpReturn = this.readScript(reader);

        const privateKeys: Buffer[] = [];
        const keyCount = reader.readU16();
        for (let i = 0; i < keyCount; i++) {
            privateKeys.push(Buffer.from(reader.readBytesWithLength(MAX_PRIVATE_KEY_LENGTH)));
        }

        const utxos: AlternateSchemeUtxo[] = [];
        const utxoCount = reader.readU16();
        for (let i = 0; i < utxoCount; i++) {
            const previousOutput = this.readPreviousOutput(reader);
            const utxoAmount = reader.readU64();
            const script = this.readScript(reader);
            const variant = this.readVariant(reader);

            utxos.push({ previousOutput, amount: utxoAmount, script, variant });
        }

        this.verifyFullyRead(reader);

        return {
            hashType,
            amount,
            byteFee,
            toScript,
            changeScript,
            lockTime,
            useMaxAmount,
            outputOpReturn,
            privateKeys,
            utxos,
        };
    }

    public static encodeResponse(response: AlternateSchemeResponse): Uint8Array {
        const writer = new BinaryWriter();
        this.writeHeader(writer, ALTERNATE_SCHEME_RESPONSE_MAGIC);

        writer.writeU8(response.error);
        writer.writeStringWithLength(response.errorMessage);
        writer.writeBoolean(response.transaction !== undefined);

        if (response.transaction) {
            this.writeTransaction(writer, response.transaction);
        }

        return writer.getBuffer();
    }

    /**
     * @throws Error if the data is not a well-formed response
     */
    public static decodeResponse(data: Uint8Array): AlternateSchemeResponse {
        const reader = new BinaryReader(data);
        this.readHeader(reader, ALTERNATE_SCHEME_RESPONSE_MAGIC);

        const error = reader.readU8();
        if (!isSigningError(error)) {
            throw new Error(`Unknown error kind: ${error}`);
        }

        const errorMessage = reader.readStringWithLength();
        const hasTransaction = reader.readBoolean();
        const transaction = hasTransaction ? this.readTransaction(reader) : undefined;

        this.verifyFullyRead(reader);

        if (error === SigningError.OK && !transaction) {
            throw new Error('Successful response without a transaction');
        }

        return { error, errorMessage, transaction };
    }

    private static writeHeader(writer: BinaryWriter, magic: number): void {
        writer.writeU8(magic);
        writer.writeU8(ALTERNATE_SCHEME_FORMAT_VERSION);
    }

    private static readHeader(reader: BinaryReader, magic: number): void {
        const actualMagic = reader.readU8();
        if (actualMagic !== magic) {
            throw new Error(`Invalid magic byte: expected ${magic}, got ${actualMagic}`);
        }

        const formatVersion = reader.readU8();
        if (formatVersion !== ALTERNATE_SCHEME_FORMAT_VERSION) {
            throw new Error(`Unsupported format version: ${formatVersion}`);
        }
    }

    private static writePreviousOutput(
        writer: BinaryWriter,
        previousOutput: AlternateSchemePreviousOutput,
    ): void {
        writer.writeStringWithLength(previousOutput.hash);
        writer.writeU32(previousOutput.index);
        writer.writeU32(previousOutput.sequence);
    }

    private static readPreviousOutput(reader: BinaryReader): AlternateSchemePreviousOutput {
        const hash = reader.readStringWithLength();
        const index = reader.readU32();
        const sequence = reader.readU32();

        return { hash, index, sequence };
    }

    private static writeTransaction(
        writer: BinaryWriter,
        transaction: AlternateSchemeTransaction,
    ): void {
        writer.writeI32(transaction.version);
        writer.writeU32(transaction.locktime);

        writer.writeU16(transaction.inputs.length);
        for (const input of transaction.inputs) {
            this.writePreviousOutput(writer, input.previousOutput);
            writer.writeBytesWithLength(input.script);
            writer.writeU32(input.sequence);
        }

        writer.writeU16(transaction.outputs.length);
        for (const output of transaction.outputs) {
            writer.writeU64(output.value);
            writer.writeBytesWithLength(output.script);
        }
    }

    private static readTransaction(reader: BinaryReader): AlternateSchemeTransaction {
        const version = reader.readI32();
        const locktime = reader.readU32();

        const inputs: AlternateSchemeInput[] = [];
        const inputCount = reader.readU16();
        for (let i = 0; i < inputCount; i++) {
            const previousOutput = this.readPreviousOutput(reader);
            const script = this.readScript(reader);
            const sequence = reader.readU32();

            inputs.push({ previousOutput, script, sequence });
        }

        const outputs: AlternateSchemeOutput[] = [];
        const outputCount = reader.readU16();
        for (let i = 0; i < outputCount; i++) {
            const value = reader.readU64();
            const script = this.readScript(reader);

            outputs.push({ value, script });
        }

        return { version, locktime, inputs, outputs };
    }

    private static readScript(reader: BinaryReader): Buffer {
        return Buffer.from(reader.readBytesWithLength(MAX_SCRIPT_LENGTH));
    }

    private static readVariant(reader: BinaryReader): ScriptVariant {
        const value = reader.readU8();
        switch (value) {
            case ScriptVariant.P2PKH:
            case ScriptVariant.P2WPKH:
            case ScriptVariant.P2TR_KEY_PATH:
            case ScriptVariant.BRC20_TRANSFER:
            case ScriptVariant.NFT_INSCRIPTION:
                return value;
            default:
                throw new Error(`Unknown script variant: ${value}`);
        }
    }

    private static verifyFullyRead(reader: BinaryReader): void {
        if (reader.bytesLeft() !== 0) {
            throw new Error(`Unexpected ${reader.bytesLeft()} trailing bytes`);
        }
    }
}
