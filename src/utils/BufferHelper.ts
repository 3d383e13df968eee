import { HASH_BYTE_LENGTH } from './lengths.js';

const HEX_PATTERN = /^[0-9a-fA-F]*$/;

export class BufferHelper {
    public static readonly EXPECTED_BUFFER_LENGTH: number = HASH_BYTE_LENGTH;

    public static uint8ArrayToHex(input: Uint8Array): string {
        return Buffer.from(input.buffer, input.byteOffset, input.byteLength).toString('hex');
    }

    /**
     * Strict hex decoding. Unlike `Buffer.from(hex, 'hex')`, which stops silently at the first
     * bad character, malformed input is rejected.
     */
    public static hexToUint8Array(input: string): Uint8Array {
        if (input.startsWith('0x')) {
            input = input.substring(2);
        }

        if (input.length % 2 !== 0) {
            throw new Error(`Invalid hex string: odd length (${input.length})`);
        }

        if (!HEX_PATTERN.test(input)) {
            throw new Error('Invalid hex string: unexpected character');
        }

        return Uint8Array.from(Buffer.from(input, 'hex'));
    }

    /**
     * Decodes a 32-byte hash written in hex, keeping the byte order of the text.
     */
    public static hexToHash(input: string): Buffer {
        const bytes = BufferHelper.hexToUint8Array(input);
        if (bytes.byteLength !== BufferHelper.EXPECTED_BUFFER_LENGTH) {
            throw new Error(
                `Invalid hash length: expected ${BufferHelper.EXPECTED_BUFFER_LENGTH} bytes, got ${bytes.byteLength}`,
            );
        }

        return Buffer.from(bytes);
    }

    /**
     * Transaction ids are displayed byte-reversed relative to the hash used in outpoints.
     */
    public static transactionIdToHash(transactionId: string): Buffer {
        return BufferHelper.reverse(BufferHelper.hexToHash(transactionId));
    }

    public static hashToTransactionId(hash: Uint8Array): string {
        return BufferHelper.uint8ArrayToHex(BufferHelper.reverse(hash));
    }

    public static reverse(input: Uint8Array): Buffer {
        return Buffer.from(input).reverse();
    }

    public static equals(a: Uint8Array, b: Uint8Array): boolean {
        return Buffer.compare(a, b) === 0;
    }
}
