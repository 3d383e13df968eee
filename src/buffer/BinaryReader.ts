import { U16_BYTE_LENGTH, U32_BYTE_LENGTH, U64_BYTE_LENGTH, U8_BYTE_LENGTH } from '../utils/lengths.js';
import { BufferLike, i32, u16, u32, u8 } from '../utils/types.js';

export class BinaryReader {
    private readonly buffer: DataView;
    private currentOffset: i32 = 0;

    constructor(bytes: BufferLike) {
        this.buffer = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    }

    public length(): number {
        return this.buffer.byteLength;
    }

    public bytesLeft(): number {
        return this.buffer.byteLength - this.currentOffset;
    }

    public readU8(): u8 {
        this.verifyEnd(this.currentOffset + U8_BYTE_LENGTH);
        const value = this.buffer.getUint8(this.currentOffset);
        this.currentOffset += U8_BYTE_LENGTH;
        return value;
    }

    public readU16(): u16 {
        this.verifyEnd(this.currentOffset + U16_BYTE_LENGTH);
        const value = this.buffer.getUint16(this.currentOffset, true);
        this.currentOffset += U16_BYTE_LENGTH;
        return value;
    }

    public readU32(): u32 {
        this.verifyEnd(this.currentOffset + U32_BYTE_LENGTH);
        const value = this.buffer.getUint32(this.currentOffset, true);
        this.currentOffset += U32_BYTE_LENGTH;
        return value;
    }

    public readI32(): i32 {
        this.verifyEnd(this.currentOffset + U32_BYTE_LENGTH);
        const value = this.buffer.getInt32(this.currentOffset, true);
        this.currentOffset += U32_BYTE_LENGTH;
        return value;
    }

    public readU64(): bigint {
        this.verifyEnd(this.currentOffset + U64_BYTE_LENGTH);
        const value = this.buffer.getBigUint64(this.currentOffset, true);
        this.currentOffset += U64_BYTE_LENGTH;
        return value;
    }

    public readBoolean(): boolean {
        const value = this.readU8();
        if (value > 1) {
            throw new Error(`Invalid boolean byte: ${value}`);
        }

        return value === 1;
    }

    /**
     * Reads a raw sequence of bytes (length must be known).
     */
    public readBytes(length: u32): Uint8Array {
        this.verifyEnd(this.currentOffset + length);

        const bytes = new Uint8Array(length);
        for (let i: u32 = 0; i < length; i++) {
            bytes[i] = this.buffer.getUint8(this.currentOffset++);
        }

        return bytes;
    }

    /**
     * Reads bytes written as [u32 length][bytes].
     * @param maxLength if > 0, enforces an upper bound
     */
    public readBytesWithLength(maxLength: number = 0): Uint8Array {
        const length = this.readU32();
        if (maxLength > 0 && length > maxLength) {
            throw new Error('Data length exceeds maximum length.');
        }

        return this.readBytes(length);
    }

    /**
     * Reads a string that was written as [u16 length][utf-8 bytes].
     */
    public readStringWithLength(): string {
        const length = this.readU16();
        const bytes = this.readBytes(length);

        return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
    }

    /**
     * Verifies we have enough bytes in the buffer to read up to `size`.
     */
    public verifyEnd(size: i32): void {
        if (size > this.buffer.byteLength) {
            throw new Error(
                `Attempt to read beyond buffer length: requested up to byte offset ${size}, but buffer is only ${this.buffer.byteLength} bytes.`,
            );
        }
    }
}
