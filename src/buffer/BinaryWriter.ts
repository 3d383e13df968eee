import { varuint } from 'bitcoinjs-lib/src/bufferutils.js';
import { i32, u16, u32, u64, u8 } from '../utils/types.js';

/**
 * Growable little-endian writer.
 *
 * Used both for the consensus serialization of native transactions (var ints, var slices)
 * and for the length-prefixed boundary encoding exchanged with external engines.
 */
export class BinaryWriter {
    private currentOffset: u32 = 0;
    private buffer: DataView;

    constructor(length: number = 0) {
        this.buffer = this.getDefaultBuffer(length);
    }

    public writeU8(value: u8): void {
        if (value > 255 || value < 0) throw new Error('Value is too large.');

        this.allocSafe(1);
        this.buffer.setUint8(this.currentOffset++, value);
    }

    public writeU16(value: u16): void {
        if (value > 65535 || value < 0) throw new Error('Value is too large.');

        this.allocSafe(2);
        this.buffer.setUint16(this.currentOffset, value, true);
        this.currentOffset += 2;
    }

    public writeU32(value: u32): void {
        if (value > 4294967295 || value < 0) throw new Error('Value is too large.');

        this.allocSafe(4);
        this.buffer.setUint32(this.currentOffset, value, true);
        this.currentOffset += 4;
    }

    public writeI32(value: i32): void {
        if (value > 2147483647 || value < -2147483648) throw new Error('Value is out of range.');

        this.allocSafe(4);
        this.buffer.setInt32(this.currentOffset, value, true);
        this.currentOffset += 4;
    }

    public writeU64(value: u64): void {
        if (value > 18446744073709551615n || value < 0n) throw new Error('Value is too large.');

        this.allocSafe(8);
        this.buffer.setBigUint64(this.currentOffset, value, true);
        this.currentOffset += 8;
    }

    public writeI64(value: bigint): void {
        if (value > 9223372036854775807n || value < -9223372036854775808n) {
            throw new Error('Value is out of range.');
        }

        this.allocSafe(8);
        this.buffer.setBigInt64(this.currentOffset, value, true);
        this.currentOffset += 8;
    }

    public writeBoolean(value: boolean): void {
        this.writeU8(value ? 1 : 0);
    }

    public writeBytes(value: Uint8Array): void {
        this.allocSafe(value.byteLength);

        for (let i = 0; i < value.byteLength; i++) {
            this.buffer.setUint8(this.currentOffset++, value[i]);
        }
    }

    /**
     * [u32 length][bytes]
     */
    public writeBytesWithLength(value: Uint8Array): void {
        this.writeU32(value.byteLength);
        this.writeBytes(value);
    }

    /**
     * [u16 length][utf-8 bytes]
     */
    public writeStringWithLength(value: string): void {
        const bytes = Buffer.from(value, 'utf8');

        this.writeU16(bytes.byteLength);
        this.writeBytes(bytes);
    }

    /**
     * Bitcoin CompactSize integer.
     */
    public writeVarInt(value: number): void {
        this.writeBytes(varuint.encode(value));
    }

    public writeVarBytes(value: Uint8Array): void {
        this.writeVarInt(value.byteLength);
        this.writeBytes(value);
    }

    public writeVector(values: readonly Uint8Array[]): void {
        this.writeVarInt(values.length);

        for (const value of values) {
            this.writeVarBytes(value);
        }
    }

    public getBuffer(clear: boolean = true): Buffer {
        const buf = Buffer.alloc(this.currentOffset);
        for (let i: u32 = 0; i < this.currentOffset; i++) {
            buf[i] = this.buffer.getUint8(i);
        }

        if (clear) this.clear();

        return buf;
    }

    public getOffset(): u32 {
        return this.currentOffset;
    }

    public clear(): void {
        this.currentOffset = 0;
        this.buffer = this.getDefaultBuffer();
    }

    public allocSafe(size: u32): void {
        if (this.currentOffset + size > this.buffer.byteLength) {
            this.resize(this.currentOffset + size - this.buffer.byteLength);
        }
    }

    private resize(size: u32): void {
        const buf: Uint8Array = new Uint8Array(this.buffer.byteLength + size);

        for (let i: i32 = 0; i < this.buffer.byteLength; i++) {
            buf[i] = this.buffer.getUint8(i);
        }

        this.buffer = new DataView(buf.buffer);
    }

    private getDefaultBuffer(length: number = 0): DataView {
        return new DataView(new ArrayBuffer(length));
    }
}
