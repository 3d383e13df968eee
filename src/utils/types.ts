export type BufferLike = Uint8Array | Buffer;

export type i32 = number;
export type u8 = number;
export type u16 = number;
export type u32 = number;

export type u64 = bigint;
