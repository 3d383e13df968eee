export const U64_BYTE_LENGTH: number = 8;
export const U32_BYTE_LENGTH: number = 4;
export const U16_BYTE_LENGTH: number = 2;
export const U8_BYTE_LENGTH: number = 1;

export const HASH_BYTE_LENGTH: number = 32;
