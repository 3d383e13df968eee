export enum SighashType {
    ALL = 0x01,
    NONE = 0x02,
    SINGLE = 0x03,
    ANYONECANPAY = 0x80,
}

export const SIGHASH_BASE_MASK = 0x1f;
