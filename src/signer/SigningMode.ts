export enum SigningMode {
    /** Sign with the provided private keys */
    NORMAL = 0,
    /** Fill placeholders of signature size, for fee estimation */
    SIZE_ESTIMATION_ONLY = 1,
    /** Use signatures supplied by the caller */
    EXTERNAL = 2,
    /** Only collect signature hashes; scripts and witnesses stay empty */
    HASH_ONLY = 3,
}
