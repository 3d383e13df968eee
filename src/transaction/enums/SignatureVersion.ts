export enum SignatureVersion {
    BASE = 0,
    WITNESS_V0 = 1,
}
