export enum TransactionSequence {
    REPLACE_BY_FEE = 0xfffffffd,
    LOCKTIME_ENABLED = 0xfffffffe,
    FINAL = 0xffffffff,
}
