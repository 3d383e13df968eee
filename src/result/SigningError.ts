/**
 * Failure kinds reported by planning, building and signing.
 */
export enum SigningError {
    OK = 0,
    GENERAL = 1,
    INTERNAL = 2,
    LOW_BALANCE = 3,
    ZERO_AMOUNT_REQUESTED = 4,
    MISSING_PRIVATE_KEY = 5,
    INVALID_PRIVATE_KEY = 6,
    INVALID_ADDRESS = 7,
    INVALID_UTXO = 8,
    INVALID_UTXO_AMOUNT = 9,
    WRONG_FEE = 10,
    SIGNING = 11,
    TX_TOO_BIG = 12,
    MISSING_INPUT_UTXOS = 13,
    NOT_ENOUGH_UTXOS = 14,
    SCRIPT_REDEEM = 15,
    SCRIPT_OUTPUT = 16,
    SCRIPT_WITNESS_PROGRAM = 17,
    INVALID_MEMO = 18,
    INPUT_PARSE = 19,
    NOT_SUPPORTED = 20,
    DUST_AMOUNT_REQUESTED = 21,
}

export function isSigningError(value: number): value is SigningError {
    return SigningError[value] !== undefined;
}
