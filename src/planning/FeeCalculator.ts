/**
 * Fee model used while selecting inputs.
 */
export interface FeeCalculator {
    /**
     * @param inputs - number of inputs
     * @param outputs - number of outputs
     * @param byteFee - fee per byte
     * @param extraBytes - size not covered by standard outputs (OP_RETURN payloads)
     */
    calculate(inputs: number, outputs: number, byteFee: bigint, extraBytes?: number): bigint;

    /**
     * @description Cost of adding one more input.
     */
    calculateSingleInput(byteFee: bigint): bigint;
}

/**
 * Fee proportional to an estimated size of `base + inputs * perInput + outputs * perOutput` bytes.
 */
export class LinearFeeCalculator implements FeeCalculator {
    constructor(
        public readonly bytesBase: number,
        public readonly bytesPerInput: number,
        public readonly bytesPerOutput: number,
    ) {}

    public calculate(
        inputs: number,
        outputs: number,
        byteFee: bigint,
        extraBytes: number = 0,
    ): bigint {
        const bytes =
            this.bytesBase + inputs * this.bytesPerInput + outputs * this.bytesPerOutput + extraBytes;

        return BigInt(bytes) * byteFee;
    }

    public calculateSingleInput(byteFee: bigint): bigint {
        return BigInt(this.bytesPerInput) * byteFee;
    }
}

/**
 * Flat fee whatever the transaction size.
 */
export class ConstantFeeCalculator implements FeeCalculator {
    constructor(public readonly fee: bigint) {}

    public calculate(_inputs: number, _outputs: number, _byteFee: bigint): bigint {
        return this.fee;
    }

    public calculateSingleInput(_byteFee: bigint): bigint {
        return 0n;
    }
}

export const DEFAULT_FEE_CALCULATOR: FeeCalculator = new LinearFeeCalculator(10, 148, 34);
