import { FeeCalculator } from '../planning/FeeCalculator.js';
import { ChainId } from './ChainId.js';

export interface ChainConfig<T extends ChainId = ChainId> {
    // The chain.
    readonly CHAIN: T;

    // Human readable chain name, used in logs.
    readonly CHAIN_NAME: string;

    // Version written in newly built transactions.
    readonly TRANSACTION_VERSION: number;

    // Outputs below this value are not relayed.
    readonly DUST_THRESHOLD: bigint;

    readonly FEE_CALCULATOR: FeeCalculator;

    // Consensus branch id copied into plans; empty for chains that do not sign over one.
    readonly BRANCH_ID: Buffer;
}
