import { ChainId } from '../chains/ChainId.js';
import { BitcoinDiamondTransactionBuilder } from '../transaction/builders/BitcoinDiamondTransactionBuilder.js';
import { BitcoinTransactionBuilder } from '../transaction/builders/BitcoinTransactionBuilder.js';
import { ChainTransactionBuilder } from '../transaction/builders/ChainTransactionBuilder.js';
import { GroestlcoinTransactionBuilder } from '../transaction/builders/GroestlcoinTransactionBuilder.js';
import { VergeTransactionBuilder } from '../transaction/builders/VergeTransactionBuilder.js';
import { ZcashTransactionBuilder } from '../transaction/builders/ZcashTransactionBuilder.js';
import { ZenTransactionBuilder } from '../transaction/builders/ZenTransactionBuilder.js';
import { BitcoinDiamondTransaction } from '../transaction/chains/BitcoinDiamondTransaction.js';
import { BitcoinTransaction } from '../transaction/chains/BitcoinTransaction.js';
import { GroestlcoinTransaction } from '../transaction/chains/GroestlcoinTransaction.js';
import { VergeTransaction } from '../transaction/chains/VergeTransaction.js';
import { ZcashTransaction } from '../transaction/chains/ZcashTransaction.js';
import { ZenTransaction } from '../transaction/chains/ZenTransaction.js';
import { SigningInput } from '../transaction/interfaces/ISigningInput.js';
import { Transaction } from '../transaction/Transaction.js';
import { SigningResult } from '../result/SigningResult.js';
import { TransactionSigner, TransactionSignerOptions } from './TransactionSigner.js';

export type AnyTransactionSigner = TransactionSigner<Transaction, ChainTransactionBuilder<Transaction>>;

/**
 * One signer per chain; {@link forChain} picks one at run time.
 */
export class TransactionSignerFactory {
    public static bitcoin(
        options: TransactionSignerOptions<BitcoinTransaction> = {},
    ): TransactionSigner<BitcoinTransaction, BitcoinTransactionBuilder> {
        return new TransactionSigner<BitcoinTransaction, BitcoinTransactionBuilder>(
            new BitcoinTransactionBuilder(),
            options,
        );
    }

    public static groestlcoin(
        options: TransactionSignerOptions<GroestlcoinTransaction> = {},
    ): TransactionSigner<GroestlcoinTransaction, GroestlcoinTransactionBuilder> {
        return new TransactionSigner<GroestlcoinTransaction, GroestlcoinTransactionBuilder>(
            new GroestlcoinTransactionBuilder(),
            options,
        );
    }

    public static verge(
        options: TransactionSignerOptions<VergeTransaction> = {},
    ): TransactionSigner<VergeTransaction, VergeTransactionBuilder> {
        return new TransactionSigner<VergeTransaction, VergeTransactionBuilder>(
            new VergeTransactionBuilder(),
            options,
        );
    }

    public static zcash(
        options: TransactionSignerOptions<ZcashTransaction> = {},
    ): TransactionSigner<ZcashTransaction, ZcashTransactionBuilder> {
        return new TransactionSigner<ZcashTransaction, ZcashTransactionBuilder>(
            new ZcashTransactionBuilder(),
            options,
        );
    }

    public static zen(
        options: TransactionSignerOptions<ZenTransaction> = {},
    ): TransactionSigner<ZenTransaction, ZenTransactionBuilder> {
        return new TransactionSigner<ZenTransaction, ZenTransactionBuilder>(
            new ZenTransactionBuilder(),
            options,
        );
    }

    public static bitcoinDiamond(
        options: TransactionSignerOptions<BitcoinDiamondTransaction> = {},
    ): TransactionSigner<BitcoinDiamondTransaction, BitcoinDiamondTransactionBuilder> {
        return new TransactionSigner<BitcoinDiamondTransaction, BitcoinDiamondTransactionBuilder>(
            new BitcoinDiamondTransactionBuilder(),
            options,
        );
    }

    public static forChain(
        chain: ChainId,
        options: TransactionSignerOptions<Transaction> = {},
    ): AnyTransactionSigner {
        return new TransactionSigner<Transaction>(this.createBuilder(chain), options);
    }

    /**
     * @description Signs with the signer of `input.chain`.
     */
    public static sign(
        input: SigningInput,
        options: TransactionSignerOptions<Transaction> = {},
    ): SigningResult<Transaction> {
        return this.forChain(input.chain, options).sign(input);
    }

    private static createBuilder(chain: ChainId): ChainTransactionBuilder<Transaction> {
        switch (chain) {
            case ChainId.BITCOIN:
                return new BitcoinTransactionBuilder();
            case ChainId.GROESTLCOIN:
                return new GroestlcoinTransactionBuilder();
            case ChainId.VERGE:
                return new VergeTransactionBuilder();
            case ChainId.ZCASH:
                return new ZcashTransactionBuilder();
            case ChainId.ZEN:
                return new ZenTransactionBuilder();
            case ChainId.BITCOIN_DIAMOND:
                return new BitcoinDiamondTransactionBuilder();
        }
    }
}
