export { version } from './_version.js';

/** Results */
export * from './result/SigningError.js';
export * from './result/SigningResult.js';

/** Chains */
export * from './chains/ChainId.js';
export * from './chains/IChainConfig.js';
export * from './chains/ChainConfigs.js';
export * from './chains/metadata/BitcoinChain.js';
export * from './chains/metadata/GroestlcoinChain.js';
export * from './chains/metadata/VergeChain.js';
export * from './chains/metadata/ZcashChain.js';
export * from './chains/metadata/ZenChain.js';
export * from './chains/metadata/BitcoinDiamondChain.js';

/** Planning */
export * from './planning/FeeCalculator.js';
export * from './planning/TransactionPlanner.js';

/** Key Pair */
export * from './keypair/EcKeyPair.js';
export * from './keypair/KeyRing.js';

/** Scripts */
export * from './script/ScriptUtils.js';

/** Native transactions */
export * from './transaction/enums/ScriptVariant.js';
export * from './transaction/enums/SighashType.js';
export * from './transaction/enums/SignatureVersion.js';
export * from './transaction/enums/TransactionSequence.js';
export * from './transaction/interfaces/ISignatures.js';
export * from './transaction/interfaces/ISigningInput.js';
export * from './transaction/interfaces/ITransactionPlan.js';
export * from './transaction/OutPoint.js';
export * from './transaction/Transaction.js';
export * from './transaction/TransactionInput.js';
export * from './transaction/TransactionOutput.js';
export * from './transaction/chains/BitcoinTransaction.js';
export * from './transaction/chains/GroestlcoinTransaction.js';
export * from './transaction/chains/VergeTransaction.js';
export * from './transaction/chains/ZcashTransaction.js';
export * from './transaction/chains/ZenTransaction.js';
export * from './transaction/chains/BitcoinDiamondTransaction.js';

/** Builders */
export * from './transaction/builders/ChainTransactionBuilder.js';
export * from './transaction/builders/TransactionBuilder.js';
export * from './transaction/builders/BitcoinTransactionBuilder.js';
export * from './transaction/builders/GroestlcoinTransactionBuilder.js';
export * from './transaction/builders/VergeTransactionBuilder.js';
export * from './transaction/builders/ZcashTransactionBuilder.js';
export * from './transaction/builders/ZenTransactionBuilder.js';
export * from './transaction/builders/BitcoinDiamondTransactionBuilder.js';

/** Signer */
export * from './signer/SigningMode.js';
export * from './signer/SignatureBuilder.js';
export * from './signer/PlanResolver.js';
export * from './signer/TransactionSigner.js';
export * from './signer/TransactionSignerFactory.js';

/** Alternate scheme */
export * from './alternate/interfaces/IAlternateScheme.js';
export * from './alternate/AlternateSchemeCodec.js';
export * from './alternate/AlternateSchemeAssembler.js';

/** Utils */
export * from './buffer/BinaryReader.js';
export * from './buffer/BinaryWriter.js';
export * from './utils/BufferHelper.js';
export * from './utils/errors.js';
export * from './utils/lengths.js';
export * from './utils/types.js';
