/**
 * @ledgerkit/sdk — transaction encoding, keys and signing.
 *
 * Synchronous and I/O-free: no network, no clock (except where a builder
 * is asked for a timeout), no logging. Everything that talks to a ledger
 * node lives in @ledgerkit/horizon-client and imports from here.
 */

// Errors
export {
  LedgerKitError,
  XdrDecodeError,
  ConstructionError,
  StrKeyError,
  CryptoError,
  CapabilityError,
  type XdrDecodeErrorKind,
  type StrKeyErrorKind,
  type CryptoErrorKind,
} from "./errors.js";

// Codec core
export * from "./xdr/index.js";

// Byte helpers
export {
  toHex,
  fromHex,
  utf8,
  fromUtf8,
  concatBytes,
  copyBytes,
  bytesEqual,
  bytesToBase64,
  base64ToBytes,
} from "./encoding.js";
export { sha256 } from "./hash.js";

// Textual keys (base32 + CRC16 + version byte)
export { crc16Xmodem } from "./crc16.js";
export { encodeBase32, decodeBase32 } from "./base32.js";
export {
  StrKey,
  VersionByte,
  encodeCheck,
  decodeCheck,
  type StrKeyRole,
  type SignedPayloadKey,
} from "./strkey.js";

// Ed25519 primitives + keypairs
export {
  generateKeypair,
  ed25519PublicKey,
  ed25519Sign,
  ed25519Verify,
  secureRandomBytes,
  PUBLIC_KEY_LENGTH,
  SEED_LENGTH,
  SIGNATURE_LENGTH,
} from "./ed25519.js";
export { Keypair, SigningKeypair, requireSigning } from "./keypair.js";

// Ledger types (protocol 17)
export * from "./types/index.js";

// Networks, signature payloads, multi-signer engine
export { Networks, networkId, resolveNetworkPassphrase, type NetworkName } from "./network.js";
export {
  signableOf,
  signaturePayload,
  transactionHash,
  signatureHint,
  signTransaction,
  addSignature,
  signEnvelope,
  resolveSigners,
  verifySignatures,
  envelopeSigningState,
  type SignableTransaction,
  type Candidate,
  type ResolvedSignature,
  type SigningState,
  type SigningPolicy,
} from "./signing.js";
export {
  evaluateThreshold,
  thresholdPolicy,
  verifiedWeight,
  type WeightedSigner,
  type ThresholdContext,
  type ThresholdResult,
} from "./threshold.js";

// Amounts and prices
export { parseAmount, formatAmount, type ParseAmountOptions } from "./amount.js";
export { priceFromString, priceToString } from "./price.js";

// Builders
export {
  Operations,
  type AccountInput,
  type MuxedInput,
  type AssetInput,
  type AmountInput,
  type PriceInput,
  type BalanceIdInput,
  type SignerInput,
  type ClaimantInput,
  type TrustLineFlagChanges,
  type AccountFlagName,
  type AccountFlagsInput,
} from "./builders/operations.js";
export {
  buildTransaction,
  newEnvelope,
  wrapFeeBump,
  type BuildTransactionOptions,
} from "./builders/transaction.js";

// Constants
export * from "./constants.js";
