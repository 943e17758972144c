/**
 * SHA-256 — the single digest function of the ledger protocol.
 * Network ids, transaction hashes and hashX signers all use it.
 */

import { sha256 as nobleSha256 } from "@noble/hashes/sha256";

/** Raw SHA-256 of bytes → 32 bytes. */
export function sha256(bytes: Uint8Array): Uint8Array {
  return nobleSha256(bytes);
}
