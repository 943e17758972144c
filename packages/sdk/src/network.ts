/**
 * Networks are named by passphrase. The network id mixed into every
 * signature payload is SHA-256 of the passphrase's UTF-8 bytes, so a
 * signature made for one network never verifies on another.
 */

import { utf8 } from "./encoding.js";
import { sha256 } from "./hash.js";

export const Networks = {
  PUBLIC: "Public Global Stellar Network ; September 2015",
  TESTNET: "Test SDF Network ; September 2015",
  FUTURENET: "Test SDF Future Network ; October 2022",
  STANDALONE: "Standalone Network ; February 2017",
} as const;

export type NetworkName = keyof typeof Networks;

export function networkId(passphrase: string): Uint8Array {
  return sha256(utf8(passphrase));
}

/** "public" / "testnet" / ... or a literal passphrase. */
export function resolveNetworkPassphrase(nameOrPassphrase: string): string {
  switch (nameOrPassphrase.toLowerCase()) {
    case "public":
    case "pubnet":
      return Networks.PUBLIC;
    case "testnet":
      return Networks.TESTNET;
    case "futurenet":
      return Networks.FUTURENET;
    case "standalone":
      return Networks.STANDALONE;
    default:
      return nameOrPassphrase;
  }
}
