/**
 * Key management — load/save the signing key from ~/.ledgerkit/key.json.
 *
 * Key file format:
 * {
 *   "publicKey": "G...",
 *   "secret": "S..."
 * }
 *
 * The file is written 0600; the public key is re-derived on load and must
 * match what the file says.
 */

import { readFile, writeFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { SigningKeypair } from "@ledgerkit/sdk";

export const KeyFile = Type.Object(
  {
    publicKey: Type.String({ pattern: "^G[A-Z2-7]{55}$" }),
    secret: Type.String({ pattern: "^S[A-Z2-7]{55}$" }),
  },
  { additionalProperties: false },
);

export type KeyFile = Static<typeof KeyFile>;

/** Load the signing keypair from disk. Throws if not found. */
export async function loadKeys(keyPath: string): Promise<SigningKeypair> {
  let raw: string;
  try {
    raw = await readFile(keyPath, "utf-8");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`No key file at ${keyPath} (${reason})\nRun 'ledgerkit keygen' to generate one.`);
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    throw new Error(`Invalid key file at ${keyPath}: not JSON`);
  }
  if (!Value.Check(KeyFile, data)) {
    throw new Error(`Invalid key file at ${keyPath}: expected { publicKey: "G...", secret: "S..." }`);
  }

  const keypair = SigningKeypair.fromSecret(data.secret);
  if (keypair.publicKey() !== data.publicKey) {
    throw new Error(`Invalid key file at ${keyPath}: publicKey does not match secret`);
  }
  return keypair;
}

/** Save a keypair. Returns what was written. */
export async function saveKeys(keyPath: string, keypair: SigningKeypair): Promise<KeyFile> {
  await mkdir(dirname(keyPath), { recursive: true });
  const keyFile: KeyFile = { publicKey: keypair.publicKey(), secret: keypair.secret() };
  await writeFile(keyPath, JSON.stringify(keyFile, null, 2) + "\n", { encoding: "utf-8", mode: 0o600 });
  return keyFile;
}

/** Generate and save a new keypair. */
export async function generateAndSaveKeys(keyPath: string): Promise<KeyFile> {
  return saveKeys(keyPath, SigningKeypair.random());
}
