/**
 * What every command gets handed: resolved config, a logger, and the
 * Horizon client (constructed up front; it does no I/O until called).
 */

import type { Logger } from "pino";
import { fromXdrBase64, resolveNetworkPassphrase, TransactionEnvelope } from "@ledgerkit/sdk";
import type { HorizonClient } from "@ledgerkit/horizon-client";
import type { CliConfig } from "./config.js";

export interface CommandContext {
  config: CliConfig;
  log: Logger;
  horizon: HorizonClient;
}

export function networkPassphrase(config: CliConfig): string {
  return resolveNetworkPassphrase(config.network);
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf-8");
}

/** Base64 envelope from an argument, or from stdin when the argument is "-". */
export async function readEnvelope(arg: string): Promise<TransactionEnvelope> {
  const text = arg === "-" ? await readStdin() : arg;
  return fromXdrBase64(TransactionEnvelope, text.trim());
}
