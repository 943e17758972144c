/**
 * ledgerkit config [--horizon url] [--network name] [--key-path path] [--log-level level]
 *
 * Show or update CLI configuration.
 */

import { Value } from "@sinclair/typebox/value";
import { resolveNetworkPassphrase } from "@ledgerkit/sdk";
import { ConfigFile, getConfigPath, loadConfig, saveConfig } from "../lib/config.js";

interface ConfigOptions {
  horizon?: string;
  network?: string;
  keyPath?: string;
  logLevel?: string;
}

type Env = Record<string, string | undefined>;

export async function configCommand(opts: ConfigOptions, env: Env = process.env): Promise<void> {
  const config = await loadConfig(env);
  const update = {
    horizonUrl: opts.horizon ?? config.horizonUrl,
    network: opts.network ?? config.network,
    keyPath: opts.keyPath ?? config.keyPath,
    logLevel: opts.logLevel ?? config.logLevel,
  };
  if (!Value.Check(ConfigFile, update)) {
    const first = Value.Errors(ConfigFile, update).First();
    throw new Error(`Invalid setting ${first?.path ?? ""}: ${first?.message ?? "rejected"}`);
  }
  const changed =
    opts.horizon !== undefined ||
    opts.network !== undefined ||
    opts.keyPath !== undefined ||
    opts.logLevel !== undefined;

  if (changed) {
    await saveConfig(update, env);
    console.log(`Config saved to ${getConfigPath(env)}`);
  }

  console.log(`\nCurrent config:`);
  console.log(`  horizonUrl: ${update.horizonUrl}`);
  console.log(`  network:    ${update.network} (${resolveNetworkPassphrase(update.network)})`);
  console.log(`  keyPath:    ${update.keyPath}`);
  console.log(`  logLevel:   ${update.logLevel}`);
}
