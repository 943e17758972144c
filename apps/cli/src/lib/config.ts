/**
 * CLI configuration — loads from ~/.ledgerkit/config.json + env overrides.
 *
 * Priority: env vars > config file > defaults.
 *
 *   LEDGERKIT_HORIZON_URL   Horizon base URL
 *   LEDGERKIT_NETWORK       network name (public, testnet, futurenet, standalone)
 *                           or a literal passphrase
 *   LEDGERKIT_KEY_PATH      key file
 *   LEDGERKIT_LOG_LEVEL     pino level for diagnostics on stderr
 *   LEDGERKIT_HOME          config directory (default ~/.ledgerkit)
 */

import { readFile, writeFile, mkdir } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

const LogLevel = Type.Union([
  Type.Literal("fatal"),
  Type.Literal("error"),
  Type.Literal("warn"),
  Type.Literal("info"),
  Type.Literal("debug"),
  Type.Literal("trace"),
  Type.Literal("silent"),
]);

export type LogLevel = Static<typeof LogLevel>;

export const ConfigFile = Type.Object(
  {
    horizonUrl: Type.Optional(Type.String({ pattern: "^https?://" })),
    network: Type.Optional(Type.String({ minLength: 1 })),
    keyPath: Type.Optional(Type.String({ minLength: 1 })),
    logLevel: Type.Optional(LogLevel),
  },
  { additionalProperties: false },
);

export type ConfigFile = Static<typeof ConfigFile>;

export interface CliConfig {
  horizonUrl: string;
  /** Network name or passphrase; resolved when a command signs or hashes. */
  network: string;
  keyPath: string;
  logLevel: LogLevel;
}

const DEFAULT_HORIZON_URL = "https://horizon-testnet.stellar.org";
const DEFAULT_NETWORK = "testnet";
const DEFAULT_LOG_LEVEL: LogLevel = "warn";

type Env = Record<string, string | undefined>;

export function getConfigDir(env: Env = process.env): string {
  return env["LEDGERKIT_HOME"] ?? join(homedir(), ".ledgerkit");
}

export function getConfigPath(env: Env = process.env): string {
  return join(getConfigDir(env), "config.json");
}

export async function ensureConfigDir(env: Env = process.env): Promise<void> {
  await mkdir(getConfigDir(env), { recursive: true });
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/** Read and validate the config file. A missing file is an empty config. */
export async function readConfigFile(path: string): Promise<ConfigFile> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    if (isNotFound(err)) return {};
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new Error(`Invalid config file at ${path}: not JSON`);
  }
  if (!Value.Check(ConfigFile, parsed)) {
    const first = Value.Errors(ConfigFile, parsed).First();
    const detail = first ? `${first.path || "/"} ${first.message}` : "unexpected shape";
    throw new Error(`Invalid config file at ${path}: ${detail}`);
  }
  return parsed;
}

function envLogLevel(value: string | undefined): LogLevel | undefined {
  if (value === undefined) return undefined;
  if (!Value.Check(LogLevel, value)) {
    throw new Error(`LEDGERKIT_LOG_LEVEL must be one of fatal|error|warn|info|debug|trace|silent`);
  }
  return value;
}

/** Load config, merging env overrides on top. */
export async function loadConfig(env: Env = process.env): Promise<CliConfig> {
  const file = await readConfigFile(getConfigPath(env));
  return {
    horizonUrl: env["LEDGERKIT_HORIZON_URL"] ?? file.horizonUrl ?? DEFAULT_HORIZON_URL,
    network: env["LEDGERKIT_NETWORK"] ?? file.network ?? DEFAULT_NETWORK,
    keyPath: env["LEDGERKIT_KEY_PATH"] ?? file.keyPath ?? join(getConfigDir(env), "key.json"),
    logLevel: envLogLevel(env["LEDGERKIT_LOG_LEVEL"]) ?? file.logLevel ?? DEFAULT_LOG_LEVEL,
  };
}

/** Save config to disk. */
export async function saveConfig(config: CliConfig, env: Env = process.env): Promise<void> {
  await ensureConfigDir(env);
  const toSave: ConfigFile = {
    horizonUrl: config.horizonUrl,
    network: config.network,
    keyPath: config.keyPath,
    logLevel: config.logLevel,
  };
  await writeFile(getConfigPath(env), JSON.stringify(toSave, null, 2) + "\n", "utf-8");
}
