/**
 * Diagnostics logger. JSON lines on stderr so stdout stays clean for
 * command output (envelopes, addresses) that scripts pipe onward.
 */

import { pino, destination, type Logger } from "pino";
import type { LogLevel } from "./config.js";

export function createLogger(level: LogLevel): Logger {
  return pino({ name: "ledgerkit", level }, destination(2));
}
