import { z } from "zod";

// Every template transaction is version 2 so relative locks (BIP-68) apply to its inputs.
export const TEMPLATE_TX_VERSION = 2;

export const SEQUENCE_FINAL = 0xffffffff;
export const SEQUENCE_LOCKTIME_ENABLED = 0xfffffffe;

export const LOCKTIME_THRESHOLD = 500_000_000;

export const MAX_MONEY = 21_000_000n * 100_000_000n;

export const MAX_TX_BYTES = 4_000_000;

export const TEMPLATE_HASH_BYTES = 32;

export const LogLevel = z.enum(["debug", "info", "warn", "error", "silent"]);
export type LogLevel = z.infer<typeof LogLevel>;

export const LOG_LEVEL: LogLevel = LogLevel.catch("warn").parse(process.env.TEMPLATE_LOG_LEVEL ?? "warn");
