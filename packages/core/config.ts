import { ClipOrigin } from "./models/enums";
import { isLogLevel, type LogLevel } from "./logger";
import { DEFAULT_MAX_BODY_BYTES } from "./server/http";

export type Env = Record<string, string | undefined>;

export interface ClipbridgeConfig {
  server: {
    host: string;
    port: number;
    storePath: string;
    maxBodyBytes: number;
  };
  client: {
    serverUrl: string;
    timeoutMs: number;
  };
  sync: {
    origin: ClipOrigin.Desktop | ClipOrigin.Phone;
    pollIntervalMs: number;
    errorBackoffMs: number;
    clipboardTimeoutMs: number;
  };
  logLevel: LogLevel;
  /** Problems found while reading the environment; defaults were used instead. */
  warnings: string[];
}

export const DEFAULTS = {
  host: "0.0.0.0",
  port: 5000,
  serverUrl: "http://localhost:5000",
  storePath: "clipboard_store.json",
  pollIntervalMs: 500,
  errorBackoffMs: 1000,
  timeoutMs: 2000,
  clipboardTimeoutMs: 5000,
  origin: ClipOrigin.Desktop,
  maxBodyBytes: DEFAULT_MAX_BODY_BYTES,
  logLevel: "info",
} as const;

function env(source: Env, name: string): string | undefined {
  const val = source[name];
  return val && val.trim().length > 0 ? val.trim() : undefined;
}

export function coerceNumber(value: unknown, fallback: number, min = 0): number {
  if (value === undefined || value === null || value === "") return fallback;
  const n = typeof value === "number" ? value : Number(value);
  return Number.isFinite(n) && n >= min ? n : fallback;
}

export function parseOrigin(value: string | undefined): ClipOrigin.Desktop | ClipOrigin.Phone | undefined {
  const normalized = value?.trim().toLowerCase();
  if (normalized === ClipOrigin.Desktop) return ClipOrigin.Desktop;
  if (normalized === ClipOrigin.Phone) return ClipOrigin.Phone;
  return undefined;
}

export function stripTrailingSlash(url: string): string {
  return url.replace(/\/+$/, "");
}

/**
 * Read configuration from environment variables.
 *
 * CLIPBOARD_HOST: bind host (default: 0.0.0.0)
 * CLIPBOARD_PORT: bind port (default: 5000)
 * CLIPBOARD_SERVER: base URL clients use (default: http://localhost:5000)
 * CLIPBOARD_STORE: `:memory:` or a JSON file path (default: clipboard_store.json)
 * CLIPBOARD_POLL_MS: poll interval (default: 500)
 * CLIPBOARD_BACKOFF_MS: pause after a failed tick (default: 1000)
 * CLIPBOARD_TIMEOUT_MS: HTTP timeout (default: 2000)
 * CLIPBOARD_CLIPBOARD_TIMEOUT_MS: clipboard read/write timeout (default: 5000)
 * CLIPBOARD_ORIGIN: desktop | phone (default: desktop)
 * CLIPBOARD_MAX_BODY_BYTES: POST body limit (default: 32 MiB)
 * CLIPBOARD_LOG_LEVEL: debug | info | warn | error (default: info)
 */
export function loadConfig(source: Env = process.env): ClipbridgeConfig {
  const warnings: string[] = [];

  const number = (name: string, fallback: number, min = 0) => {
    const raw = env(source, name);
    const value = coerceNumber(raw, fallback, min);
    if (raw !== undefined && value === fallback && Number(raw) !== fallback) {
      warnings.push(`${name}=${raw} is not a valid number; using ${fallback}`);
    }
    return value;
  };

  const rawOrigin = env(source, "CLIPBOARD_ORIGIN");
  let origin = parseOrigin(rawOrigin);
  if (!origin) {
    if (rawOrigin !== undefined) {
      warnings.push(`CLIPBOARD_ORIGIN=${rawOrigin} is not desktop or phone; using ${DEFAULTS.origin}`);
    }
    origin = DEFAULTS.origin;
  }

  const rawLevel = env(source, "CLIPBOARD_LOG_LEVEL")?.toLowerCase();
  let logLevel: LogLevel = DEFAULTS.logLevel;
  if (rawLevel !== undefined) {
    if (isLogLevel(rawLevel)) {
      logLevel = rawLevel;
    } else {
      warnings.push(`CLIPBOARD_LOG_LEVEL=${rawLevel} is not a log level; using ${DEFAULTS.logLevel}`);
    }
  }

  return {
    server: {
      host: env(source, "CLIPBOARD_HOST") ?? DEFAULTS.host,
      port: Math.floor(number("CLIPBOARD_PORT", DEFAULTS.port)),
      storePath: env(source, "CLIPBOARD_STORE") ?? DEFAULTS.storePath,
      maxBodyBytes: number("CLIPBOARD_MAX_BODY_BYTES", DEFAULTS.maxBodyBytes, 1),
    },
    client: {
      serverUrl: stripTrailingSlash(env(source, "CLIPBOARD_SERVER") ?? DEFAULTS.serverUrl),
      timeoutMs: number("CLIPBOARD_TIMEOUT_MS", DEFAULTS.timeoutMs, 1),
    },
    sync: {
      origin,
      pollIntervalMs: number("CLIPBOARD_POLL_MS", DEFAULTS.pollIntervalMs, 1),
      errorBackoffMs: number("CLIPBOARD_BACKOFF_MS", DEFAULTS.errorBackoffMs),
      clipboardTimeoutMs: number("CLIPBOARD_CLIPBOARD_TIMEOUT_MS", DEFAULTS.clipboardTimeoutMs, 1),
    },
    logLevel,
    warnings,
  };
}
