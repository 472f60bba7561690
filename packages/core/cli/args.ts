import type { ClipbridgeConfig } from "../config";
import { coerceNumber, parseOrigin, stripTrailingSlash } from "../config";
import type { ClipOrigin } from "../models/enums";
import { isLogLevel, type LogLevel } from "../logger";

export type Command = "serve" | "sync" | "push" | "pull";

const COMMANDS: readonly Command[] = ["serve", "sync", "push", "pull"];

export type CliOptions = {
  command?: Command;
  host?: string;
  port?: number;
  storePath?: string;
  serverUrl?: string;
  origin?: ClipOrigin.Desktop | ClipOrigin.Phone;
  intervalMs?: number;
  embeddedServer: boolean;
  logLevel?: LogLevel;
  help: boolean;
  errors: string[];
};

function isCommand(value: string): value is Command {
  return (COMMANDS as readonly string[]).includes(value);
}

export function parseArgs(argv: string[]): CliOptions {
  const opts: CliOptions = { embeddedServer: false, help: false, errors: [] };

  const takeValue = (flag: string, i: number): string | undefined => {
    const value = argv[i + 1];
    if (value === undefined || value.startsWith("--")) {
      opts.errors.push(`${flag} needs a value`);
      return undefined;
    }
    return value;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "--host": {
        const value = takeValue(arg, i);
        if (value !== undefined) {
          opts.host = value;
          i++;
        }
        break;
      }
      case "--port": {
        const value = takeValue(arg, i);
        if (value !== undefined) {
          const port = coerceNumber(value, -1);
          if (port < 0 || port > 65535 || !Number.isInteger(port)) {
            opts.errors.push(`invalid port: ${value}`);
          } else {
            opts.port = port;
          }
          i++;
        }
        break;
      }
      case "--store": {
        const value = takeValue(arg, i);
        if (value !== undefined) {
          opts.storePath = value;
          i++;
        }
        break;
      }
      case "--server": {
        const value = takeValue(arg, i);
        if (value !== undefined) {
          opts.serverUrl = stripTrailingSlash(value);
          i++;
        }
        break;
      }
      case "--origin": {
        const value = takeValue(arg, i);
        if (value !== undefined) {
          const origin = parseOrigin(value);
          if (origin) opts.origin = origin;
          else opts.errors.push(`origin must be desktop or phone: ${value}`);
          i++;
        }
        break;
      }
      case "--interval": {
        const value = takeValue(arg, i);
        if (value !== undefined) {
          const ms = coerceNumber(value, -1, 1);
          if (ms < 1) opts.errors.push(`invalid interval: ${value}`);
          else opts.intervalMs = ms;
          i++;
        }
        break;
      }
      case "--log-level": {
        const value = takeValue(arg, i);
        if (value !== undefined) {
          if (isLogLevel(value)) opts.logLevel = value;
          else opts.errors.push(`unknown log level: ${value}`);
          i++;
        }
        break;
      }
      case "--embedded-server":
        opts.embeddedServer = true;
        break;
      case "--help":
      case "-h":
        opts.help = true;
        break;
      default:
        if (!opts.command && isCommand(arg)) {
          opts.command = arg;
        } else {
          opts.errors.push(`unexpected argument: ${arg}`);
        }
        break;
    }
  }
  return opts;
}

export function applyCliOptions(config: ClipbridgeConfig, opts: CliOptions): ClipbridgeConfig {
  return {
    ...config,
    server: {
      ...config.server,
      host: opts.host ?? config.server.host,
      port: opts.port ?? config.server.port,
      storePath: opts.storePath ?? config.server.storePath,
    },
    client: {
      ...config.client,
      serverUrl: opts.serverUrl ?? config.client.serverUrl,
    },
    sync: {
      ...config.sync,
      origin: opts.origin ?? config.sync.origin,
      pollIntervalMs: opts.intervalMs ?? config.sync.pollIntervalMs,
    },
    logLevel: opts.logLevel ?? config.logLevel,
  };
}

export function usage(): string {
  return [
    "Usage:",
    "  clipbridge serve [--host <host>] [--port <port>] [--store <path>]",
    "  clipbridge sync  [--server <url>] [--origin desktop|phone] [--interval <ms>] [--embedded-server]",
    "  clipbridge push  [--server <url>] [--origin desktop|phone]",
    "  clipbridge pull  [--server <url>]",
    "",
    "Options:",
    "  --log-level <debug|info|warn|error>",
    "  -h, --help",
    "",
    "Environment: CLIPBOARD_HOST, CLIPBOARD_PORT, CLIPBOARD_SERVER, CLIPBOARD_STORE,",
    "  CLIPBOARD_POLL_MS, CLIPBOARD_BACKOFF_MS, CLIPBOARD_TIMEOUT_MS, CLIPBOARD_ORIGIN, CLIPBOARD_LOG_LEVEL",
    "",
    "Examples:",
    "  clipbridge serve --port 5000 --store ./clipboard_store.json",
    "  clipbridge sync --server http://192.168.1.20:5000",
    "  clipbridge sync --embedded-server",
  ].join("\n");
}
