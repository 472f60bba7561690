#!/usr/bin/env node
import process from "node:process";
import { applyCliOptions, parseArgs, usage } from "../packages/core/cli/args";
import { runPull, runPush, runServe, runSync, type RunningService } from "../packages/core/cli/commands";
import { loadConfig } from "../packages/core/config";
import { describeError } from "../packages/core/errors";
import { createLogger, setLogLevel } from "../packages/core/logger";

const log = createLogger("cli");

function installShutdown(service: RunningService) {
  let stopping = false;

  async function shutdown(signal: string) {
    if (stopping) return;
    stopping = true;
    log.info(`received ${signal}, shutting down...`);
    const killTimer = setTimeout(() => {
      log.warn("force exiting after timeout");
      process.exit(1);
    }, 5000).unref();
    try {
      await service.stop();
    } catch (err) {
      log.error("error during shutdown", { error: describeError(err) });
    } finally {
      clearTimeout(killTimer);
      process.exit(0);
    }
  }

  process.on("SIGINT", () => {
    void shutdown("SIGINT");
  });
  process.on("SIGTERM", () => {
    void shutdown("SIGTERM");
  });
  process.on("unhandledRejection", (reason) => {
    log.error("unhandled rejection", { error: describeError(reason) });
    void shutdown("unhandledRejection");
  });
}

async function main(): Promise<number> {
  const opts = parseArgs(process.argv.slice(2));
  if (opts.help) {
    console.log(usage());
    return 0;
  }
  if (opts.errors.length > 0 || !opts.command) {
    for (const e of opts.errors) console.error(`[cli] ${e}`);
    if (!opts.command) console.error("[cli] missing command");
    console.error(usage());
    return 1;
  }

  const base = loadConfig(process.env);
  const config = applyCliOptions(base, opts);
  setLogLevel(config.logLevel);
  for (const warning of config.warnings) log.warn(warning);

  switch (opts.command) {
    case "serve":
      installShutdown(await runServe(config));
      return 0;
    case "sync":
      installShutdown(await runSync(config, { embeddedServer: opts.embeddedServer }));
      return 0;
    case "push":
      return runPush(config);
    case "pull":
      return runPull(config);
  }
}

main().then(
  (code) => {
    if (code !== 0) process.exitCode = code;
  },
  (err: unknown) => {
    log.error("fatal", { error: describeError(err) });
    process.exitCode = 1;
  }
);
