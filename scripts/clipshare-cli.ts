#!/usr/bin/env node
import process from "node:process";
import { createSystemClipboard } from "../packages/core/clipboard/system";
import { parseCliArgs, usage, type CliOptions } from "../packages/core/config";
import { errorMessage, UsageError } from "../packages/core/errors";
import { createLogger, parseLogLevel, setLogLevel } from "../packages/core/logger";
import { formatPeerAddress } from "../packages/core/models/PeerAddress";
import { createLogSink } from "../packages/core/sinks/logSink";
import { createClipShareEngine } from "../packages/core/sync/engine";
import { NotificationRelay } from "../packages/core/sync/relay";

const log = createLogger("cli");

async function main() {
  let opts: CliOptions;
  try {
    opts = parseCliArgs(process.argv.slice(2));
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(`error: ${err.message}\n`);
      console.error(usage());
      process.exitCode = 2;
      return;
    }
    throw err;
  }
  if (opts.help) {
    console.log(usage());
    return;
  }

  const level = opts.logLevel ?? parseLogLevel(process.env.CLIPSHARE_LOG_LEVEL);
  if (level) setLogLevel(level);

  const clipboard = createSystemClipboard();
  const relay = new NotificationRelay();
  relay.subscribe(createLogSink());
  const engine = createClipShareEngine({
    clipboard,
    relay,
    consumeClipboard: opts.consumeClipboard,
  });

  if (opts.listenPort !== undefined) {
    await engine.startServer(opts.listenPort);
  }
  if (opts.peer) {
    log.info(`Pushing clipboard changes to ${formatPeerAddress(opts.peer)} every ${opts.intervalMs / 1000}s`);
    engine.startMonitor(opts.peer, opts.intervalMs);
  }

  const stop = (signal: string) => {
    log.info(`Received ${signal}, shutting down`);
    engine.shutdown().catch((err: unknown) => {
      log.error("Shutdown failed", errorMessage(err));
      process.exitCode = 1;
    });
  };
  process.once("SIGINT", () => stop("SIGINT"));
  process.once("SIGTERM", () => stop("SIGTERM"));
}

main().catch((err: unknown) => {
  log.error("Fatal", errorMessage(err));
  process.exitCode = 1;
});
