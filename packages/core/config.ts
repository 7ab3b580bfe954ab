import { UsageError } from "./errors";
import { parseLogLevel, type LogLevel } from "./logger";
import { DEFAULT_POLL_INTERVAL_MS } from "./clipboard/poller";
import type { PeerAddress } from "./models/PeerAddress";

export type CliOptions = {
  listenPort?: number;
  peer?: PeerAddress;
  intervalMs: number;
  consumeClipboard: boolean;
  logLevel?: LogLevel;
  help?: boolean;
};

const PORT_PATTERN = /^\d+$/;

export function parsePort(value: string, opts: { allowZero?: boolean } = {}): number {
  const trimmed = value.trim();
  const port = PORT_PATTERN.test(trimmed) ? Number(trimmed) : NaN;
  const min = opts.allowZero ? 0 : 1;
  if (!Number.isInteger(port) || port < min || port > 65535) {
    throw new UsageError(`Invalid port: ${JSON.stringify(value)}`);
  }
  return port;
}

/**
 * Parse `HOST:PORT`, splitting at the last colon. `[::1]:9000` style brackets
 * are removed from the host.
 */
export function parsePeerAddress(value: string): PeerAddress {
  const trimmed = value.trim();
  const idx = trimmed.lastIndexOf(":");
  if (idx < 0) {
    throw new UsageError("--peer must be in HOST:PORT format");
  }
  let host = trimmed.slice(0, idx);
  if (host.startsWith("[") && host.endsWith("]")) host = host.slice(1, -1);
  if (!host) {
    throw new UsageError("--peer must be in HOST:PORT format");
  }
  return { host, port: parsePort(trimmed.slice(idx + 1)) };
}

/** Longest delay a Node timer honours; larger values fire after 1ms. */
export const MAX_INTERVAL_MS = 2 ** 31 - 1;

/** Seconds (possibly fractional) to milliseconds. */
export function parseInterval(value: string): number {
  const seconds = Number(value.trim());
  if (!value.trim() || !Number.isFinite(seconds) || seconds <= 0 || seconds * 1000 > MAX_INTERVAL_MS) {
    throw new UsageError(`Invalid interval: ${JSON.stringify(value)}`);
  }
  return seconds * 1000;
}

function requireValue(argv: string[], i: number, flag: string): string {
  const value = argv[i + 1];
  if (value === undefined || value.startsWith("--")) {
    throw new UsageError(`${flag} requires a value`);
  }
  return value;
}

export function parseCliArgs(argv: string[]): CliOptions {
  const opts: CliOptions = {
    intervalMs: DEFAULT_POLL_INTERVAL_MS,
    consumeClipboard: true,
  };
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "--listen":
        opts.listenPort = parsePort(requireValue(argv, i, arg), { allowZero: true });
        i++;
        break;
      case "--peer":
        opts.peer = parsePeerAddress(requireValue(argv, i, arg));
        i++;
        break;
      case "--interval":
        opts.intervalMs = parseInterval(requireValue(argv, i, arg));
        i++;
        break;
      case "--no-consume":
        opts.consumeClipboard = false;
        break;
      case "--log-level": {
        const raw = requireValue(argv, i, arg);
        const level = parseLogLevel(raw);
        if (!level) throw new UsageError(`Unknown log level: ${raw}`);
        opts.logLevel = level;
        i++;
        break;
      }
      case "--help":
      case "-h":
        opts.help = true;
        break;
      default:
        throw new UsageError(`Unknown argument: ${arg}`);
    }
  }
  if (!opts.help && opts.listenPort === undefined && opts.peer === undefined) {
    throw new UsageError("must specify --listen and/or --peer");
  }
  return opts;
}

export function usage(): string {
  return [
    "Usage:",
    "  tsx scripts/clipshare-cli.ts --listen <port>",
    "  tsx scripts/clipshare-cli.ts --peer <host:port> [--interval <seconds>]",
    "",
    "Options:",
    "  --listen PORT         accept clipboard updates on PORT",
    "  --peer HOST:PORT      push local clipboard changes to HOST:PORT",
    "  --interval SECONDS    clipboard poll interval (default 1.0)",
    "  --no-consume          do not write received text to the local clipboard",
    "  --log-level LEVEL     debug | info | warn | error | silent",
    "",
    "Environment:",
    "  CLIPSHARE_LOG_LEVEL   log level when --log-level is not given",
  ].join("\n");
}
