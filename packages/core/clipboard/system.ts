import type { ClipboardAccessor } from "./accessor";
import { commandsForPlatform } from "./platform";
import { runCommand, type CommandRunner } from "./platform/run";
import { errorMessage } from "../errors";
import { createLogger } from "../logger";

const log = createLogger("clipboard");

export const DEFAULT_READ_TIMEOUT_MS = 1000;
export const DEFAULT_WRITE_TIMEOUT_MS = 2000;

export type SystemClipboardOptions = {
  platform?: string;
  readTimeoutMs?: number;
  writeTimeoutMs?: number;
  run?: CommandRunner;
};

/**
 * OS clipboard backed by the platform's command line utilities.
 *
 * Throws UnsupportedPlatformError right away when the platform has no known
 * utilities. After that, a failing utility (missing, non-zero exit, too slow)
 * reads as "" and makes writes a no-op.
 */
export function createSystemClipboard(options: SystemClipboardOptions = {}): ClipboardAccessor {
  const commands = commandsForPlatform(options.platform ?? process.platform);
  const run = options.run ?? runCommand;
  const readTimeoutMs = options.readTimeoutMs ?? DEFAULT_READ_TIMEOUT_MS;
  const writeTimeoutMs = options.writeTimeoutMs ?? DEFAULT_WRITE_TIMEOUT_MS;

  return {
    async read() {
      try {
        return await run(commands.read, { timeoutMs: readTimeoutMs });
      } catch (err) {
        log.debug("Clipboard read failed", errorMessage(err));
        return "";
      }
    },
    async write(text: string) {
      try {
        await run(commands.write, { input: text, timeoutMs: writeTimeoutMs });
      } catch (err) {
        log.debug("Clipboard write failed", errorMessage(err));
      }
    },
  };
}
