import type { ClipboardAccessor } from "../clipboard/accessor";
import { createChangePoller, type ChangePoller, DEFAULT_POLL_INTERVAL_MS } from "../clipboard/poller";
import { errorMessage, UsageError } from "../errors";
import { createLogger } from "../logger";
import { EngineEventType } from "../models/enums";
import { formatPeerAddress, validatePeerAddress, type PeerAddress } from "../models/PeerAddress";
import { sendClipboard } from "../network/client";
import { delay, type Sleep } from "../timers";
import { NotificationRelay } from "./relay";

const log = createLogger("monitor");

/** Resolves with the number of payload bytes sent. */
export type SendFn = (peer: PeerAddress, text: string) => Promise<number>;

export type SyncMonitorOptions = {
  peer: PeerAddress;
  clipboard: ClipboardAccessor;
  relay?: NotificationRelay;
  intervalMs?: number;
  send?: SendFn;
  sleep?: Sleep;
  now?: () => number;
};

export interface SyncMonitor {
  readonly peer: PeerAddress;
  readonly intervalMs: number;
  /** Poll and push until `signal` aborts. Never rejects on I/O errors. */
  run(signal?: AbortSignal): Promise<void>;
  /** The last value considered propagated. */
  getBaseline(): string;
}

export function createSyncMonitor(options: SyncMonitorOptions): SyncMonitor {
  const peer = options.peer;
  const target = formatPeerAddress(peer);
  if (!validatePeerAddress(peer)) {
    throw new UsageError(`Invalid peer address: ${target}`);
  }
  const relay = options.relay ?? new NotificationRelay();
  const send: SendFn = options.send ?? ((p, text) => sendClipboard(p, text));
  const sleep = options.sleep ?? delay;
  const intervalMs = options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  const poller: ChangePoller = createChangePoller({
    clipboard: options.clipboard,
    intervalMs,
    now: options.now,
    sleep,
  });
  let baseline = "";

  function reportError(message: string, cause: unknown) {
    log.warn(message);
    relay.emit({ type: EngineEventType.Error, message, peer: target, cause });
  }

  async function pushOnce(text: string): Promise<void> {
    try {
      const size = await send(peer, text);
      relay.emit({ type: EngineEventType.Sent, peer: target, size });
      log.info(`Sent clipboard update to ${target} (${size} bytes)`);
    } catch (err) {
      reportError(`Failed to send to ${target}: ${errorMessage(err)}`, err);
    }
  }

  async function run(signal?: AbortSignal): Promise<void> {
    try {
      baseline = await options.clipboard.read();
    } catch (err) {
      reportError(`Clipboard monitoring error: ${errorMessage(err)}`, err);
      baseline = "";
    }
    log.info(`Monitoring clipboard, sending to ${target}`);

    while (!signal?.aborted) {
      let text: string;
      try {
        text = (await poller.poll(signal)).text;
      } catch (err) {
        reportError(`Clipboard monitoring error: ${errorMessage(err)}`, err);
        await sleep(intervalMs, signal);
        continue;
      }
      if (signal?.aborted) break;

      // The baseline only advances inside this branch, whatever the send
      // outcome. Blank values never become the baseline, so A -> "" -> A does
      // not resend A.
      if (text !== baseline && text.trim()) {
        await pushOnce(text);
        baseline = text;
      }
    }
    log.info(`Stopped monitoring for ${target}`);
  }

  return {
    peer,
    intervalMs,
    run,
    getBaseline: () => baseline,
  };
}
