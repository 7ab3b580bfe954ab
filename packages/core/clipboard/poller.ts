import type { ClipboardAccessor } from "./accessor";
import type { ClipboardSnapshot } from "../models/ClipboardSnapshot";
import { delay, type Sleep } from "../timers";

export const DEFAULT_POLL_INTERVAL_MS = 1000;

export interface ChangePoller {
  readonly intervalMs: number;
  /**
   * Wait one interval, then sample the clipboard. Does not compare or filter;
   * accessor errors reach the caller.
   */
  poll(signal?: AbortSignal): Promise<ClipboardSnapshot>;
}

export type ChangePollerOptions = {
  clipboard: ClipboardAccessor;
  intervalMs?: number;
  now?: () => number;
  sleep?: Sleep;
};

export function createChangePoller(options: ChangePollerOptions): ChangePoller {
  const intervalMs = options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  const now = options.now ?? Date.now;
  const sleep = options.sleep ?? delay;

  return {
    intervalMs,
    async poll(signal) {
      await sleep(intervalMs, signal);
      const text = await options.clipboard.read();
      return { text, observedAt: now() };
    },
  };
}
