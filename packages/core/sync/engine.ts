import type { ClipboardAccessor } from "../clipboard/accessor";
import { errorMessage } from "../errors";
import { createLogger } from "../logger";
import type { ClientSession } from "../models/ClientSession";
import { EngineEventType } from "../models/enums";
import type { PeerAddress } from "../models/PeerAddress";
import { createSyncServer, type RunningServer, type ServeOptions } from "../network/server";
import { ClientRegistry } from "../registry/clientRegistry";
import type { Sleep } from "../timers";
import { createSyncMonitor, type SendFn } from "./monitor";
import { NotificationRelay } from "./relay";

const log = createLogger("engine");

export type ClipShareEngineOptions = {
  clipboard: ClipboardAccessor;
  relay?: NotificationRelay;
  registry?: ClientRegistry;
  consumeClipboard?: boolean;
  send?: SendFn;
  sleep?: Sleep;
};

export interface ClipShareEngine {
  readonly relay: NotificationRelay;
  readonly registry: ClientRegistry;
  startServer(port: number, options?: Omit<ServeOptions, "signal">): Promise<RunningServer>;
  stopServer(): Promise<void>;
  /** Throws UsageError when `peer` has no host or a port outside 1-65535. */
  startMonitor(peer: PeerAddress, intervalMs?: number): void;
  stopMonitor(): Promise<void>;
  isServing(): boolean;
  isMonitoring(): boolean;
  setConsumeClipboard(enabled: boolean): void;
  isConsumingClipboard(): boolean;
  clients(): ClientSession[];
  clearClients(): void;
  /** Read the local clipboard as it is right now. */
  refreshClipboard(): Promise<string>;
  clearClipboard(): Promise<void>;
  shutdown(): Promise<void>;
}

/**
 * Owns one sync server and at most one monitor loop, and lets a front end
 * start and stop them.
 */
export function createClipShareEngine(options: ClipShareEngineOptions): ClipShareEngine {
  const relay = options.relay ?? new NotificationRelay();
  const registry = options.registry ?? new ClientRegistry();
  const server = createSyncServer({
    clipboard: options.clipboard,
    relay,
    registry,
    consumeClipboard: options.consumeClipboard,
  });

  let running: RunningServer | null = null;
  let starting: Promise<RunningServer> | null = null;
  let monitorAbort: AbortController | null = null;
  let monitorTask: Promise<void> | null = null;

  async function startServer(
    port: number,
    serveOptions: Omit<ServeOptions, "signal"> = {}
  ): Promise<RunningServer> {
    if (running) return running;
    if (starting) return starting;
    starting = server.serve(port, serveOptions).then((bound) => {
      running = bound;
      return bound;
    });
    try {
      return await starting;
    } finally {
      starting = null;
    }
  }

  async function stopServer(): Promise<void> {
    const pending = starting;
    if (pending) {
      // A failed bind has already been reported to the startServer caller.
      await pending.catch(() => undefined);
    }
    const current = running;
    running = null;
    if (current) await current.close();
  }

  function startMonitor(peer: PeerAddress, intervalMs?: number): void {
    if (monitorTask) return;
    const controller = new AbortController();
    const monitor = createSyncMonitor({
      peer,
      clipboard: options.clipboard,
      relay,
      intervalMs,
      send: options.send,
      sleep: options.sleep,
    });
    monitorAbort = controller;
    monitorTask = monitor.run(controller.signal).catch((err: unknown) => {
      log.error("Monitor loop failed", errorMessage(err));
      relay.emit({
        type: EngineEventType.Error,
        message: `Clipboard monitoring error: ${errorMessage(err)}`,
        cause: err,
      });
    });
  }

  async function stopMonitor(): Promise<void> {
    const task = monitorTask;
    monitorAbort?.abort();
    monitorAbort = null;
    monitorTask = null;
    if (task) await task;
  }

  return {
    relay,
    registry,
    startServer,
    stopServer,
    startMonitor,
    stopMonitor,
    isServing: () => running !== null,
    isMonitoring: () => monitorTask !== null,
    setConsumeClipboard: (enabled) => server.setConsumeClipboard(enabled),
    isConsumingClipboard: () => server.isConsumingClipboard(),
    clients: () => registry.list(),
    clearClients: () => registry.clearAll(),
    refreshClipboard: () => options.clipboard.read(),
    clearClipboard: () => options.clipboard.write(""),
    async shutdown() {
      await Promise.all([stopMonitor(), stopServer()]);
    },
  };
}
