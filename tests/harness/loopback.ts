import net from "node:net";
import type { EngineEvent } from "../../packages/core/models/EngineEvent";
import type { NotificationRelay } from "../../packages/core/sync/relay";

export const LOOPBACK = "127.0.0.1";

export function recordEvents(relay: NotificationRelay): EngineEvent[] {
  const events: EngineEvent[] = [];
  relay.subscribe((e) => {
    events.push(e);
  });
  return events;
}

/** Subscribe now, resolve with the first matching event. */
export function waitForEvent(
  relay: NotificationRelay,
  predicate: (event: EngineEvent) => boolean,
  timeoutMs = 3000
): Promise<EngineEvent> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      unsubscribe();
      reject(new Error(`timed out after ${timeoutMs}ms waiting for event`));
    }, timeoutMs);
    const unsubscribe = relay.subscribe((event) => {
      if (!predicate(event)) return;
      clearTimeout(timer);
      unsubscribe();
      resolve(event);
    });
  });
}

export function connect(port: number): Promise<net.Socket> {
  return new Promise((resolve, reject) => {
    const socket = net.createConnection({ host: LOOPBACK, port });
    socket.once("error", reject);
    socket.once("connect", () => {
      socket.off("error", reject);
      resolve(socket);
    });
  });
}

/** Registry key the server will use for a socket we opened. */
export function keyOf(socket: net.Socket): string {
  return `${LOOPBACK}:${socket.localPort}`;
}

export function header(length: number): Uint8Array {
  const out = new Uint8Array(4);
  new DataView(out.buffer).setUint32(0, length, false);
  return out;
}

export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

export const nextMacrotask = () => new Promise<void>((resolve) => setImmediate(resolve));
