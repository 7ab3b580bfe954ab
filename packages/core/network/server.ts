import net from "node:net";
import type { ClipboardAccessor } from "../clipboard/accessor";
import { errorMessage } from "../errors";
import { createLogger } from "../logger";
import { EngineEventType } from "../models/enums";
import { formatPeerAddress, type PeerAddress } from "../models/PeerAddress";
import { decodeFrame } from "../protocols/frame";
import { ClientRegistry } from "../registry/clientRegistry";
import { NotificationRelay } from "../sync/relay";
import { utf8ByteLength } from "./bytes";

const log = createLogger("server");

export type SyncServerOptions = {
  clipboard: ClipboardAccessor;
  relay?: NotificationRelay;
  registry?: ClientRegistry;
  /** Write received text to the local clipboard (default true) */
  consumeClipboard?: boolean;
};

export type ServeOptions = {
  /** Interface to bind; all interfaces when omitted */
  host?: string;
  /** Aborting closes the listener, like RunningServer.close() */
  signal?: AbortSignal;
};

export interface RunningServer {
  /** Bound port (differs from the requested one when 0 was asked for) */
  readonly port: number;
  /**
   * Stop accepting, drop connections that are still open and resolve once the
   * listener is fully closed.
   */
  close(): Promise<void>;
}

export interface SyncServer {
  readonly registry: ClientRegistry;
  readonly relay: NotificationRelay;
  serve(port: number, options?: ServeOptions): Promise<RunningServer>;
  handleConnection(socket: net.Socket): Promise<void>;
  setConsumeClipboard(enabled: boolean): void;
  isConsumingClipboard(): boolean;
}

export function createSyncServer(options: SyncServerOptions): SyncServer {
  const clipboard = options.clipboard;
  const relay = options.relay ?? new NotificationRelay();
  const registry = options.registry ?? new ClientRegistry();
  let consumeClipboard = options.consumeClipboard ?? true;

  function reportError(message: string, cause: unknown, peer?: string) {
    relay.emit({
      type: EngineEventType.Error,
      message,
      cause,
      ...(peer ? { peer } : {}),
    });
  }

  // One frame per connection. Reads have no timeout: a silent peer keeps its
  // handler and registry entry until it disconnects or the server is closed.
  async function handleConnection(socket: net.Socket): Promise<void> {
    const address: PeerAddress = {
      host: socket.remoteAddress ?? "unknown",
      port: socket.remotePort ?? 0,
    };
    const peer = formatPeerAddress(address);
    socket.on("error", (err) => log.debug("Socket error", peer, err.message));

    registry.add(address, "");
    relay.emit({ type: EngineEventType.ClientAdded, peer, content: "" });
    try {
      const text = await decodeFrame(socket);
      if (text === null) {
        log.debug("Connection closed before a frame arrived", peer);
        return;
      }
      registry.update(address, text);
      relay.emit({ type: EngineEventType.ClientUpdated, peer, content: text });
      if (consumeClipboard) {
        await clipboard.write(text);
      }
      const size = utf8ByteLength(text);
      relay.emit({ type: EngineEventType.Received, peer, size });
      log.info(`Received clipboard update from ${peer} (${size} bytes)`);
    } catch (err) {
      log.warn(`Error handling client ${peer}`, errorMessage(err));
      reportError(`Error handling client ${peer}: ${errorMessage(err)}`, err, peer);
    } finally {
      registry.remove(address);
      relay.emit({ type: EngineEventType.ClientRemoved, peer });
      socket.destroy();
    }
  }

  async function serve(port: number, serveOptions: ServeOptions = {}): Promise<RunningServer> {
    const sockets = new Set<net.Socket>();
    // No cap on concurrent connections; every accepted socket gets its own handler.
    const server = net.createServer((socket) => {
      sockets.add(socket);
      socket.once("close", () => sockets.delete(socket));
      void handleConnection(socket);
    });

    try {
      await new Promise<void>((resolve, reject) => {
        const onError = (err: Error) => {
          server.off("listening", onListening);
          reject(err);
        };
        const onListening = () => {
          server.off("error", onError);
          resolve();
        };
        server.once("error", onError);
        server.once("listening", onListening);
        server.listen({ port, host: serveOptions.host });
      });
    } catch (err) {
      log.error(`Server error on port ${port}`, errorMessage(err));
      reportError(`Server error on port ${port}: ${errorMessage(err)}`, err);
      throw err;
    }

    server.on("error", (err) => {
      log.warn(`Server error on port ${port}`, err.message);
      reportError(`Server error on port ${port}: ${err.message}`, err);
    });

    const bound = server.address();
    const boundPort = bound && typeof bound === "object" ? bound.port : port;
    relay.emit({ type: EngineEventType.ServerStarted, port: boundPort });
    log.info(`Listening for clipboard updates on port ${boundPort}`);

    let closing: Promise<void> | undefined;
    const close = (): Promise<void> => {
      if (!closing) {
        closing = new Promise<void>((resolve) => {
          server.close(() => resolve());
          for (const socket of sockets) socket.destroy();
        });
        log.info(`Stopped listening on port ${boundPort}`);
      }
      return closing;
    };

    serveOptions.signal?.addEventListener("abort", () => void close(), { once: true });
    if (serveOptions.signal?.aborted) await close();

    return { port: boundPort, close };
  }

  return {
    registry,
    relay,
    serve,
    handleConnection,
    setConsumeClipboard(enabled: boolean) {
      consumeClipboard = enabled;
    },
    isConsumingClipboard() {
      return consumeClipboard;
    },
  };
}
