import net from "node:net";
import { formatPeerAddress, type PeerAddress } from "../models/PeerAddress";
import { encodeClipboardText, HEADER_BYTES } from "../protocols/frame";

export const DEFAULT_CONNECT_TIMEOUT_MS = 5000;

export type SendOptions = {
  timeoutMs?: number;
};

/**
 * Push one clipboard value to `peer`: connect, write a single frame, close.
 * Resolves with the payload size in bytes. The timeout covers the whole
 * exchange.
 */
export function sendClipboard(peer: PeerAddress, text: string, options: SendOptions = {}): Promise<number> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
  const bytes = encodeClipboardText(text);
  const target = formatPeerAddress(peer);

  return new Promise<number>((resolve, reject) => {
    let settled = false;
    const socket = net.createConnection({ host: peer.host, port: peer.port });

    const timer = setTimeout(() => {
      fail(new Error(`Timed out sending to ${target} after ${timeoutMs}ms`));
    }, timeoutMs);

    function fail(err: Error) {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      socket.destroy();
      reject(err);
    }

    socket.on("error", fail);
    socket.once("connect", () => {
      socket.end(bytes, () => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        socket.destroy();
        resolve(bytes.byteLength - HEADER_BYTES);
      });
    });
  });
}
