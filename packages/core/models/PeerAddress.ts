/**
 * A remote endpoint: either a send target or the remote side of an accepted
 * connection.
 */
export interface PeerAddress {
  host: string;
  port: number;
}

const MAPPED_IPV4_PREFIX = "::ffff:";

/**
 * Strip the IPv4-mapped IPv6 prefix a dual-stack listener reports, so that
 * `::ffff:10.0.0.2` and `10.0.0.2` key the same peer.
 */
export function normalizeHost(host: string): string {
  if (host.toLowerCase().startsWith(MAPPED_IPV4_PREFIX) && host.includes(".")) {
    return host.slice(MAPPED_IPV4_PREFIX.length);
  }
  return host;
}

/** Registry and event key, `"host:port"`. */
export function formatPeerAddress(address: PeerAddress): string {
  return `${normalizeHost(address.host)}:${address.port}`;
}

/** A usable send target: non-empty host and a port in 1-65535. */
export function validatePeerAddress(address: PeerAddress): boolean {
  return (
    typeof address.host === "string" &&
    address.host.length > 0 &&
    Number.isInteger(address.port) &&
    address.port >= 1 &&
    address.port <= 65535
  );
}
