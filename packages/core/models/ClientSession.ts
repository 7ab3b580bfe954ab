/**
 * An inbound peer that is currently (or was just) connected to the sync server.
 */
import type { PeerAddress } from "./PeerAddress";

export interface ClientSession {
  /** Session UUID, kept when the same address is added again */
  id: string;
  /** Remote endpoint of the connection */
  address: PeerAddress;
  /** `"host:port"` registry key */
  key: string;
  /** Most recent fully or partially decoded payload */
  lastContent: string;
  /** When the address was first added (epoch ms) */
  firstSeenAt: number;
  /** When the entry was last added or updated (epoch ms) */
  lastSeenAt: number;
}
