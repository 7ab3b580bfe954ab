import { v4 as uuidv4 } from "uuid";
import type { ClientSession } from "../models/ClientSession";
import { formatPeerAddress, type PeerAddress } from "../models/PeerAddress";

export type ClientRegistryDeps = {
  now?: () => number;
  makeId?: () => string;
};

/**
 * Inbound peers keyed by `"host:port"`. Entries never expire; they leave only
 * through remove() when a connection closes, or clearAll().
 */
export class ClientRegistry {
  private sessions = new Map<string, ClientSession>();
  private now: () => number;
  private makeId: () => string;

  constructor(deps: ClientRegistryDeps = {}) {
    this.now = deps.now ?? Date.now;
    this.makeId = deps.makeId ?? uuidv4;
  }

  /**
   * Insert or replace the entry for `address`. Re-adding a known address keeps
   * its id and firstSeenAt.
   */
  add(address: PeerAddress, content: string): ClientSession {
    const key = formatPeerAddress(address);
    const ts = this.now();
    const existing = this.sessions.get(key);
    const session: ClientSession = {
      id: existing?.id ?? this.makeId(),
      address: { ...address },
      key,
      lastContent: content,
      firstSeenAt: existing?.firstSeenAt ?? ts,
      lastSeenAt: ts,
    };
    this.sessions.set(key, session);
    return session;
  }

  update(address: PeerAddress, content: string): ClientSession {
    return this.add(address, content);
  }

  /** Returns whether an entry was removed. */
  remove(address: PeerAddress | string): boolean {
    const key = typeof address === "string" ? address : formatPeerAddress(address);
    return this.sessions.delete(key);
  }

  clearAll(): void {
    this.sessions.clear();
  }

  get(address: PeerAddress | string): ClientSession | undefined {
    const key = typeof address === "string" ? address : formatPeerAddress(address);
    const session = this.sessions.get(key);
    return session ? { ...session, address: { ...session.address } } : undefined;
  }

  has(address: PeerAddress | string): boolean {
    return this.get(address) !== undefined;
  }

  /** Sessions ordered by most recent activity first. */
  list(): ClientSession[] {
    return Array.from(this.sessions.values())
      .map((s) => ({ ...s, address: { ...s.address } }))
      .sort((a, b) => b.lastSeenAt - a.lastSeenAt);
  }

  get size(): number {
    return this.sessions.size;
  }
}
