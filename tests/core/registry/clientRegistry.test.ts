import { ClientRegistry } from "../../../packages/core/registry/clientRegistry";

function makeRegistry() {
  let clock = 1000;
  let ids = 0;
  const registry = new ClientRegistry({
    now: () => clock,
    makeId: () => `session-${++ids}`,
  });
  return {
    registry,
    tick(ms: number) {
      clock += ms;
    },
  };
}

const alice = { host: "10.0.0.2", port: 50100 };
const bob = { host: "10.0.0.3", port: 50200 };

describe("ClientRegistry", () => {
  test("add creates a session keyed by host:port", () => {
    const { registry } = makeRegistry();
    const session = registry.add(alice, "");
    expect(session).toEqual({
      id: "session-1",
      address: alice,
      key: "10.0.0.2:50100",
      lastContent: "",
      firstSeenAt: 1000,
      lastSeenAt: 1000,
    });
    expect(registry.size).toBe(1);
  });

  test("re-adding an address refreshes it without a new identity", () => {
    const { registry, tick } = makeRegistry();
    registry.add(alice, "");
    tick(500);
    const again = registry.add(alice, "");
    expect(again.id).toBe("session-1");
    expect(again.firstSeenAt).toBe(1000);
    expect(again.lastSeenAt).toBe(1500);
    expect(registry.size).toBe(1);
  });

  test("update records the latest content", () => {
    const { registry, tick } = makeRegistry();
    registry.add(alice, "");
    tick(20);
    registry.update(alice, "hello");
    expect(registry.get("10.0.0.2:50100")).toMatchObject({
      id: "session-1",
      lastContent: "hello",
      lastSeenAt: 1020,
    });
  });

  test("remove deletes the entry and is a no-op when absent", () => {
    const { registry } = makeRegistry();
    registry.add(alice, "x");
    expect(registry.remove(alice)).toBe(true);
    expect(registry.remove(alice)).toBe(false);
    expect(registry.remove("10.9.9.9:1")).toBe(false);
    expect(registry.has(alice)).toBe(false);
  });

  test("a removed address that comes back gets a fresh session", () => {
    const { registry } = makeRegistry();
    registry.add(alice, "");
    registry.remove(alice);
    expect(registry.add(alice, "").id).toBe("session-2");
  });

  test("clearAll empties the registry", () => {
    const { registry } = makeRegistry();
    registry.add(alice, "a");
    registry.add(bob, "b");
    registry.clearAll();
    expect(registry.size).toBe(0);
    expect(registry.list()).toEqual([]);
  });

  test("list puts the most recently active peer first", () => {
    const { registry, tick } = makeRegistry();
    registry.add(alice, "a");
    tick(10);
    registry.add(bob, "b");
    tick(10);
    registry.update(alice, "a2");
    expect(registry.list().map((s) => s.key)).toEqual(["10.0.0.2:50100", "10.0.0.3:50200"]);
  });

  test("IPv4-mapped hosts share the plain IPv4 key", () => {
    const { registry } = makeRegistry();
    registry.add({ host: "::ffff:10.0.0.2", port: 50100 }, "");
    expect(registry.has(alice)).toBe(true);
  });

  test("returned sessions are copies", () => {
    const { registry } = makeRegistry();
    registry.add(alice, "a");
    const copy = registry.get(alice);
    if (!copy) throw new Error("missing session");
    copy.lastContent = "mutated";
    copy.address.port = 1;
    expect(registry.get(alice)).toMatchObject({ lastContent: "a", address: alice });
  });
});
