import { createChangePoller } from "../poller";
import { createClipboardAccessor, MemoryClipboard } from "../accessor";
import { jest } from "@jest/globals";

describe("ChangePoller", () => {
  test("waits one interval, then samples the clipboard", async () => {
    const clipboard = new MemoryClipboard("first");
    const order: string[] = [];
    const sleep = jest.fn(async (_ms: number, _signal?: AbortSignal) => {
      order.push("sleep");
    });
    const read = jest.spyOn(clipboard, "read");
    read.mockImplementation(async () => {
      order.push("read");
      return "first";
    });
    const poller = createChangePoller({ clipboard, intervalMs: 750, now: () => 42, sleep });

    await expect(poller.poll()).resolves.toEqual({ text: "first", observedAt: 42 });
    expect(order).toEqual(["sleep", "read"]);
    expect(sleep).toHaveBeenCalledWith(750, undefined);
  });

  test("defaults to a one second interval", () => {
    const poller = createChangePoller({ clipboard: new MemoryClipboard() });
    expect(poller.intervalMs).toBe(1000);
  });

  test("returns values as read, without filtering", async () => {
    const clipboard = new MemoryClipboard("  \n");
    const poller = createChangePoller({ clipboard, sleep: async () => {} });
    await expect(poller.poll()).resolves.toMatchObject({ text: "  \n" });
  });

  test("passes accessor failures to the caller", async () => {
    const poller = createChangePoller({
      clipboard: createClipboardAccessor(async () => Promise.reject(new Error("no display"))),
      sleep: async () => {},
    });
    await expect(poller.poll()).rejects.toThrow("no display");
  });

  test("forwards the abort signal to the wait", async () => {
    const controller = new AbortController();
    const sleep = jest.fn(async (_ms: number, _signal?: AbortSignal) => {});
    const poller = createChangePoller({ clipboard: new MemoryClipboard(), sleep });
    await poller.poll(controller.signal);
    expect(sleep).toHaveBeenCalledWith(1000, controller.signal);
  });
});
