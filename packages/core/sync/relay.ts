/**
 * Fan-out of engine events to observers (log sink, UI, tests).
 */
import type { EngineEvent, EngineObserver } from "../models/EngineEvent";
import { errorMessage } from "../errors";
import { createLogger } from "../logger";

const log = createLogger("relay");

export class NotificationRelay {
  private observers: EngineObserver[] = [];

  subscribe(observer: EngineObserver): () => void {
    this.observers.push(observer);
    return () => {
      this.observers = this.observers.filter((o) => o !== observer);
    };
  }

  /**
   * Deliver in subscription order without waiting on any observer. A throwing
   * or rejecting observer is logged; the rest still receive the event.
   */
  emit(event: EngineEvent): void {
    for (const observer of [...this.observers]) {
      deliver(observer, event);
    }
  }
}

function deliver(observer: EngineObserver, event: EngineEvent): void {
  try {
    const result = observer(event);
    if (isPromiseLike(result)) {
      void Promise.resolve(result).catch((err: unknown) => {
        log.warn("Observer rejected", event.type, errorMessage(err));
      });
    }
  } catch (err) {
    log.warn("Observer threw", event.type, errorMessage(err));
  }
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return typeof value === "object" && value !== null && "then" in value && typeof value.then === "function";
}
