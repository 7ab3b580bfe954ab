import { createLogger, type Logger } from "../logger";
import type { EngineEvent, EngineObserver } from "../models/EngineEvent";
import { EngineEventType } from "../models/enums";
import { utf8ByteLength } from "../network/bytes";

export type LogSinkOptions = {
  logger?: Logger;
  clock?: () => Date;
};

function pad(n: number): string {
  return n.toString().padStart(2, "0");
}

export function formatClock(date: Date): string {
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/** One activity-log line for an event, without the timestamp. */
export function formatEvent(event: EngineEvent): string {
  switch (event.type) {
    case EngineEventType.Sent:
      return `Sent ${event.peer} (${event.size} bytes)`;
    case EngineEventType.Received:
      return `Received ${event.peer} (${event.size} bytes)`;
    case EngineEventType.ServerStarted:
      return `Server started on port ${event.port}`;
    case EngineEventType.Error:
      return `Error ${event.message}`;
    case EngineEventType.ClientAdded:
      return `Client connected ${event.peer}`;
    case EngineEventType.ClientUpdated:
      return `Client updated ${event.peer} (${utf8ByteLength(event.content)} bytes)`;
    case EngineEventType.ClientRemoved:
      return `Client disconnected ${event.peer}`;
  }
}

/**
 * Observer that writes every event to the log as `HH:MM:SS <line>`. Client
 * lifecycle noise goes to debug, errors to warn.
 */
export function createLogSink(options: LogSinkOptions = {}): EngineObserver {
  const logger = options.logger ?? createLogger("activity");
  const clock = options.clock ?? (() => new Date());

  return (event) => {
    const line = `${formatClock(clock())} ${formatEvent(event)}`;
    switch (event.type) {
      case EngineEventType.Error:
        logger.warn(line);
        break;
      case EngineEventType.ClientAdded:
      case EngineEventType.ClientUpdated:
      case EngineEventType.ClientRemoved:
        logger.debug(line);
        break;
      default:
        logger.info(line);
    }
  };
}
