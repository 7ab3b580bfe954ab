import { EngineEventType } from "./enums";

export type SentEvent = { type: EngineEventType.Sent; peer: string; size: number };
export type ReceivedEvent = { type: EngineEventType.Received; peer: string; size: number };
export type ServerStartedEvent = { type: EngineEventType.ServerStarted; port: number };
export type ErrorEvent = {
  type: EngineEventType.Error;
  message: string;
  peer?: string;
  cause?: unknown;
};
export type ClientAddedEvent = { type: EngineEventType.ClientAdded; peer: string; content: string };
export type ClientUpdatedEvent = { type: EngineEventType.ClientUpdated; peer: string; content: string };
export type ClientRemovedEvent = { type: EngineEventType.ClientRemoved; peer: string };

/**
 * Everything the engine reports to observers. `size` is a UTF-8 byte count.
 */
export type EngineEvent =
  | SentEvent
  | ReceivedEvent
  | ServerStartedEvent
  | ErrorEvent
  | ClientAddedEvent
  | ClientUpdatedEvent
  | ClientRemovedEvent;

export type EngineObserver = (event: EngineEvent) => void | PromiseLike<void>;
