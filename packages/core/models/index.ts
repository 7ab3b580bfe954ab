export * from "./enums";
export * from "./PeerAddress";
export type { ClipboardSnapshot } from "./ClipboardSnapshot";
export type { ClientSession } from "./ClientSession";
export type {
  EngineEvent,
  EngineObserver,
  SentEvent,
  ReceivedEvent,
  ServerStartedEvent,
  ErrorEvent,
  ClientAddedEvent,
  ClientUpdatedEvent,
  ClientRemovedEvent,
} from "./EngineEvent";
