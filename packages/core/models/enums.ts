/**
 * Enum for the kinds of events the sync engine reports.
 */
export enum EngineEventType {
  Sent = "sent",
  Received = "received",
  ServerStarted = "server_started",
  Error = "error",
  ClientAdded = "client_added",
  ClientUpdated = "client_updated",
  ClientRemoved = "client_removed",
}
