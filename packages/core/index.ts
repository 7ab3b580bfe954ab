export * from "./models";
export * from "./errors";
export * from "./logger";
export * from "./config";
export * from "./timers";
export * from "./clipboard/accessor";
export * from "./clipboard/poller";
export * from "./clipboard/system";
export * from "./protocols/frame";
export { utf8ByteLength } from "./network/bytes";
export * from "./network/client";
export * from "./network/server";
export * from "./registry/clientRegistry";
export * from "./sync/relay";
export * from "./sync/monitor";
export * from "./sync/engine";
export * from "./sinks/logSink";
