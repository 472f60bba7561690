export * from "./models/enums";
export * from "./models/Clip";
export * from "./models/codec";
export * from "./models/schema";
export * from "./clipboard/types";
export * from "./clipboard/fingerprint";
export * from "./clipboard/memory";
export * from "./clipboard/platform/system";
export * from "./store";
export * from "./server/http";
export * from "./server/server";
export * from "./client/storeClient";
export * from "./sync/policy";
export * from "./sync/engine";
export * from "./sync/oneshot";
export * from "./config";
export * from "./errors";
export { createLogger, setLogLevel, type Logger, type LogLevel } from "./logger";
