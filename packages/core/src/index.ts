export { isJsonObject, isJsonValue, type JsonObject, type JsonValue, parseJsonColumn } from "./json";
export { isLogLevel, type LogEntry, Logger, type LogLevel, silentLogger } from "./logger";
export * from "./result";
export { charLength, checkMaxLength, checkRequired } from "./validation/columns";
