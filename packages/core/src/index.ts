export * from "./catalog";
export * from "./config";
export * from "./filters";
export { type GenerateOptions, generate } from "./generate";
export { isNonEmptyString, isPositiveInteger, isRecord } from "./guards";
export { type Logger, type LogLevel, noopLogger } from "./logger";
export * from "./render";
export * from "./result";
