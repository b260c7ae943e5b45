export * from "./config/index.js";
export * from "./syncthing/index.js";
export * from "./reconcile/index.js";
export * from "./service/index.js";
export { Logger } from "./utils/logger.js";
export type { LoggerOptions, LogSink } from "./utils/logger.js";
