export { LoggerImpl } from "./logger-impl.js";
export { LOG_LEVELS, type LogLevel, getCurrentLevel, isLogLevel, setLogLevel } from "./log-level.js";
