export { createAppLogger, type AppLogger, type AppLoggerOptions } from "./logger.js";
