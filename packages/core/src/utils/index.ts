export { createLogger, setDebugLogging, type Logger } from './logger.js';
export { truncate } from './truncate.js';
