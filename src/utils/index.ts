/**
 * Utilities
 */

// Logger
export { createLogger, setLogLevel } from './logger.js'
