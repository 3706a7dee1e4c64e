/**
 * Utility functions for transports and endpoint clients
 */

export { serializeForLog, truncateString, sanitizeHeadersForLog, errorToLog, defaultLogger } from './logging.js';
export { isRecord } from './guards.js';
