export { logger, createLogger } from './logger.js';
export { toError, errorMessage } from './errors.js';
