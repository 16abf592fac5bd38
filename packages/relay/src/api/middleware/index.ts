export { requestId } from './request-id.js';
export { requestLogger } from './request-logger.js';
export { errorHandler } from './error-handler.js';
