export {
  ERROR_CODES,
  type ErrorCode,
  type ErrorDomain,
  type ErrorCodeEntry,
  type ErrorHttpStatus,
} from './error-codes.js';
export { RelayError, isRelayError, type RelayErrorBody } from './base-error.js';
