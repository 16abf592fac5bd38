// @qbo-relay/core - shared errors and schemas

// Errors
export {
  ERROR_CODES,
  type ErrorCode,
  type ErrorDomain,
  type ErrorCodeEntry,
  type ErrorHttpStatus,
  RelayError,
  isRelayError,
  type RelayErrorBody,
} from './errors/index.js';

// Schemas
export {
  SessionSchema,
  type Session,
  EMPTY_SESSION,
  isAuthenticated,
  hasAccessToken,
  hasRefreshToken,
  ItemRefSchema,
  SalesItemLineDetailSchema,
  InvoiceLineSchema,
  CustomerRefSchema,
  CreateInvoiceRequestSchema,
  type InvoiceLine,
  type CreateInvoiceRequest,
} from './schemas/index.js';
