export {
  SessionSchema,
  type Session,
  EMPTY_SESSION,
  isAuthenticated,
  hasAccessToken,
  hasRefreshToken,
} from './session.schema.js';
export {
  ItemRefSchema,
  SalesItemLineDetailSchema,
  InvoiceLineSchema,
  CustomerRefSchema,
  CreateInvoiceRequestSchema,
  type InvoiceLine,
  type CreateInvoiceRequest,
} from './invoice.schema.js';
