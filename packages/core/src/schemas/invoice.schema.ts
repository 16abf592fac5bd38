import { z } from 'zod';

// Body of POST /invoices/create. Unknown keys are rejected at every level.

export const ItemRefSchema = z
  .object({
    name: z.string(),
    value: z.string(),
  })
  .strict();

export const SalesItemLineDetailSchema = z
  .object({
    ItemRef: ItemRefSchema,
  })
  .strict();

export const InvoiceLineSchema = z
  .object({
    DetailType: z.string().min(1),
    Amount: z.number().finite(),
    SalesItemLineDetail: SalesItemLineDetailSchema,
  })
  .strict();

export const CustomerRefSchema = z
  .object({
    value: z.string().min(1),
  })
  .strict();

export const CreateInvoiceRequestSchema = z
  .object({
    Line: z.array(InvoiceLineSchema).min(1),
    CustomerRef: CustomerRefSchema,
  })
  .strict();

export type InvoiceLine = z.infer<typeof InvoiceLineSchema>;
export type CreateInvoiceRequest = z.infer<typeof CreateInvoiceRequestSchema>;
