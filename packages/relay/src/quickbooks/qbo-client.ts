import { z } from 'zod';
import { RelayError, type CreateInvoiceRequest } from '@qbo-relay/core';
import { fetchUpstream, readJson, DEFAULT_TIMEOUT_MS } from '../http/upstream-fetch.js';

export interface QboCredentials {
  accessToken: string;
  realmId: string;
}

export interface QboClientOpts extends QboCredentials {
  baseUrl: string;
  timeoutMs?: number;
}

/** Upstream JSON object, passed through untouched. */
export type QboObject = Record<string, unknown>;

// Only the envelopes are checked; everything inside is relayed as-is.
const CompanyInfoEnvelopeSchema = z.object({
  CompanyInfo: z.record(z.unknown()),
});

const CustomerQueryEnvelopeSchema = z.object({
  QueryResponse: z.object({
    Customer: z.array(z.record(z.unknown())).optional(),
  }),
});

const ObjectSchema = z.record(z.unknown());

const CUSTOMER_QUERY = 'Select * from Customer';

/**
 * QuickBooks Online accounting API client for a single company.
 *
 * Every call succeeds only on HTTP 200; anything else raises UPSTREAM_ERROR
 * carrying the upstream status. Nothing is retried.
 */
export class QboClient {
  private readonly baseUrl: string;
  private readonly accessToken: string;
  private readonly realmId: string;
  private readonly timeoutMs: number;

  constructor(opts: QboClientOpts) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, '');
    this.accessToken = opts.accessToken;
    this.realmId = opts.realmId;
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async getCompanyInfo(): Promise<QboObject> {
    const realm = encodeURIComponent(this.realmId);
    const body = await this.request('GET', `/companyinfo/${realm}`, 'Failed to fetch company info');
    const parsed = CompanyInfoEnvelopeSchema.safeParse(body);
    if (!parsed.success) {
      throw new RelayError('UPSTREAM_INVALID_RESPONSE', { message: 'CompanyInfo missing from response' });
    }
    return parsed.data.CompanyInfo;
  }

  async queryCustomers(): Promise<QboObject[]> {
    const query = new URLSearchParams({ query: CUSTOMER_QUERY });
    const body = await this.request('GET', `/query?${query.toString()}`, 'Failed to fetch customers');
    const parsed = CustomerQueryEnvelopeSchema.safeParse(body);
    if (!parsed.success) {
      throw new RelayError('UPSTREAM_INVALID_RESPONSE', { message: 'QueryResponse missing from response' });
    }
    return parsed.data.QueryResponse.Customer ?? [];
  }

  async createInvoice(invoice: CreateInvoiceRequest): Promise<QboObject> {
    return this.requestObject('POST', '/invoice', 'Failed to create invoice', invoice);
  }

  async getTransactionList(): Promise<QboObject> {
    return this.requestObject('GET', '/reports/TransactionList', 'Failed to fetch transactions');
  }

  private async requestObject(
    method: 'GET' | 'POST',
    path: string,
    failureMessage: string,
    payload?: unknown,
  ): Promise<QboObject> {
    const body = await this.request(method, path, failureMessage, payload);
    const parsed = ObjectSchema.safeParse(body);
    if (!parsed.success) {
      throw new RelayError('UPSTREAM_INVALID_RESPONSE');
    }
    return parsed.data;
  }

  private async request(
    method: 'GET' | 'POST',
    path: string,
    failureMessage: string,
    payload?: unknown,
  ): Promise<unknown> {
    const url = `${this.baseUrl}/v3/company/${encodeURIComponent(this.realmId)}${path}`;
    const res = await fetchUpstream(
      url,
      {
        method,
        headers: {
          Accept: 'application/json',
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.accessToken}`,
        },
        ...(payload !== undefined && { body: JSON.stringify(payload) }),
      },
      this.timeoutMs,
    );

    if (res.status !== 200) {
      throw new RelayError('UPSTREAM_ERROR', {
        message: failureMessage,
        upstreamStatus: res.status,
      });
    }

    return readJson(res);
  }
}
