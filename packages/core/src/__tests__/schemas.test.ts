import { describe, it, expect } from 'vitest';
import {
  SessionSchema,
  EMPTY_SESSION,
  hasAccessToken,
  isAuthenticated,
  hasRefreshToken,
  CreateInvoiceRequestSchema,
} from '../index.js';

function validInvoice() {
  return {
    Line: [
      {
        DetailType: 'SalesItemLineDetail',
        Amount: 100.5,
        SalesItemLineDetail: { ItemRef: { name: 'Services', value: '1' } },
      },
    ],
    CustomerRef: { value: '58' },
  };
}

describe('SessionSchema', () => {
  it('accepts the empty record', () => {
    expect(SessionSchema.parse({})).toEqual({});
  });

  it('accepts a full record', () => {
    const session = {
      state: 'xyz',
      access_token: 'A',
      refresh_token: 'R',
      realm_id: '123',
      token_expiry: 3600,
    };
    expect(SessionSchema.parse(session)).toEqual(session);
  });

  it('accepts a null realm_id', () => {
    expect(SessionSchema.parse({ access_token: 'A', realm_id: null }).realm_id).toBeNull();
  });

  it('rejects a non-numeric token_expiry', () => {
    expect(SessionSchema.safeParse({ token_expiry: '3600' }).success).toBe(false);
  });
});

describe('session predicates', () => {
  it('empty session is not authenticated', () => {
    expect(isAuthenticated(EMPTY_SESSION)).toBe(false);
    expect(hasRefreshToken(EMPTY_SESSION)).toBe(false);
  });

  it('session with both tokens is authenticated', () => {
    expect(isAuthenticated({ access_token: 'A', refresh_token: 'R' })).toBe(true);
  });

  it('a single token is not enough', () => {
    expect(isAuthenticated({ access_token: 'A', realm_id: '123' })).toBe(false);
    expect(isAuthenticated({ refresh_token: 'R', realm_id: '123' })).toBe(false);
    expect(hasAccessToken({ access_token: 'A' })).toBe(true);
  });

  it('empty access token does not count', () => {
    expect(isAuthenticated({ access_token: '' })).toBe(false);
    expect(hasRefreshToken({ refresh_token: '' })).toBe(false);
  });

  it('EMPTY_SESSION is frozen', () => {
    expect(Object.isFrozen(EMPTY_SESSION)).toBe(true);
  });
});

describe('CreateInvoiceRequestSchema', () => {
  it('accepts a valid invoice', () => {
    expect(CreateInvoiceRequestSchema.safeParse(validInvoice()).success).toBe(true);
  });

  it('rejects a missing CustomerRef', () => {
    const { CustomerRef: _omit, ...body } = validInvoice();
    const result = CreateInvoiceRequestSchema.safeParse(body);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(['CustomerRef']);
    }
  });

  it('rejects a line item without Amount', () => {
    const body = validInvoice();
    const { Amount: _omit, ...line } = body.Line[0]!;
    const result = CreateInvoiceRequestSchema.safeParse({ ...body, Line: [line] });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(['Line', 0, 'Amount']);
    }
  });

  it('rejects unknown fields', () => {
    const result = CreateInvoiceRequestSchema.safeParse({ ...validInvoice(), DueDate: '2026-01-01' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.code).toBe('unrecognized_keys');
    }
  });

  it('rejects unknown fields nested in ItemRef', () => {
    const body = validInvoice();
    const line = body.Line[0]!;
    const result = CreateInvoiceRequestSchema.safeParse({
      ...body,
      Line: [{ ...line, SalesItemLineDetail: { ItemRef: { name: 'a', value: '1', extra: true } } }],
    });
    expect(result.success).toBe(false);
  });

  it('rejects an empty Line list', () => {
    expect(CreateInvoiceRequestSchema.safeParse({ ...validInvoice(), Line: [] }).success).toBe(false);
  });

  it('rejects a string Amount', () => {
    const body = validInvoice();
    const line = body.Line[0]!;
    expect(
      CreateInvoiceRequestSchema.safeParse({ ...body, Line: [{ ...line, Amount: '100' }] }).success,
    ).toBe(false);
  });
});
