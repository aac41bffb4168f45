import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '@stockdesk/agents';
import { coerceNumbers, respond, wrapResponse } from '../src/formatters/response.js';

describe('coerceNumbers', () => {
  it('turns numeric strings into numbers at any depth', () => {
    expect(coerceNumbers({ limit: '5', nested: [{ conviction: '0.7' }], ticker: 'AAPL', rm: 'None', flag: 'true', blank: '' }))
      .toEqual({ limit: 5, nested: [{ conviction: 0.7 }], ticker: 'AAPL', rm: 'None', flag: 'true', blank: '' });
  });
});

describe('wrapResponse', () => {
  it('serialises results as pretty JSON text', () => {
    expect(wrapResponse({ a: 1 })).toEqual({ content: [{ type: 'text', text: '{\n  "a": 1\n}' }] });
  });

  it('marks errors and carries configuration issues', () => {
    const response = wrapResponse(new ConfigurationError('Invalid analysis request', ['ticker: invalid symbol "$"']));

    expect(response.isError).toBe(true);
    expect(JSON.parse(response.content[0].text)).toEqual({
      error: 'Invalid analysis request',
      issues: ['ticker: invalid symbol "$"'],
    });
  });
});

describe('respond', () => {
  it('wraps async results', async () => {
    const response = await respond(async () => ({ ok: true }));
    expect(response.isError).toBeUndefined();
    expect(JSON.parse(response.content[0].text)).toEqual({ ok: true });
  });

  it('turns a thrown error into an error response', async () => {
    const response = await respond(() => {
      throw new Error('Task t-1 not found');
    });
    expect(response).toEqual({
      content: [{ type: 'text', text: '{"error":"Task t-1 not found"}' }],
      isError: true,
    });
  });
});
